/**
 * Fatal parse errors. Every error carries the 1-indexed line number and the
 * raw text of the offending declaration; `loadTopologyFile` adds the file.
 */

export type TopologyErrorCode =
  | "SyntaxError"
  | "DuplicateNodeError"
  | "UnknownNodeError"
  | "DuplicatePortError"
  | "DuplicateLinkError"
  | "SelfLinkError";

/**
 * Location of the declaration that caused a failure.
 */
export interface ErrorLocation {
  line: number;
  text: string;
  file?: string;
}

/**
 * Base class for all fatal topology errors.
 */
export abstract class TopologyError extends Error {
  abstract readonly code: TopologyErrorCode;
  readonly line: number;
  readonly text: string;
  readonly file?: string;
  /** Message without the location prefix */
  readonly detail: string;

  constructor(detail: string, location: ErrorLocation) {
    super(formatLocation(location) + detail);
    this.detail = detail;
    this.line = location.line;
    this.text = location.text;
    this.file = location.file;
    this.name = new.target.name;
  }

  /**
   * Returns a copy of this error attributed to a file.
   */
  abstract withFile(file: string): TopologyError;

  protected location(file: string): ErrorLocation {
    return { line: this.line, text: this.text, file };
  }
}

function formatLocation(location: ErrorLocation): string {
  const where = location.file ? `${location.file}:${location.line}` : `line ${location.line}`;
  return `${where}: `;
}

/**
 * A non-comment, non-blank line matches none of the declaration grammars.
 */
export class TopologySyntaxError extends TopologyError {
  readonly code = "SyntaxError";

  withFile(file: string): TopologySyntaxError {
    return new TopologySyntaxError(this.detail, this.location(file));
  }
}

export class DuplicateNodeError extends TopologyError {
  readonly code = "DuplicateNodeError";

  constructor(
    readonly nodeId: string,
    readonly firstLine: number,
    location: ErrorLocation
  ) {
    super(`node '${nodeId}' is already declared on line ${firstLine}`, location);
  }

  withFile(file: string): DuplicateNodeError {
    return new DuplicateNodeError(this.nodeId, this.firstLine, this.location(file));
  }
}

export class UnknownNodeError extends TopologyError {
  readonly code = "UnknownNodeError";

  constructor(
    readonly nodeId: string,
    location: ErrorLocation
  ) {
    super(`node '${nodeId}' is never declared`, location);
  }

  withFile(file: string): UnknownNodeError {
    return new UnknownNodeError(this.nodeId, this.location(file));
  }
}

export class DuplicatePortError extends TopologyError {
  readonly code = "DuplicatePortError";

  constructor(
    readonly portId: string,
    readonly attribute: string,
    location: ErrorLocation
  ) {
    super(`port '${portId}' already declares '${attribute}' with a different value`, location);
  }

  withFile(file: string): DuplicatePortError {
    return new DuplicatePortError(this.portId, this.attribute, this.location(file));
  }
}

export class DuplicateLinkError extends TopologyError {
  readonly code = "DuplicateLinkError";

  constructor(
    detail: string,
    readonly firstLine: number,
    location: ErrorLocation
  ) {
    super(detail, location);
  }

  withFile(file: string): DuplicateLinkError {
    return new DuplicateLinkError(this.detail, this.firstLine, this.location(file));
  }
}

export class SelfLinkError extends TopologyError {
  readonly code = "SelfLinkError";

  constructor(
    readonly portId: string,
    location: ErrorLocation
  ) {
    super(`link connects port '${portId}' to itself`, location);
  }

  withFile(file: string): SelfLinkError {
    return new SelfLinkError(this.portId, this.location(file));
  }
}

export function isTopologyError(err: unknown): err is TopologyError {
  return err instanceof TopologyError;
}
