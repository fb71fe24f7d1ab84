/**
 * Attribute bag micro-grammar: `[key=value key2="quoted value",flag=True]`.
 *
 * Quoting rule: a quoted value runs to the next `"`; it may contain spaces,
 * commas and `=`, but no `"` and no `]`. There are no escape sequences.
 */

import { TopologySyntaxError, type ErrorLocation } from "../errors/TopologyErrors";
import type { AttributeMap, AttributeValue } from "../types/topology";

const KEY_RE = /[A-Za-z_][A-Za-z0-9_.-]*/y;
const BARE_RE = /[^\s,\]"=]+/y;
const SEPARATOR_RE = /[\s,]*/y;
const NUMBER_RE = /^-?\d+(\.\d+)?$/;

export interface AttributeBagResult {
  attributes: AttributeMap;
  /** Remainder of the line after the closing `]`, trimmed */
  rest: string;
}

/**
 * Converts a bare (unquoted) token to its typed value.
 * `True`/`False` are case-sensitive. A numeral becomes a number only when
 * the number prints back as a numeral: unsafe integers and values that
 * print in exponent form stay strings.
 */
export function coerceBareValue(token: string): AttributeValue {
  if (token === "True") return true;
  if (token === "False") return false;
  if (NUMBER_RE.test(token)) {
    const value = Number(token);
    if (isWritableNumber(value)) return value;
  }
  return token;
}

function isWritableNumber(value: number): boolean {
  if (Object.is(value, -0)) return false;
  if (Number.isInteger(value) && !Number.isSafeInteger(value)) return false;
  return NUMBER_RE.test(String(value));
}

/**
 * Whether a string can be written without quotes and read back as the same
 * string.
 */
export function isBareSafe(value: string): boolean {
  if (value.length === 0) return false;
  BARE_RE.lastIndex = 0;
  const match = BARE_RE.exec(value);
  if (!match || match[0].length !== value.length) return false;
  return typeof coerceBareValue(value) === "string";
}

/**
 * Splits an optional leading attribute bag off a trimmed declaration.
 *
 * @param source - Trimmed line content
 * @param location - Line number and raw text for error reporting
 * @throws TopologySyntaxError on malformed bags
 */
export function splitAttributeBag(source: string, location: ErrorLocation): AttributeBagResult {
  if (!source.startsWith("[")) {
    return { attributes: {}, rest: source };
  }

  const scanner = new BagScanner(source, location);
  const entries = scanner.scan();
  return {
    attributes: Object.fromEntries(entries),
    rest: source.slice(scanner.position).trim()
  };
}

class BagScanner {
  position = 1;
  private readonly entries = new Map<string, AttributeValue>();

  constructor(
    private readonly source: string,
    private readonly location: ErrorLocation
  ) {}

  scan(): Map<string, AttributeValue> {
    for (;;) {
      this.skip(SEPARATOR_RE);
      if (this.position >= this.source.length) {
        this.fail("unterminated attribute list, expected ']'");
      }
      if (this.peek() === "]") {
        this.position += 1;
        return this.entries;
      }
      this.readPair();
    }
  }

  private readPair(): void {
    const key = this.match(KEY_RE);
    if (key === undefined) {
      this.fail(`expected attribute name at column ${this.position + 1}`);
    }
    if (this.peek() !== "=") {
      this.fail(`expected '=' after attribute '${key}'`);
    }
    this.position += 1;

    const value = this.peek() === '"' ? this.readQuoted(key) : this.readBare(key);
    const next = this.peek();
    if (next !== undefined && next !== "]" && next !== "," && !/\s/.test(next)) {
      this.fail(`unexpected '${next}' after value of '${key}'`);
    }
    if (this.entries.has(key)) {
      this.fail(`attribute '${key}' is repeated`);
    }
    this.entries.set(key, value);
  }

  private readQuoted(key: string): string {
    const start = this.position + 1;
    const end = this.source.indexOf('"', start);
    if (end < 0) {
      this.fail(`unterminated quoted value for '${key}'`);
    }
    const value = this.source.slice(start, end);
    if (value.includes("]")) {
      this.fail(`']' is not allowed inside the quoted value of '${key}'`);
    }
    this.position = end + 1;
    return value;
  }

  private readBare(key: string): AttributeValue {
    const token = this.match(BARE_RE);
    if (token === undefined) {
      this.fail(`missing value for attribute '${key}'`);
    }
    return coerceBareValue(token);
  }

  private peek(): string | undefined {
    return this.position < this.source.length ? this.source[this.position] : undefined;
  }

  private match(re: RegExp): string | undefined {
    re.lastIndex = this.position;
    const m = re.exec(this.source);
    if (!m || m[0].length === 0) return undefined;
    this.position += m[0].length;
    return m[0];
  }

  private skip(re: RegExp): void {
    this.match(re);
  }

  private fail(detail: string): never {
    throw new TopologySyntaxError(detail, this.location);
  }
}
