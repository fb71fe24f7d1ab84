/**
 * `topoload load <file>` - loads, validates and prints a topology.
 *
 * Exit codes:
 *   0  success
 *   1  usage, configuration, I/O or fatal parse error
 *   2  validation errors, or warnings under --strict
 */

import { ConfigError, loadConfig } from "../config/config";
import { isTopologyError } from "../errors/TopologyErrors";
import type { FileSystemAdapter } from "../io/types";
import { loadTopologyFile } from "../io/TopologyIO";
import { log, setLogLevel } from "../logging/logger";
import { DryRunPlatform } from "../platform/DryRunPlatform";
import { buildTopology } from "../platform/TopologyBuilder";
import { EXPORT_FORMATS, exportTopology, isExportFormat, type ExportFormat } from "../serialization/DocumentExporter";
import { hasErrors, type ValidationIssue } from "../validation/types";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID = 2;

export const USAGE = `Usage: topoload load <file> [options]

Options:
  --validate-only      Report validation issues without printing the topology
  --strict             Exit with code 2 when validation reports warnings
  --format <format>    Output format: ${EXPORT_FORMATS.join(", ")} (default: text)
  --plan               Print the build plan instead of the topology
  --config <path>      Configuration file (default: ./topoload.config.yml)
  -h, --help           Show this help
`;

export interface CliArgs {
  command?: string;
  file?: string;
  validateOnly: boolean;
  strict: boolean;
  format: ExportFormat;
  plan: boolean;
  configPath?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parses command-line arguments (without the node and script entries).
 *
 * @throws UsageError on unknown flags or missing values
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { validateOnly: false, strict: false, format: "text", plan: false, help: false };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--validate-only") {
      args.validateOnly = true;
    } else if (arg === "--strict") {
      args.strict = true;
    } else if (arg === "--plan") {
      args.plan = true;
    } else if (arg === "--format") {
      const format = requireValue(argv, i, arg);
      if (!isExportFormat(format)) {
        throw new UsageError(`Unknown format '${format}', expected one of ${EXPORT_FORMATS.join(", ")}`);
      }
      args.format = format;
      i += 1;
    } else if (arg === "--config") {
      args.configPath = requireValue(argv, i, arg);
      i += 1;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown argument: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length > 2) {
    throw new UsageError(`Unexpected argument: ${positionals[2]}`);
  }
  [args.command, args.file] = positionals;
  return args;
}

/**
 * Formats an issue as `file:line: severity [code] message`.
 */
export function formatIssue(file: string, issue: ValidationIssue): string {
  const where = issue.line === undefined ? file : `${file}:${issue.line}`;
  return `${where}: ${issue.severity} [${issue.code}] ${issue.message}`;
}

/**
 * Process-level dependencies, injectable for tests.
 */
export interface CliContext {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Readonly<Record<string, string | undefined>>;
  cwd: string;
  fs?: FileSystemAdapter;
}

export function defaultContext(): CliContext {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    cwd: process.cwd()
  };
}

/**
 * Runs the CLI and resolves to the exit code. Never rejects.
 */
export async function run(argv: string[], ctx: CliContext = defaultContext()): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    ctx.stderr(`error: ${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
    return EXIT_FAILURE;
  }

  if (args.help) {
    ctx.stdout(USAGE);
    return EXIT_OK;
  }
  if (args.command !== "load" || args.file === undefined) {
    const reason = args.command === undefined || args.command === "load" ? "missing <file>" : `unknown command '${args.command}'`;
    ctx.stderr(`error: ${reason}\n\n${USAGE}`);
    return EXIT_FAILURE;
  }

  try {
    const config = await loadConfig({ configPath: args.configPath, cwd: ctx.cwd, env: ctx.env, fs: ctx.fs, logger: log });
    setLogLevel(config.logLevel);
    const strict = args.strict || config.strict;

    const { file, topology, issues } = await loadTopologyFile(args.file, {
      fs: ctx.fs,
      logger: log,
      ...config.validation
    });

    for (const issue of issues) {
      ctx.stderr(`${formatIssue(file, issue)}\n`);
    }

    if (!args.validateOnly) {
      if (args.plan) {
        const platform = new DryRunPlatform();
        await buildTopology(topology, platform, { logger: log });
        ctx.stdout(`${platform.steps.join("\n")}\n`);
      } else {
        ctx.stdout(exportTopology(topology, args.format));
      }
    }

    if (hasErrors(issues)) return EXIT_INVALID;
    if (strict && issues.length > 0) return EXIT_INVALID;
    return EXIT_OK;
  } catch (err) {
    if (isTopologyError(err) || err instanceof ConfigError) {
      ctx.stderr(`error: ${err.message}\n`);
    } else {
      log.error(err);
      ctx.stderr(`error: ${err instanceof Error ? err.message : String(err)}\n`);
    }
    return EXIT_FAILURE;
  }
}
