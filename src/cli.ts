/**
 * Command-line front end.
 *
 * ```
 * pmc-harvest download <keyword> [options]
 * pmc-harvest text <add|remove|check> <directory>
 * ```
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { DEFAULT_WORKERS, VERSION } from "./config.js";
import { searchAndDownload, type DownloadOptions } from "./download/coordinator.js";
import { FORMAT_NAMES, type OutputFormat, parseOutputFormat } from "./format.js";
import { logger, setLogLevel } from "./logger.js";
import {
  TEXT_FIELD_OPERATIONS,
  type TextFieldOperation,
  applyToDirectory,
  formatDirectoryReport,
} from "./maintenance/text-field.js";
import { exitCodeFor, formatSummary } from "./stats.js";

export const USAGE = `Usage:
  pmc-harvest download <keyword> [options]
  pmc-harvest text <add|remove|check> <directory>
  pmc-harvest --help | --version

Download options:
  --max-results <n>     Maximum number of articles to download (default: 100)
  --format <name>       ${FORMAT_NAMES.join(" | ")} (default: text; json/txt mean text)
  --api-key <key>       NCBI API key (default: NCBI_API_KEY)
  --email <address>     Contact email sent to NCBI (default: NCBI_EMAIL)
  --user-agent <value>  Override the User-Agent header
  --rate-limit <sec>    Minimum seconds between requests (default: 0.1 with API key, 0.34 without)
  -o, --output-dir <d>  Base output directory (default: publications)
  --sequential          Download one article at a time
  --workers <n>         Concurrent downloads (default: ${DEFAULT_WORKERS})
  --exclude-text        Omit the plain-text field from records
  -v, --verbose         Debug logging`;

export const DEFAULT_MAX_RESULTS = 100;

export interface DownloadCommand {
  command: "download";
  keyword: string;
  maxResults: number;
  format: OutputFormat;
  concurrent: boolean;
  workers: number;
  includeText: boolean;
  verbose: boolean;
  apiKey?: string;
  email?: string;
  userAgent?: string;
  rateLimitMs?: number;
  outputDir?: string;
}

export interface TextCommand {
  command: "text";
  operation: TextFieldOperation;
  directory: string;
}

export type CliCommand =
  | DownloadCommand
  | TextCommand
  | { command: "help" }
  | { command: "version" };

/** Error in the command line itself; reported with usage. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const positiveInt = z.coerce.number().int().positive();
const nonNegative = z.coerce.number().finite().nonnegative();

function parseNumber(schema: z.ZodNumber, flag: string, value: string): number {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(`Invalid value for ${flag}: "${value}"`);
  }
  return parsed.data;
}

function isTextFieldOperation(value: string): value is TextFieldOperation {
  return TEXT_FIELD_OPERATIONS.some((operation) => operation === value);
}

function parseDownload(args: string[]): DownloadCommand {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      "max-results": { type: "string" },
      format: { type: "string" },
      "api-key": { type: "string" },
      email: { type: "string" },
      "user-agent": { type: "string" },
      "rate-limit": { type: "string" },
      "output-dir": { type: "string", short: "o" },
      sequential: { type: "boolean" },
      workers: { type: "string" },
      "exclude-text": { type: "boolean" },
      verbose: { type: "boolean", short: "v" },
    },
  });

  const [keyword, ...extra] = positionals;
  if (keyword === undefined || keyword.trim() === "") {
    throw new UsageError("download requires a search keyword");
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(" ")} (quote multi-word keywords)`);
  }

  let format: OutputFormat = "text";
  if (values.format !== undefined) {
    try {
      format = parseOutputFormat(values.format);
    } catch (err) {
      throw new UsageError(err instanceof Error ? err.message : String(err));
    }
  }

  const command: DownloadCommand = {
    command: "download",
    keyword,
    maxResults:
      values["max-results"] === undefined
        ? DEFAULT_MAX_RESULTS
        : parseNumber(positiveInt, "--max-results", values["max-results"]),
    format,
    concurrent: !values.sequential,
    workers:
      values.workers === undefined
        ? DEFAULT_WORKERS
        : parseNumber(positiveInt, "--workers", values.workers),
    includeText: !values["exclude-text"],
    verbose: values.verbose ?? false,
  };
  if (values["api-key"] !== undefined) command.apiKey = values["api-key"];
  if (values.email !== undefined) command.email = values.email;
  if (values["user-agent"] !== undefined) command.userAgent = values["user-agent"];
  if (values["output-dir"] !== undefined) command.outputDir = values["output-dir"];
  if (values["rate-limit"] !== undefined) {
    const seconds = parseNumber(nonNegative, "--rate-limit", values["rate-limit"]);
    command.rateLimitMs = Math.round(seconds * 1000);
  }
  return command;
}

function parseText(args: string[]): TextCommand {
  const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
  const [operation, directory, ...extra] = positionals;
  if (operation === undefined || !isTextFieldOperation(operation)) {
    throw new UsageError(`text requires an operation: ${TEXT_FIELD_OPERATIONS.join(", ")}`);
  }
  if (directory === undefined) {
    throw new UsageError(`text ${operation} requires a directory`);
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(" ")}`);
  }
  return { command: "text", operation, directory };
}

/**
 * Parse command-line arguments (without the node and script entries).
 * @throws UsageError for unknown commands, flags or bad values
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { command: "help" };
    case "--version":
      return { command: "version" };
    case "download":
      return parseDownload(rest);
    case "text":
      return parseText(rest);
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

function toDownloadOptions(command: DownloadCommand): DownloadOptions {
  const options: DownloadOptions = {
    format: command.format,
    concurrent: command.concurrent,
    workers: command.workers,
    includeText: command.includeText,
  };
  if (command.apiKey !== undefined) options.apiKey = command.apiKey;
  if (command.email !== undefined) options.email = command.email;
  if (command.userAgent !== undefined) options.userAgent = command.userAgent;
  if (command.rateLimitMs !== undefined) options.rateLimitMs = command.rateLimitMs;
  if (command.outputDir !== undefined) options.outputDir = command.outputDir;
  return options;
}

export interface CliIo {
  /** Receives everything meant for stdout */
  print: (text: string) => void;
  /** Receives usage errors */
  printError: (text: string) => void;
}

const defaultIo: CliIo = {
  print: (text) => {
    process.stdout.write(`${text}\n`);
  },
  printError: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

/**
 * Run the CLI and resolve to the process exit code.
 * Download sessions exit 0, 1 or 2 as {@link exitCodeFor} decides; usage and
 * configuration errors exit 1.
 */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    io.printError(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
    return 1;
  }

  switch (command.command) {
    case "help":
      io.print(USAGE);
      return 0;
    case "version":
      io.print(`pmc-harvest ${VERSION}`);
      return 0;
    case "text": {
      try {
        const report = await applyToDirectory(command.directory, command.operation);
        io.print(formatDirectoryReport(report));
        return report.errors > 0 ? 2 : 0;
      } catch (err) {
        logger.error({ err, directory: command.directory }, "Cannot read directory");
        return 1;
      }
    }
    case "download": {
      if (command.verbose) setLogLevel("debug");
      try {
        const stats = await searchAndDownload(
          command.keyword,
          command.maxResults,
          toDownloadOptions(command)
        );
        io.print(formatSummary(stats));
        return exitCodeFor(stats);
      } catch (err) {
        logger.error({ err }, "Download session failed");
        return 1;
      }
    }
  }
}
