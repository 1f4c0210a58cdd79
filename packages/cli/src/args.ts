import { isLogLevel, LOG_LEVELS, type LogLevel } from "@tinyhttpd/engine";

export interface CliOptions {
  directory: string;
  port: number;
  host: string;
  readTimeoutMs?: number;
  quiet: boolean;
  verbose: boolean;
  logLevel?: LogLevel;
}

export type CliCommand =
  | { kind: "serve"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

const DIGITS = /^\d+$/;

export function parseArgs(args: string[]): CliCommand {
  const options: CliOptions = {
    directory: ".",
    port: 4221,
    host: "0.0.0.0",
    quiet: false,
    verbose: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--directory" || arg === "-d") {
      const value: string | undefined = args[++i];
      if (value === undefined) return missingValue(arg);
      options.directory = value;
    } else if (arg === "--port" || arg === "-p") {
      const value: string | undefined = args[++i];
      if (value === undefined) return missingValue(arg);
      if (!DIGITS.test(value) || Number(value) > 65535) {
        return { kind: "error", message: `Invalid port number: ${value}` };
      }
      options.port = Number(value);
    } else if (arg === "--host" || arg === "-H") {
      const value: string | undefined = args[++i];
      if (value === undefined) return missingValue(arg);
      options.host = value;
    } else if (arg === "--read-timeout") {
      const value: string | undefined = args[++i];
      if (value === undefined) return missingValue(arg);
      if (!DIGITS.test(value) || Number(value) === 0) {
        return { kind: "error", message: `Invalid read timeout: ${value}` };
      }
      options.readTimeoutMs = Number(value);
    } else if (arg === "--log-level") {
      const value: string | undefined = args[++i];
      if (value === undefined) return missingValue(arg);
      if (!isLogLevel(value)) {
        return {
          kind: "error",
          message: `Invalid log level: ${value} (expected one of ${LOG_LEVELS.join(", ")})`,
        };
      }
      options.logLevel = value;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { kind: "serve", options };
}

/** --log-level wins, then --quiet, then --verbose. */
export function logLevelFor(options: CliOptions): LogLevel {
  if (options.logLevel) return options.logLevel;
  if (options.quiet) return "warn";
  return options.verbose ? "debug" : "info";
}

function missingValue(option: string): CliCommand {
  return { kind: "error", message: `Missing value for ${option}` };
}
