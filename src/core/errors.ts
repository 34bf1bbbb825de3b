export type CliOutputFormat = "text" | "json";

/** Error code to process exit code. */
export const ERROR_EXIT_CODES = {
  USER_INPUT: 2,
  CONFIG: 2,
  EXECUTION: 1
} as const;

export type ToolSignalErrorCode = keyof typeof ERROR_EXIT_CODES;

interface ToolSignalErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class ToolSignalError extends Error {
  readonly code: ToolSignalErrorCode;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ToolSignalErrorCode, options: ToolSignalErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = ERROR_EXIT_CODES[code];
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

/** Bad flags, arguments or paths. */
export class UserInputError extends ToolSignalError {
  constructor(message: string, options: ToolSignalErrorOptions = {}) {
    super(message, "USER_INPUT", options);
  }
}

/** Unreadable or invalid `toolsignal.config.json`. */
export class ConfigError extends ToolSignalError {
  constructor(message: string, options: ToolSignalErrorOptions = {}) {
    super(message, "CONFIG", options);
  }
}

export class ExecutionError extends ToolSignalError {
  constructor(message: string, options: ToolSignalErrorOptions = {}) {
    super(message, "EXECUTION", options);
  }
}

interface CommanderErrorLike {
  code: string;
  exitCode?: unknown;
  message?: unknown;
}

// Thrown under exitOverride after commander has already printed help or the version.
const COMMANDER_INFO_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

function isCommanderErrorLike(error: unknown): error is CommanderErrorLike {
  if (!error || typeof error !== "object" || !("code" in error)) return false;
  return typeof error.code === "string" && error.code.startsWith("commander.");
}

export function isCommanderInfoExit(error: unknown): boolean {
  return isCommanderErrorLike(error) && COMMANDER_INFO_CODES.has(error.code);
}

export function normalizeError(error: unknown): ToolSignalError {
  if (error instanceof ToolSignalError) return error;
  if (isCommanderErrorLike(error)) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message.replace(/^error:\s*/i, ""), {
      cause: error,
      details: { commanderCode: error.code }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function normalizeOutputFormat(value: string | undefined): CliOutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new UserInputError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

/**
 * Best-effort `--format` lookup on raw argv, for errors raised before commander has parsed
 * options. Stops at `--`, since everything after it belongs to the watched command.
 */
export function resolveOutputFormatFromArgv(argv: readonly string[]): CliOutputFormat {
  for (const [index, token] of argv.entries()) {
    if (token === "--") break;
    const value = token === "--format" ? argv[index + 1] : token.startsWith("--format=") ? token.slice(9) : undefined;
    if (value !== undefined) return value.trim().toLowerCase() === "json" ? "json" : "text";
  }
  return "text";
}

export function toJsonErrorPayload(error: ToolSignalError): { error: Record<string, unknown> } {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
