export type SiteErrorCode =
  | "USAGE"
  | "INPUT_READ"
  | "EMPTY_INPUT"
  | "NO_USABLE_COLUMNS"
  | "CONFIG";

/** Base class for every failure that aborts a generation run. */
export class SiteError extends Error {
  readonly code: SiteErrorCode;

  constructor(code: SiteErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UsageError extends SiteError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export class InputReadError extends SiteError {
  constructor(file: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("INPUT_READ", `Cannot read CSV ${file}: ${reason}`, { cause });
  }
}

export class EmptyInputError extends SiteError {
  constructor(file: string) {
    super("EMPTY_INPUT", `CSV is empty: ${file}`);
  }
}

export class NoUsableColumnsError extends SiteError {
  constructor() {
    super("NO_USABLE_COLUMNS", "No non-empty header columns found in CSV");
  }
}

export class ConfigError extends SiteError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}
