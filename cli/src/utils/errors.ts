export type IoOperation = "open" | "read" | "create" | "write";

const OPERATION_VERBS: Record<IoOperation, string> = {
  open: "open",
  read: "read",
  create: "create",
  write: "write to",
};

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export class UserCancelledError extends Error {
  constructor(message: string = "No input file selected") {
    super(message);
    this.name = "UserCancelledError";
  }
}

export class IoError extends Error {
  readonly operation: IoOperation;
  readonly path: string;

  constructor(operation: IoOperation, path: string, cause: unknown, detail?: string) {
    super(`Failed to ${OPERATION_VERBS[operation]} ${path}: ${detail ?? describeCause(cause)}`, { cause });
    this.name = "IoError";
    this.operation = operation;
    this.path = path;
  }
}

/**
 * Input bytes that do not decode as UTF-8. Raised while reading, so it is an IoError too.
 */
export class InvalidEncodingError extends IoError {
  readonly lineNumber: number;

  constructor(path: string, lineNumber: number, cause: unknown) {
    super("read", path, cause, `line ${lineNumber} is not valid UTF-8`);
    this.name = "InvalidEncodingError";
    this.lineNumber = lineNumber;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
