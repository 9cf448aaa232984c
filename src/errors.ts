/**
 * Raised when an input file does not exist. Fatal for the whole run.
 */
export class InputFileNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = "InputFileNotFoundError";
    this.path = path;
  }
}

/**
 * Raised when an input file exists but cannot be used as a record list
 * (bad JSON, wrong root shape) or a rules document is malformed.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * Raised by the CLI when no known command was given.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
