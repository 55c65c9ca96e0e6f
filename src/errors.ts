/**
 * Error taxonomy shared by the store, drivers and orchestrator.
 *
 * Every thrown error carries a stable `code` so the CLI boundary and the batch
 * runner can report it without string matching.
 */

export type ErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "EXTERNAL_TOOL"
  | "AMBIGUOUS_SELECTION";

export class DeckhandError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "DeckhandError";
    this.code = code;
  }
}

/** Bad identifier, type or argument. Raised before any side effect. */
export class ValidationError extends DeckhandError {
  constructor(message: string) {
    super("VALIDATION", message);
    this.name = "ValidationError";
  }
}

/** Missing record or artifact. */
export class NotFoundError extends DeckhandError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class AlreadyExistsError extends DeckhandError {
  constructor(message: string) {
    super("ALREADY_EXISTS", message);
    this.name = "AlreadyExistsError";
  }
}

/** An underlying docker / systemctl / git / script invocation failed. */
export class ExternalToolError extends DeckhandError {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly output: string;

  constructor(command: string, exitCode: number, output: string, message?: string) {
    super("EXTERNAL_TOOL", message ?? `\`${command}\` failed with exit code ${exitCode}`);
    this.name = "ExternalToolError";
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
  }
}

/** A name or pattern resolved to several candidates where only one is allowed. */
export class AmbiguousSelectionError extends DeckhandError {
  public readonly candidates: string[];

  constructor(pattern: string, candidates: string[]) {
    super("AMBIGUOUS_SELECTION", `Pattern '${pattern}' is ambiguous. Matching projects: ${candidates.join(", ")}`);
    this.name = "AmbiguousSelectionError";
    this.candidates = candidates;
  }
}

/**
 * A secret-bearing file has a mode other than 0600.
 * Reported as a warning, never thrown.
 */
export class PermissionDriftWarning {
  public readonly path: string;
  public readonly mode: number;

  constructor(path: string, mode: number) {
    this.path = path;
    this.mode = mode;
  }

  get message(): string {
    return `${this.path} has incorrect permissions (${formatMode(this.mode)} instead of 600)`;
  }
}

export function formatMode(mode: number): string {
  return (mode & 0o777).toString(8).padStart(3, "0");
}

/** Render any thrown value for the operator. */
export function describeError(error: unknown): string {
  if (error instanceof ExternalToolError && error.output.trim()) {
    return `${error.message}\n${error.output.trimEnd()}`;
  }
  return error instanceof Error ? error.message : String(error);
}
