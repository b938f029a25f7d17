/**
 * Clone workflow errors.
 *
 * Every failure surfaced by the workflow is a CloneError carrying a kind the
 * CLI can branch on. Azure SDK errors are classified by HTTP status code.
 */

export type CloneErrorKind =
  | "Unauthenticated"
  | "NotFound"
  | "Conflict"
  | "PermissionDenied"
  | "PreconditionFailed"
  | "InvalidResourceId"
  | "ProviderFailure"
  | "PartialFailure";

export class CloneError extends Error {
  readonly kind: CloneErrorKind;
  /** Pipeline stage the error was raised in, if any */
  readonly stage?: string;
  cause?: unknown;

  constructor(
    kind: CloneErrorKind,
    message: string,
    options: { stage?: string; cause?: unknown } = {}
  ) {
    super(message);
    this.name = "CloneError";
    this.kind = kind;
    this.stage = options.stage;
    this.cause = options.cause;
  }
}

/**
 * Read the HTTP status code from an Azure SDK RestError (or anything shaped like one).
 */
export function getStatusCode(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "statusCode" in error) {
    return typeof error.statusCode === "number" ? error.statusCode : undefined;
  }
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getStatusCode(error) === 404;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify an arbitrary thrown value as a CloneError.
 */
export function toCloneError(error: unknown, stage?: string): CloneError {
  if (error instanceof CloneError) {
    return error;
  }

  const message = errorMessage(error);
  switch (getStatusCode(error)) {
    case 401:
      return new CloneError("Unauthenticated", message, { stage, cause: error });
    case 403:
      return new CloneError("PermissionDenied", message, { stage, cause: error });
    case 404:
      return new CloneError("NotFound", message, { stage, cause: error });
    case 409:
      return new CloneError("Conflict", message, { stage, cause: error });
    default:
      return new CloneError("ProviderFailure", message, { stage, cause: error });
  }
}
