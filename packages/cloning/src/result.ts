import { CloneError, toCloneError } from "./errors";

/**
 * Outcome of a single workflow step.
 */
export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CloneError };

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: CloneError): StageResult<T> {
  return { ok: false, error };
}

/**
 * Run an async operation and capture any thrown error as a failed result.
 */
export async function attempt<T>(
  stage: string,
  operation: () => Promise<T>
): Promise<StageResult<T>> {
  try {
    return ok(await operation());
  } catch (error: unknown) {
    return fail(toCloneError(error, stage));
  }
}
