/**
 * Output Service Interface
 *
 * Console rendering used by command handlers, injectable for testing.
 */

export type ResultStatus = "pass" | "fail" | "warn" | "skip";

export interface IOutputService {
  /** Bold title line, optionally prefixed with an icon */
  header(title: string, icon?: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Secondary text */
  dim(message: string): void;
  newline(): void;

  /**
   * Two-column label/value listing.
   */
  table(rows: Array<[string, string]>): void;

  /**
   * One line prefixed by the status icon (✓ ✗ ⚠ —).
   */
  result(status: ResultStatus, message: string): void;

  startSpinner(message: string): void;
  succeedSpinner(message?: string): void;
  failSpinner(message?: string): void;
  stopSpinner(): void;
}
