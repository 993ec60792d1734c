export type ViewportConfigErrorCode =
  | "child-count"
  | "grid-dimensions"
  | "grid-overfull"
  | "grid-underfull"
  | "invalid-config";

/**
 * Raised when a viewport or grid is configured in a way it cannot recover from.
 *
 * These are thrown at construction/population time and are never produced while
 * handling input.
 */
export class ViewportConfigError extends Error {
  readonly code: ViewportConfigErrorCode;

  constructor(code: ViewportConfigErrorCode, message: string) {
    super(message);
    this.name = "ViewportConfigError";
    this.code = code;
  }
}

export class ViewportStateError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ViewportStateError";
    this.issues = issues;
  }
}
