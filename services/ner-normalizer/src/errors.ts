/**
 * Raised when the tagger's entity lists and probability table disagree, or a
 * mutation result is missing its mutation layer. These are defects in the
 * upstream contract, not conditions callers are expected to recover from.
 */
export class AnnotationContractError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "AnnotationContractError";
    this.details = details;
  }
}

export function isAnnotationContractError(
  error: unknown,
): error is AnnotationContractError {
  return error instanceof AnnotationContractError;
}
