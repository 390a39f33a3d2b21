export type InferenceErrorKind =
  | 'rate_limited'
  | 'timeout'
  | 'invalid_response'
  | 'unavailable';

/**
 * Failure reported by an InferenceCapability. Every kind is retryable from
 * the extractor's point of view.
 */
export class InferenceError extends Error {
  constructor(
    readonly kind: InferenceErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'InferenceError';
  }
}
