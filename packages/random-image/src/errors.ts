export type RandomImageErrorCode = 'INVALID_CONFIG' | 'REVISION_ACCESS';

/**
 * Structured error used by the random image plugin and by host adapters.
 *
 * Consumers should prefer checking `error.code` over `instanceof` for resilience
 * across package boundaries and bundling scenarios.
 */
export class RandomImageError extends Error {
  readonly code: RandomImageErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: RandomImageErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RandomImageError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, RandomImageError.prototype);
  }
}
