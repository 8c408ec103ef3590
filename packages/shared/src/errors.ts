/**
 * Error Types
 *
 * Failures that cross the orchestration boundary. Degraded classifications and
 * routing fallbacks are not errors and never reach this module.
 */

export type UpstreamCapability = 'embedding' | 'generation';

export type UpstreamFailureKind = 'empty_completion' | 'malformed_completion' | 'request_failed';

/**
 * Raised when the embedding or generative provider fails or returns nothing usable.
 */
export class UpstreamCapabilityError extends Error {
  readonly capability: UpstreamCapability;
  readonly kind: UpstreamFailureKind;

  constructor(capability: UpstreamCapability, kind: UpstreamFailureKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'UpstreamCapabilityError';
    this.capability = capability;
    this.kind = kind;
  }
}

/**
 * Raised when an inbound request body fails its JSON schema.
 */
export class RequestValidationError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[]) {
    super(message);
    this.name = 'RequestValidationError';
    this.errors = errors;
  }
}

export function isUpstreamCapabilityError(error: unknown): error is UpstreamCapabilityError {
  return error instanceof UpstreamCapabilityError;
}
