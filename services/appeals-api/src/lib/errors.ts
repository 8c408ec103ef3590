/**
 * Maps failures at the orchestration boundary to HTTP error envelopes.
 */

import {
  RequestValidationError,
  isUpstreamCapabilityError,
  type ErrorEnvelope,
} from '@civic-appeals/shared';

export interface ErrorResponse {
  status: number;
  body: ErrorEnvelope;
}

export function toErrorResponse(error: unknown, correlationId: string): ErrorResponse {
  if (error instanceof RequestValidationError) {
    return {
      status: 400,
      body: {
        error: {
          code: 'validation_error',
          message: error.message,
          correlation_id: correlationId,
          details: error.errors,
        },
      },
    };
  }

  if (isUpstreamCapabilityError(error)) {
    return {
      status: 502,
      body: {
        error: {
          code: 'upstream_error',
          message: `The ${error.capability} provider failed (${error.kind})`,
          correlation_id: correlationId,
        },
      },
    };
  }

  return {
    status: 500,
    body: {
      error: {
        code: 'internal_error',
        message: 'Internal error while processing the request',
        correlation_id: correlationId,
      },
    },
  };
}

export function notFound(path: string, correlationId: string): ErrorResponse {
  return {
    status: 404,
    body: {
      error: {
        code: 'not_found',
        message: `No route for ${path}`,
        correlation_id: correlationId,
      },
    },
  };
}
