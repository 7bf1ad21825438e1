// src/inference/inference.errors.ts
import {
  BadRequestException,
  GatewayTimeoutException,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  ServiceUnavailableException,
} from '@nestjs/common';

export type InferenceErrorKind =
  | 'InvalidImage'
  | 'ModelNotReady'
  | 'InternalInferenceError'
  | 'PredictionCancelled';

/**
 * Base class for every failure the inference core reports.
 * Anything below the Predictor is reclassified into one of these before it
 * reaches the HTTP layer.
 */
export abstract class InferenceError extends Error {
  abstract readonly kind: InferenceErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Payload could not be decoded as a supported image. Client error. */
export class InvalidImageError extends InferenceError {
  readonly kind = 'InvalidImage' as const;
}

/** The model artifact is still loading or failed to load. */
export class ModelNotReadyError extends InferenceError {
  readonly kind = 'ModelNotReady' as const;

  constructor(message = 'Model is not loaded') {
    super(message);
  }
}

/**
 * Unexpected failure inside transform or the forward pass.
 * `message` is what callers see; the original error stays in `cause` for the
 * server-side log.
 */
export class InternalInferenceError extends InferenceError {
  readonly kind = 'InternalInferenceError' as const;

  constructor(cause?: unknown) {
    super('Prediction failed due to an internal error', { cause });
  }
}

/** The caller abandoned the request (timeout or disconnect). */
export class PredictionCancelledError extends InferenceError {
  readonly kind = 'PredictionCancelled' as const;

  constructor(reason = 'Prediction was cancelled') {
    super(reason);
  }
}

export function isInferenceError(error: unknown): error is InferenceError {
  return error instanceof InferenceError;
}

/* ------------------------- HTTP translation ------------------------- */

/**
 * Map a core failure onto the HTTP response the client sees.
 * Internal errors keep an opaque message; their detail is logged elsewhere.
 */
export function toHttpException(error: InferenceError): HttpException {
  const body = (statusCode: HttpStatus) => ({
    statusCode,
    error: error.kind,
    message: error.message,
  });

  switch (error.kind) {
    case 'InvalidImage':
      return new BadRequestException(body(HttpStatus.BAD_REQUEST));
    case 'ModelNotReady':
      return new ServiceUnavailableException(
        body(HttpStatus.SERVICE_UNAVAILABLE),
      );
    case 'PredictionCancelled':
      return new GatewayTimeoutException(body(HttpStatus.GATEWAY_TIMEOUT));
    case 'InternalInferenceError':
      return new InternalServerErrorException(
        body(HttpStatus.INTERNAL_SERVER_ERROR),
      );
  }
}
