import {
  type InferenceError,
  InternalInferenceError,
  InvalidImageError,
  ModelNotReadyError,
  PredictionCancelledError,
  toHttpException,
} from './inference.errors';

describe('toHttpException', () => {
  const cases: Array<[InferenceError, number, string, string]> = [
    [new InvalidImageError('bad bytes'), 400, 'InvalidImage', 'bad bytes'],
    [new ModelNotReadyError(), 503, 'ModelNotReady', 'Model is not loaded'],
    [
      new PredictionCancelledError(),
      504,
      'PredictionCancelled',
      'Prediction was cancelled',
    ],
    [
      new InternalInferenceError(new Error('stack trace with /srv/path')),
      500,
      'InternalInferenceError',
      'Prediction failed due to an internal error',
    ],
  ];

  it.each(cases)('maps %s to %i', (error, status, kind, message) => {
    const http = toHttpException(error);

    expect(http.getStatus()).toBe(status);
    expect(http.getResponse()).toEqual({
      statusCode: status,
      error: kind,
      message,
    });
  });

  it('keeps the original failure as the cause of an internal error', () => {
    const cause = new Error('boom');
    expect(new InternalInferenceError(cause).cause).toBe(cause);
  });

  it('names errors after their class', () => {
    expect(new InvalidImageError('x').name).toBe('InvalidImageError');
  });
});
