// src/inference/request-signal.ts

/** The part of an Express response the signal listens to */
export interface ClosableResponse {
  readonly writableEnded: boolean;
  on(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

export interface RequestSignal {
  signal: AbortSignal;
  /** Stop the timer and listeners once the handler is done */
  dispose(): void;
}

/**
 * AbortSignal that fires when the request outlives `timeoutMs` or the client
 * hangs up before we answered.
 */
export function requestSignal(
  res: ClosableResponse,
  timeoutMs: number,
): RequestSignal {
  const controller = new AbortController();

  const timer =
    timeoutMs > 0
      ? setTimeout(
          () =>
            controller.abort(new Error(`Prediction exceeded ${timeoutMs}ms`)),
          timeoutMs,
        )
      : null;

  const onClose = () => {
    if (!res.writableEnded) controller.abort(new Error('Client disconnected'));
  };
  res.on('close', onClose);

  return {
    signal: controller.signal,
    dispose() {
      if (timer) clearTimeout(timer);
      res.off('close', onClose);
    },
  };
}
