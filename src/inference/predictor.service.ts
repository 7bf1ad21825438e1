// src/inference/predictor.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter, setMaxListeners } from 'node:events';
import { performance } from 'node:perf_hooks';

import { messageOf } from '../common/error-message';
import { ModelStoreService } from '../model/model-store.service';
import {
  MetricsRegistry,
  type PredictionEvent,
} from '../monitoring/metrics.registry';
import { ImageTransformService } from './image-transform.service';
import {
  InferenceError,
  InternalInferenceError,
  ModelNotReadyError,
  PredictionCancelledError,
} from './inference.errors';

export interface PredictionResult {
  readonly label: string;
  readonly classIndex: number;
  readonly confidence: number;
  readonly probabilities: Readonly<Record<string, number>>;
  readonly inferenceTimeMs: number;
  readonly modelVersion: string;
}

export interface PredictOptions {
  signal?: AbortSignal;
}

export interface BatchItem {
  name: string;
  bytes: Buffer;
}

export type BatchItemResult =
  | { name: string; ok: true; result: PredictionResult }
  | {
      name: string;
      ok: false;
      error: { kind: InferenceError['kind']; message: string };
    };

/**
 * Raw image bytes -> PredictionResult.
 *
 * ImageTransform and ModelStore failures are reclassified here; nothing else
 * leaks upward. Each call records exactly one outcome in the metrics
 * registry. There are no retries.
 */
@Injectable()
export class PredictorService {
  private readonly logger = new Logger(PredictorService.name);

  constructor(
    private readonly store: ModelStoreService,
    private readonly transform: ImageTransformService,
    private readonly metrics: MetricsRegistry,
  ) {}

  async predict(
    bytes: Buffer,
    options: PredictOptions = {},
  ): Promise<PredictionResult> {
    const { signal } = options;
    const started = performance.now();

    try {
      const result = await this.run(bytes, signal, started);
      // late abort: the caller is gone, so this must not count as a success
      throwIfAborted(signal);
      this.record({
        outcome: 'success',
        latencySeconds: elapsedSeconds(started),
        label: result.label,
      });
      return result;
    } catch (error) {
      const failure = this.classify(error);
      const cancelled = failure instanceof PredictionCancelledError;
      this.record({
        outcome: cancelled ? 'cancelled' : 'failure',
        latencySeconds: elapsedSeconds(started),
        errorKind: failure.kind,
      });
      throw failure;
    }
  }

  /**
   * Predict every item concurrently. One bad image never fails the batch;
   * each entry carries its own result or error.
   */
  async predictBatch(
    items: BatchItem[],
    options: PredictOptions = {},
  ): Promise<BatchItemResult[]> {
    // every item listens on the shared signal while it decodes
    const { signal } = options;
    if (signal && items.length >= EventEmitter.defaultMaxListeners) {
      setMaxListeners(items.length + EventEmitter.defaultMaxListeners, signal);
    }

    const settled = await Promise.allSettled(
      items.map((item) => this.predict(item.bytes, options)),
    );

    return settled.map((outcome, i): BatchItemResult => {
      const name = items[i].name;
      if (outcome.status === 'fulfilled') {
        return { name, ok: true, result: outcome.value };
      }
      // predict() only ever rejects with an InferenceError
      const failure = this.classify(outcome.reason);
      const { kind, message } = failure;
      return { name, ok: false, error: { kind, message } };
    });
  }

  /* ------------------------------- Helpers ------------------------------ */

  private async run(
    bytes: Buffer,
    signal: AbortSignal | undefined,
    started: number,
  ): Promise<PredictionResult> {
    if (!this.store.isReady()) {
      throw new ModelNotReadyError(
        this.store.status() === 'failed'
          ? 'Model failed to load'
          : 'Model is still loading',
      );
    }
    throwIfAborted(signal);

    const input = this.store.inputSpec();
    const normalization = this.store.normalization();
    const tensor = await raceAbort(
      this.transform.transform(bytes, input, normalization),
      signal,
    );
    throwIfAborted(signal);

    const logits = this.store.predict(tensor);
    const probs = softmax(logits);
    const classes = this.store.classes();
    if (probs.length !== classes.length) {
      throw new Error(
        `Model returned ${probs.length} scores for ${classes.length} classes`,
      );
    }

    const classIndex = argmax(probs);
    const probabilities: Record<string, number> = {};
    classes.forEach((label, i) => {
      probabilities[label] = probs[i];
    });

    return Object.freeze({
      label: classes[classIndex],
      classIndex,
      confidence: probs[classIndex],
      probabilities: Object.freeze(probabilities),
      inferenceTimeMs: Math.round((performance.now() - started) * 100) / 100,
      modelVersion: this.store.version(),
    });
  }

  /** Anything not already an InferenceError becomes an opaque internal one */
  private classify(error: unknown): InferenceError {
    if (error instanceof InferenceError) return error;

    const stack = error instanceof Error ? error.stack : undefined;
    this.logger.error(`Internal inference error: ${messageOf(error)}`, stack);
    return new InternalInferenceError(error);
  }

  /** Metrics must never break the request path */
  private record(event: PredictionEvent): void {
    try {
      this.metrics.recordPrediction(event);
    } catch (error) {
      this.logger.warn(
        `Failed to record prediction metrics: ${messageOf(error)}`,
      );
    }
  }
}

/* ------------------------------- Numerics ------------------------------ */

/**
 * Numerically stable softmax over raw logits, in float64.
 * Output sums to 1 within rounding.
 */
export function softmax(logits: ArrayLike<number>): number[] {
  if (logits.length === 0) return [];
  let max = -Infinity;
  for (let i = 0; i < logits.length; i++) {
    if (!Number.isFinite(logits[i])) throw new Error(
      `Non-finite logit at index ${i}`,
    );
    if (logits[i] > max) max = logits[i];
  }

  const exps = new Array<number>(logits.length);
  let sum = 0;
  for (let i = 0; i < logits.length; i++) {
    exps[i] = Math.exp(logits[i] - max);
    sum += exps[i];
  }
  return exps.map((e) => e / sum);
}

/** Index of the largest value; first one wins on ties */
export function argmax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

/* ------------------------------- Abort -------------------------------- */

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PredictionCancelledError(abortReason(signal));
  }
}

/**
 * Settle with `work`, or reject as soon as `signal` aborts. The work itself
 * keeps running (sharp can't be interrupted) but its result is dropped.
 */
function raceAbort<T>(
  work: Promise<T>,
  signal: AbortSignal | undefined,
): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) return Promise.reject(
    new PredictionCancelledError(abortReason(signal)),
  );

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(
      new PredictionCancelledError(abortReason(signal)),
    );
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string' && reason) return reason;
  if (
    reason instanceof Error &&
    reason.name !== 'AbortError' &&
    reason.message
  ) {
    return reason.message;
  }
  return 'Prediction was cancelled';
}

function elapsedSeconds(started: number): number {
  return (performance.now() - started) / 1000;
}
