// src/monitoring/request-log.service.ts
import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { type DestinationStream } from 'pino';

import { messageOf } from '../common/error-message';
import type { PredictionOutcome } from './metrics.registry';

/** Inject a custom sink (tests, log shippers) instead of the configured file */
export const REQUEST_LOG_SINK = Symbol('REQUEST_LOG_SINK');

export interface RequestLogEntry {
  method: string;
  endpoint: string;
  status: number;
  startedAt: Date;
  durationMs: number;
  outcome: PredictionOutcome;
  label?: string;
  confidence?: number;
  errorKind?: string;
}

/** What actually lands in the sink, one JSON object per line */
export interface RequestLogRecord {
  level: string;
  seq: number;
  timestamp: string;
  method: string;
  endpoint: string;
  status: number;
  durationMs: number;
  outcome: PredictionOutcome;
  label?: string;
  confidence?: number;
  errorKind?: string;
}

type FileDestination = ReturnType<typeof pino.destination>;

/**
 * Append-only request log. Records are JSON lines ordered by `seq`, which
 * follows call order. A broken sink never reaches the request being logged:
 * write failures are caught here, reported once through the service logger,
 * and flip `isHealthy()` so /health can say `degraded`.
 */
@Injectable()
export class RequestLogService implements OnModuleDestroy {
  private readonly logger = new Logger(RequestLogService.name);
  private readonly out: pino.Logger;
  private readonly file: FileDestination | null = null;
  private seq = 0;
  private failure: string | null = null;
  private closed = false;

  constructor(
    config: ConfigService,
    @Optional() @Inject(REQUEST_LOG_SINK) sink?: DestinationStream,
  ) {
    let destination: DestinationStream;
    if (sink) {
      destination = sink;
    } else {
      this.file = openDestination(config.get<string>('requestLog.path') ?? '-');
      this.file.on('error', (error: Error) => this.markFailed(error));
      destination = this.file;
    }

    this.out = pino(
      {
        base: null,
        timestamp: false,
        // level as a label; records carry their own timestamp
        formatters: { level: (label) => ({ level: label }) },
      },
      destination,
    );
  }

  /* ----------------------------- Public API ----------------------------- */

  append(entry: RequestLogEntry): void {
    const record: Omit<RequestLogRecord, 'level'> = {
      seq: ++this.seq,
      timestamp: entry.startedAt.toISOString(),
      method: entry.method,
      endpoint: entry.endpoint,
      status: entry.status,
      durationMs: Math.round(entry.durationMs * 100) / 100,
      outcome: entry.outcome,
      label: entry.label,
      confidence: entry.confidence,
      errorKind: entry.errorKind,
    };

    try {
      this.out.info(record);
    } catch (error) {
      this.markFailed(error);
    }
  }

  isHealthy(): boolean {
    return this.failure === null;
  }

  /** Last sink error, for the health report */
  lastError(): string | null {
    return this.failure;
  }

  /** Number of records handed to the sink so far */
  count(): number {
    return this.seq;
  }

  onModuleDestroy(): void {
    this.close();
  }

  /** Flush pending writes and release the file; a no-op for injected sinks */
  close(): void {
    if (!this.file || this.closed) return;
    this.closed = true;
    try {
      this.file.flushSync();
    } catch (error) {
      this.logger.warn(`Request log flush failed: ${messageOf(error)}`);
    }
    this.file.end();
  }

  /* ------------------------------- Helpers ------------------------------ */

  private markFailed(error: unknown): void {
    const message = messageOf(error);
    if (this.failure === null) {
      this.logger.error(
        `Request log sink failed (${message}); ` +
          'further write errors are suppressed',
      );
    }
    this.failure = message;
  }
}

function openDestination(target: string): FileDestination {
  if (target === '-') {
    return pino.destination({ dest: 1, sync: false });
  }
  return pino.destination({
    dest: target,
    append: true,
    mkdir: true,
    sync: false,
  });
}
