import { ConfigService } from '@nestjs/config';
import type { DestinationStream } from 'pino';

import { makeTempDir, removeDir, writeArtifact } from '../../test/fixtures';
import { ModelStoreService } from '../model/model-store.service';
import { MetricsRegistry } from '../monitoring/metrics.registry';
import { RequestLogService } from '../monitoring/request-log.service';
import { HealthService } from './health.service';

class SwitchableSink implements DestinationStream {
  broken = false;

  write(): void {
    if (this.broken) throw new Error('sink unavailable');
  }
}

describe('HealthService', () => {
  let dir: string;
  let config: ConfigService;
  let store: ModelStoreService;
  let sink: SwitchableSink;
  let requestLog: RequestLogService;
  let metrics: MetricsRegistry;
  let health: HealthService;

  beforeEach(async () => {
    dir = await makeTempDir();
    config = new ConfigService({
      model: {
        dir,
        manifest: 'model.json',
        expectedClasses: ['cat', 'dog'],
        loadOnStartup: false,
      },
      metrics: { prefix: 'classifier_' },
    });
    store = new ModelStoreService(config);
    sink = new SwitchableSink();
    requestLog = new RequestLogService(config, sink);
    metrics = new MetricsRegistry(config);
    health = new HealthService(store, requestLog, metrics);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const breakRequestLog = () => {
    sink.broken = true;
    requestLog.append({
      method: 'POST',
      endpoint: '/api/v1/predict',
      status: 200,
      startedAt: new Date(),
      durationMs: 1,
      outcome: 'success',
    });
  };

  it('moves from starting to ready', async () => {
    await writeArtifact(dir);

    expect(health.state()).toBe('starting');
    expect(health.isServing()).toBe(false);

    await store.load();

    expect(health.state()).toBe('ready');
    expect(health.isServing()).toBe(true);
  });

  it('reports failed after a corrupt artifact, with the cause', async () => {
    await writeArtifact(dir, { manifest: '{' });
    await store.load();

    const report = health.report();
    expect(report.status).toBe('failed');
    expect(report.modelLoaded).toBe(false);
    expect(report.modelVersion).toBeNull();
    expect(report.error).toMatch(/^manifest is not valid JSON/);
    expect(health.isServing(report.status)).toBe(false);
  });

  it('degrades, but keeps serving, when the request log fails', async () => {
    await writeArtifact(dir);
    await store.load();
    breakRequestLog();

    const report = health.report();
    expect(report.status).toBe('degraded');
    expect(report.requestLog).toBe('failing');
    expect(report.error).toBe('sink unavailable');
    expect(health.isServing(report.status)).toBe(true);
  });

  it('stays starting when the log fails before the model loads', () => {
    breakRequestLog();

    expect(health.state()).toBe('starting');
  });

  it('fills the report for a healthy service', async () => {
    await writeArtifact(dir);
    await store.load();
    const now = new Date(Date.now() + 5000);

    expect(health.report(now)).toEqual({
      status: 'ready',
      modelLoaded: true,
      modelVersion: '1.0.0',
      error: null,
      requestLog: 'ok',
      uptimeSeconds: 5,
      timestamp: now.toISOString(),
    });
  });

  it('publishes model_loaded and the class series at scrape time', async () => {
    expect(metrics.snapshot()).toContain('classifier_model_loaded 0\n');

    await writeArtifact(dir);
    await store.load();

    const text = metrics.snapshot();
    expect(text).toContain('classifier_model_loaded 1\n');
    expect(text).toContain('classifier_predictions_total{class="cat"} 0\n');
    expect(text).toContain('classifier_predictions_total{class="dog"} 0\n');
  });
});
