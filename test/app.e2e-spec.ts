import type { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import type { DestinationStream } from 'pino';
import request from 'supertest';

import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { ModelStoreService } from '../src/model/model-store.service';
import {
  RequestLogService,
  type RequestLogRecord,
} from '../src/monitoring/request-log.service';
import {
  BLUE,
  makeTempDir,
  RED,
  removeDir,
  solidImage,
  writeArtifact,
} from './fixtures';

class MemorySink implements DestinationStream {
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  records(): RequestLogRecord[] {
    return this.lines.map((l): RequestLogRecord => JSON.parse(l));
  }
}

interface TestApp {
  app: INestApplication;
  sink: MemorySink;
}

async function createApp(env: Record<string, string>): Promise<TestApp> {
  Object.assign(process.env, env);
  const sink = new MemorySink();

  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(RequestLogService)
    .useFactory({
      factory: (config: ConfigService) => new RequestLogService(config, sink),
      inject: [ConfigService],
    })
    .compile();

  const app = configureApp(moduleRef.createNestApplication({ logger: false }));
  await app.init();
  await app.get(ModelStoreService).whenSettled();
  return { app, sink };
}

const api = (app: INestApplication) => request(app.getHttpServer());

const ENV_KEYS = [
  'MODEL_DIR',
  'MODEL_LOAD_ON_STARTUP',
  'UPLOAD_MAX_BYTES',
  'PREDICT_TIMEOUT_MS',
];

describe('Classifier API (e2e)', () => {
  let red: Buffer;
  let blue: Buffer;

  beforeAll(async () => {
    red = await solidImage(RED);
    blue = await solidImage(BLUE);
  });

  afterEach(() => {
    for (const key of ENV_KEYS) delete process.env[key];
  });

  describe('with a valid model', () => {
    let dir: string;
    let app: INestApplication;
    let sink: MemorySink;

    beforeAll(async () => {
      dir = await writeArtifact(await makeTempDir());
      ({ app, sink } = await createApp({
        MODEL_DIR: dir,
        MODEL_LOAD_ON_STARTUP: 'true',
      }));
    });

    afterAll(async () => {
      await app.close();
      await removeDir(dir);
    });

    it('GET /api/v1 lists the endpoints', async () => {
      const res = await api(app).get('/api/v1').expect(200);

      expect(res.body.service).toBe('pet-classifier-api');
      expect(res.body.endpoints.predict).toBe('/api/v1/predict');
    });

    it('GET /api/v1/health reports ready', async () => {
      const res = await api(app).get('/api/v1/health').expect(200);

      expect(res.body).toMatchObject({
        status: 'ready',
        modelLoaded: true,
        modelVersion: '1.0.0',
        error: null,
        requestLog: 'ok',
      });
    });

    it('GET /api/v1/health/live answers', async () => {
      await api(app).get('/api/v1/health/live').expect(200, { ok: true });
    });

    it('POST /api/v1/predict classifies a cat', async () => {
      const res = await api(app)
        .post('/api/v1/predict')
        .attach('file', red, 'cat.png')
        .expect(200);

      expect(res.body.label).toBe('cat');
      expect(res.body.confidence).toBeGreaterThan(0.99);
      const { cat, dog } = res.body.probabilities;
      expect(cat + dog).toBeCloseTo(1, 6);
      expect(res.body.modelVersion).toBe('1.0.0');
    });

    it('POST /api/v1/predict classifies a dog', async () => {
      const res = await api(app)
        .post('/api/v1/predict')
        .attach('file', blue, 'dog.png')
        .expect(200);

      expect(res.body.label).toBe('dog');
    });

    it('POST /api/v1/predict rejects a missing file', async () => {
      const res = await api(app).post('/api/v1/predict').expect(400);

      expect(res.body).toEqual({
        statusCode: 400,
        error: 'InvalidImage',
        message: 'No image file uploaded (field "file")',
      });
    });

    it('POST /api/v1/predict rejects a non-image content type', async () => {
      const res = await api(app)
        .post('/api/v1/predict')
        .attach('file', Buffer.from('hello'), {
          filename: 'notes.txt',
          contentType: 'text/plain',
        })
        .expect(400);

      expect(res.body).toEqual({
        statusCode: 400,
        error: 'InvalidImage',
        message: 'File must be an image',
      });
    });

    it('POST /api/v1/predict rejects bytes that do not decode', async () => {
      const res = await api(app)
        .post('/api/v1/predict')
        .attach('file', Buffer.from('this is not a png'), 'fake.png')
        .expect(400);

      expect(res.body).toEqual({
        statusCode: 400,
        error: 'InvalidImage',
        message: 'Payload is not a decodable image',
      });
    });

    it('POST /api/v1/predict/batch reports every file', async () => {
      const res = await api(app)
        .post('/api/v1/predict/batch')
        .attach('files', red, 'a.png')
        .attach('files', Buffer.from('plain text'), {
          filename: 'b.txt',
          contentType: 'text/plain',
        })
        .attach('files', blue, 'c.png')
        .expect(200);

      expect(res.body.total).toBe(3);
      expect(res.body.succeeded).toBe(2);
      const results: Array<{ filename: string; ok: boolean }> =
        res.body.results;
      expect(results.map((r) => [r.filename, r.ok])).toEqual([
        ['a.png', true],
        ['b.txt', false],
        ['c.png', true],
      ]);
      expect(res.body.results[0].prediction.label).toBe('cat');
      expect(res.body.results[1]).toMatchObject({
        error: 'InvalidImage',
        message: 'File must be an image',
      });
      expect(res.body.results[2].prediction.label).toBe('dog');
    });

    it('POST /api/v1/predict/batch rejects an empty upload', async () => {
      const res = await api(app).post('/api/v1/predict/batch').expect(400);

      expect(res.body.error).toBe('InvalidImage');
    });

    it('GET /api/v1/model-info describes the artifact', async () => {
      const res = await api(app).get('/api/v1/model-info').expect(200);

      expect(res.body).toMatchObject({
        name: 'pets-test',
        version: '1.0.0',
        classes: ['cat', 'dog'],
        input: { height: 8, width: 8, channels: 3 },
      });
    });

    it('GET /api/v1/metrics counts one more success', async () => {
      const before = await api(app).get('/api/v1/metrics/summary').expect(200);
      await api(app)
        .post('/api/v1/predict')
        .attach('file', red, 'cat.png')
        .expect(200);
      const after = await api(app).get('/api/v1/metrics/summary').expect(200);

      expect(after.body.successes).toBe(before.body.successes + 1);
      expect(after.body.predictions.cat).toBe(before.body.predictions.cat + 1);
      expect(after.body.modelLoaded).toBe(true);

      const text = await api(app).get('/api/v1/metrics').expect(200);
      const contentType = text.headers['content-type'];
      expect(contentType).toMatch(/^text\/plain;/);
      expect(contentType).toContain('version=0.0.4');
      expect(contentType).toContain('charset=utf-8');
      expect(text.text).toContain(
        'classifier_inference_requests_total{outcome="success"} ' +
          `${after.body.successes}\n`,
      );
      expect(text.text).toContain('classifier_model_loaded 1\n');
    });

    it('writes prediction requests to the request log', async () => {
      const start = sink.lines.length;
      await api(app)
        .post('/api/v1/predict')
        .attach('file', blue, 'dog.png')
        .expect(200);
      await api(app)
        .post('/api/v1/predict')
        .attach('file', Buffer.from('junk'), 'junk.png')
        .expect(400);
      await api(app).get('/api/v1/health').expect(200);

      const records = sink.records().slice(start);
      expect(records).toHaveLength(2);
      expect(records[0]).toMatchObject({
        level: 'info',
        method: 'POST',
        endpoint: '/api/v1/predict',
        status: 200,
        outcome: 'success',
        label: 'dog',
      });
      expect(records[1]).toMatchObject({
        status: 400,
        outcome: 'failure',
        errorKind: 'InvalidImage',
      });
      expect(records[1].seq).toBe(records[0].seq + 1);
    });
  });

  describe('with a tight prediction deadline', () => {
    let dir: string;
    let app: INestApplication;
    let sink: MemorySink;

    beforeAll(async () => {
      dir = await writeArtifact(await makeTempDir());
      ({ app, sink } = await createApp({
        MODEL_DIR: dir,
        MODEL_LOAD_ON_STARTUP: 'true',
        PREDICT_TIMEOUT_MS: '1',
      }));
    });

    afterAll(async () => {
      await app.close();
      await removeDir(dir);
    });

    it('answers 504 and counts the request as cancelled', async () => {
      const large = await solidImage(RED, 2000);

      const res = await api(app)
        .post('/api/v1/predict')
        .attach('file', large, 'large.png')
        .expect(504);

      expect(res.body).toEqual({
        statusCode: 504,
        error: 'PredictionCancelled',
        message: 'Prediction exceeded 1ms',
      });

      const summary = await api(app).get('/api/v1/metrics/summary').expect(200);
      expect(summary.body).toMatchObject({
        totalRequests: 1,
        successes: 0,
        errors: 0,
        cancelled: 1,
      });

      const text = await api(app).get('/api/v1/metrics').expect(200);
      expect(text.text).toContain(
        'classifier_inference_requests_total{outcome="cancelled"} 1\n',
      );
      expect(text.text).toContain(
        'classifier_http_requests_total' +
          '{method="POST",route="/api/v1/predict",status="504"} 1\n',
      );

      expect(sink.records()).toEqual([
        expect.objectContaining({
          endpoint: '/api/v1/predict',
          status: 504,
          outcome: 'cancelled',
          errorKind: 'PredictionCancelled',
        }),
      ]);
    });

    it('counts upload rejections only as HTTP requests', async () => {
      const before = await api(app).get('/api/v1/metrics/summary').expect(200);

      await api(app)
        .post('/api/v1/predict')
        .attach('file', Buffer.from('hello'), {
          filename: 'notes.txt',
          contentType: 'text/plain',
        })
        .expect(400);

      const after = await api(app).get('/api/v1/metrics/summary').expect(200);
      expect(after.body.totalRequests).toBe(before.body.totalRequests);

      const text = await api(app).get('/api/v1/metrics').expect(200);
      expect(text.text).toContain(
        'classifier_http_requests_total' +
          '{method="POST",route="/api/v1/predict",status="400"} 1\n',
      );
      expect(text.text).toContain(
        '# HELP classifier_inference_requests_total Calls into the inference ' +
          'core, by outcome; uploads rejected before decoding are only ' +
          'counted in http_requests_total\n',
      );
    });
  });

  describe('with a corrupt model', () => {
    let dir: string;
    let app: INestApplication;

    beforeAll(async () => {
      dir = await writeArtifact(await makeTempDir(), {
        manifest: '{"format": "dense-classifier"',
      });
      ({ app } = await createApp({
        MODEL_DIR: dir,
        MODEL_LOAD_ON_STARTUP: 'true',
        UPLOAD_MAX_BYTES: '1024',
      }));
    });

    afterAll(async () => {
      await app.close();
      await removeDir(dir);
    });

    it('GET /api/v1/health answers 503 with the failure', async () => {
      const res = await api(app).get('/api/v1/health').expect(503);

      expect(res.body.status).toBe('failed');
      expect(res.body.modelLoaded).toBe(false);
      expect(res.body.error).toMatch(/^manifest is not valid JSON/);
    });

    it('POST /api/v1/predict answers ModelNotReady', async () => {
      const res = await api(app)
        .post('/api/v1/predict')
        .attach('file', red, 'cat.png')
        .expect(503);

      expect(res.body).toEqual({
        statusCode: 503,
        error: 'ModelNotReady',
        message: 'Model failed to load',
      });
    });

    it('GET /api/v1/model-info answers 503', async () => {
      await api(app).get('/api/v1/model-info').expect(503);
    });

    it('POST /api/v1/predict refuses uploads over the size limit', async () => {
      const big = Buffer.alloc(4096, 0xff);
      const res = await api(app)
        .post('/api/v1/predict')
        .attach('file', big, 'big.png');

      expect(res.status).toBe(413);
      expect(res.body.error).toBe('Payload Too Large');
    });
  });

  describe('before the model is loaded', () => {
    let app: INestApplication;

    beforeAll(async () => {
      ({ app } = await createApp({
        MODEL_DIR: '/nonexistent',
        MODEL_LOAD_ON_STARTUP: 'false',
      }));
    });

    afterAll(async () => {
      await app.close();
    });

    it('GET /api/v1/health reports starting', async () => {
      const res = await api(app).get('/api/v1/health').expect(503);

      expect(res.body.status).toBe('starting');
    });

    it('POST /api/v1/predict answers ModelNotReady', async () => {
      const res = await api(app)
        .post('/api/v1/predict')
        .attach('file', red, 'cat.png')
        .expect(503);

      expect(res.body.message).toBe('Model is still loading');
    });
  });
});
