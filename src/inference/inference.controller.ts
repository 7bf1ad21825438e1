// src/inference/inference.controller.ts
import {
  Controller,
  Get,
  HttpCode,
  Post,
  Res,
  UploadedFile,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileInterceptor, FilesInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';

import {
  ModelStoreService,
  type ModelInfo,
} from '../model/model-store.service';
import {
  LogRequests,
  type PredictionSummary,
} from '../monitoring/request-log.interceptor';
import {
  BatchItemDto,
  BatchResponseDto,
  PredictResponseDto,
} from './dto/prediction.dto';
import {
  InvalidImageError,
  isInferenceError,
  toHttpException,
} from './inference.errors';
import { PredictorService, type BatchItemResult } from './predictor.service';
import { requestSignal } from './request-signal';

/**
 * Prediction endpoints. Upload validation happens here, everything else is
 * the Predictor's job; core errors are translated to HTTP on the way out.
 */
@Controller()
export class InferenceController {
  private readonly timeoutMs: number;

  constructor(
    private readonly predictor: PredictorService,
    private readonly store: ModelStoreService,
    config: ConfigService,
  ) {
    this.timeoutMs = config.get<number>('predict.timeoutMs') ?? 10_000;
  }

  /**
   * POST /predict
   * Body: multipart/form-data with one image under `file`
   * Returns: { label, confidence, probabilities, ... }
   */
  @Post('predict')
  @HttpCode(200)
  @LogRequests()
  @UseInterceptors(FileInterceptor('file'))
  async predict(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Res({ passthrough: true }) res: Response,
  ): Promise<PredictResponseDto> {
    const { signal, dispose } = requestSignal(res, this.timeoutMs);
    try {
      assertImageUpload(file);
      const result = await this.predictor.predict(file.buffer, { signal });
      const summary: PredictionSummary = {
        label: result.label,
        confidence: result.confidence,
      };
      res.locals.prediction = summary;
      return PredictResponseDto.from(result);
    } catch (error) {
      throw isInferenceError(error) ? toHttpException(error) : error;
    } finally {
      dispose();
    }
  }

  /**
   * POST /predict/batch
   * Body: multipart/form-data with images under `files`
   * Returns one entry per file; a bad file does not fail the batch.
   */
  @Post('predict/batch')
  @HttpCode(200)
  @LogRequests()
  @UseInterceptors(FilesInterceptor('files'))
  async predictBatch(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Res({ passthrough: true }) res: Response,
  ): Promise<BatchResponseDto> {
    if (!files?.length) {
      throw toHttpException(
        new InvalidImageError('No image files uploaded (field "files")'),
      );
    }

    const { signal, dispose } = requestSignal(res, this.timeoutMs);
    try {
      const at = new Date();
      const accepted = files.filter((f) => isImageMime(f.mimetype));
      const results = await this.predictor.predictBatch(
        accepted.map((f) => ({ name: f.originalname, bytes: f.buffer })),
        { signal },
      );

      // non-image parts are reported in place, without reaching the core
      const byFile = new Map(
        accepted.map((f, i): [Express.Multer.File, BatchItemResult] => [
          f,
          results[i],
        ]),
      );
      const items = files.map((f) =>
        BatchItemDto.from(byFile.get(f) ?? notAnImage(f.originalname), at),
      );

      const body = new BatchResponseDto();
      body.total = items.length;
      body.succeeded = items.filter((i) => i.ok).length;
      body.results = items;
      return body;
    } finally {
      dispose();
    }
  }

  /**
   * GET /model-info
   * Metadata of the loaded artifact; 503 until the model is ready.
   */
  @Get('model-info')
  modelInfo(): ModelInfo {
    try {
      return this.store.info();
    } catch (error) {
      throw isInferenceError(error) ? toHttpException(error) : error;
    }
  }
}

/* ------------------------------- Helpers ------------------------------ */

function isImageMime(mime: string | undefined): boolean {
  return typeof mime === 'string' && mime.toLowerCase().startsWith('image/');
}

function notAnImage(name: string): BatchItemResult {
  return {
    name,
    ok: false,
    error: { kind: 'InvalidImage', message: 'File must be an image' },
  };
}

function assertImageUpload(
  file: Express.Multer.File | undefined,
): asserts file is Express.Multer.File {
  if (!file) {
    throw new InvalidImageError('No image file uploaded (field "file")');
  }
  if (!isImageMime(file.mimetype)) {
    throw new InvalidImageError('File must be an image');
  }
}
