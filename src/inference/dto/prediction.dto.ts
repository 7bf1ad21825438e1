import {
  IsBoolean,
  IsIn,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

import type { InferenceErrorKind } from '../inference.errors';
import type { BatchItemResult, PredictionResult } from '../predictor.service';

/**
 * DTO for a single prediction response
 */
export class PredictResponseDto {
  @IsString()
  label!: string;

  @IsNumber()
  classIndex!: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  confidence!: number;

  @IsObject()
  probabilities!: Record<string, number>;

  @IsNumber()
  inferenceTimeMs!: number;

  @IsString()
  modelVersion!: string;

  @IsString()
  timestamp!: string;

  static from(result: PredictionResult, at = new Date()): PredictResponseDto {
    const dto = new PredictResponseDto();
    dto.label = result.label;
    dto.classIndex = result.classIndex;
    dto.confidence = result.confidence;
    dto.probabilities = { ...result.probabilities };
    dto.inferenceTimeMs = result.inferenceTimeMs;
    dto.modelVersion = result.modelVersion;
    dto.timestamp = at.toISOString();
    return dto;
  }
}

/**
 * One entry of a batch response; either `prediction` or `error` is set
 */
export class BatchItemDto {
  @IsString()
  filename!: string;

  @IsBoolean()
  ok!: boolean;

  @IsOptional()
  prediction?: PredictResponseDto;

  @IsOptional()
  @IsIn([
    'InvalidImage',
    'ModelNotReady',
    'InternalInferenceError',
    'PredictionCancelled',
  ])
  error?: InferenceErrorKind;

  @IsOptional()
  @IsString()
  message?: string;

  static from(item: BatchItemResult, at: Date): BatchItemDto {
    const dto = new BatchItemDto();
    dto.filename = item.name;
    dto.ok = item.ok;
    if (item.ok) {
      dto.prediction = PredictResponseDto.from(item.result, at);
    } else {
      dto.error = item.error.kind;
      dto.message = item.error.message;
    }
    return dto;
  }
}

export class BatchResponseDto {
  @IsNumber()
  total!: number;

  @IsNumber()
  succeeded!: number;

  results!: BatchItemDto[];
}
