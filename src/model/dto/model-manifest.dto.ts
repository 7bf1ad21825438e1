import {
  ArrayMinSize,
  ArrayUnique,
  Equals,
  IsDefined,
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export const ARTIFACT_FORMAT = 'dense-classifier';
export const ARTIFACT_FORMAT_VERSION = 1;

export const CHANNEL_ORDERS = ['rgb', 'bgr'] as const;
export type ChannelOrder = (typeof CHANNEL_ORDERS)[number];

export const RESIZE_KERNELS = [
  'nearest',
  'cubic',
  'mitchell',
  'lanczos2',
  'lanczos3',
] as const;
export type ResizeKernel = (typeof RESIZE_KERNELS)[number];

export const LAYER_TYPES = ['flatten', 'globalAvgPool', 'dense'] as const;
export type LayerType = (typeof LAYER_TYPES)[number];

export const ACTIVATIONS = ['linear', 'relu'] as const;
export type Activation = (typeof ACTIVATIONS)[number];

/**
 * Spatial shape and colour layout the network was trained on
 */
export class InputSpecDto {
  @IsInt()
  @Min(1)
  @Max(4096)
  height!: number;

  @IsInt()
  @Min(1)
  @Max(4096)
  width!: number;

  @IsIn([1, 3])
  channels!: 1 | 3;

  @IsIn(CHANNEL_ORDERS)
  channelOrder: ChannelOrder = 'rgb';

  @IsIn(RESIZE_KERNELS)
  resizeKernel: ResizeKernel = 'lanczos3';
}

/**
 * Pixel normalization written by the training job.
 * value = (pixel / scale - mean[c]) / std[c]
 */
export class NormalizationDto {
  @IsNumber()
  @IsPositive()
  scale: number = 255;

  @IsArray()
  @ArrayMinSize(1)
  @IsNumber({}, { each: true })
  mean!: number[];

  @IsArray()
  @ArrayMinSize(1)
  @IsNumber({}, { each: true })
  @IsPositive({ each: true })
  std!: number[];
}

export class LayerDto {
  @IsIn(LAYER_TYPES)
  type!: LayerType;

  // dense only
  @IsOptional()
  @IsInt()
  @Min(1)
  units?: number;

  @IsOptional()
  @IsIn(ACTIVATIONS)
  activation?: Activation;
}

/**
 * model.json: the descriptor that sits beside the weights blob
 */
export class ModelManifestDto {
  @Equals(ARTIFACT_FORMAT)
  format!: string;

  @Equals(ARTIFACT_FORMAT_VERSION)
  formatVersion!: number;

  @IsString()
  name!: string;

  @IsString()
  version!: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => InputSpecDto)
  input!: InputSpecDto;

  @IsArray()
  @ArrayMinSize(2)
  @ArrayUnique()
  @IsString({ each: true })
  classes!: string[];

  @IsDefined()
  @ValidateNested()
  @Type(() => NormalizationDto)
  normalization!: NormalizationDto;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => LayerDto)
  layers!: LayerDto[];

  @IsString()
  weights!: string;

  @IsOptional()
  @Matches(/^[a-f0-9]{64}$/, {
    message: 'weightsSha256 must be a lowercase hex SHA-256 digest',
  })
  weightsSha256?: string;
}
