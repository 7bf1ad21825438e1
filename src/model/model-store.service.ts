// src/model/model-store.service.ts
import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { ModelConfig } from '../config/configuration';
import { ModelNotReadyError } from '../inference/inference.errors';
import { messageOf } from '../common/error-message';
import {
  ArtifactLoadError,
  loadArtifact,
  type LoadedArtifact,
} from './model-artifact';
import type { InputSpecDto, NormalizationDto } from './dto/model-manifest.dto';
import type { Tensor } from './model-network';

export type ModelStatus = 'starting' | 'ready' | 'failed';

export interface ModelInfo {
  name: string;
  version: string;
  format: string;
  formatVersion: number;
  input: {
    height: number;
    width: number;
    channels: number;
    channelOrder: string;
  };
  classes: string[];
  layers: string[];
  directory: string;
  loadedAt: string;
}

/**
 * Owns the trained model for the lifetime of the process.
 *
 * status: starting -> ready | failed, exactly once. A failed load is terminal;
 * nothing a request does moves the store out of `ready`.
 */
@Injectable()
export class ModelStoreService implements OnApplicationBootstrap {
  private readonly logger = new Logger(ModelStoreService.name);
  private readonly location: ModelConfig;

  private current: ModelStatus = 'starting';
  private artifact: LoadedArtifact | null = null;
  private failureCause: string | null = null;
  private loading: Promise<ModelStatus> | null = null;

  constructor(config: ConfigService) {
    this.location = config.getOrThrow<ModelConfig>('model');
  }

  /**
   * Kick off the load without holding up bootstrap, so the HTTP server can
   * answer /health with `starting` while the weights are read.
   */
  onApplicationBootstrap(): void {
    if (this.location.loadOnStartup) {
      this.loading = this.load();
    }
  }

  /* ----------------------------- Public API ----------------------------- */

  /**
   * Read the artifact once. Never rejects: failures land in `failed` status
   * with the cause kept for /health. Repeat calls share the first attempt.
   */
  load(): Promise<ModelStatus> {
    this.loading ??= this.doLoad();
    return this.loading;
  }

  /** Resolves once the first load attempt settles; `starting` if none began. */
  async whenSettled(): Promise<ModelStatus> {
    return this.loading ?? this.current;
  }

  status(): ModelStatus {
    return this.current;
  }

  isReady(): boolean {
    return this.current === 'ready';
  }

  failure(): string | null {
    return this.failureCause;
  }

  inputSpec(): Readonly<InputSpecDto> {
    return this.require().manifest.input;
  }

  normalization(): Readonly<NormalizationDto> {
    return this.require().manifest.normalization;
  }

  classes(): readonly string[] {
    return this.require().manifest.classes;
  }

  version(): string {
    return this.require().manifest.version;
  }

  info(): ModelInfo {
    const { manifest, network, directory, loadedAt } = this.require();
    return {
      name: manifest.name,
      version: manifest.version,
      format: manifest.format,
      formatVersion: manifest.formatVersion,
      input: {
        height: manifest.input.height,
        width: manifest.input.width,
        channels: manifest.input.channels,
        channelOrder: manifest.input.channelOrder,
      },
      classes: [...manifest.classes],
      layers: network.describe(),
      directory,
      loadedAt: loadedAt.toISOString(),
    };
  }

  /**
   * Raw logits for one tensor. Only the Predictor calls this.
   * The network is read-only, so concurrent callers never see each other's
   * intermediate buffers.
   */
  predict(tensor: Tensor): Float32Array {
    return this.require().network.forward(tensor);
  }

  /* ------------------------------- Helpers ------------------------------ */

  private require(): LoadedArtifact {
    if (this.current !== 'ready' || !this.artifact) {
      throw new ModelNotReadyError(
        this.current === 'failed'
          ? 'Model failed to load'
          : 'Model is still loading',
      );
    }
    return this.artifact;
  }

  private async doLoad(): Promise<ModelStatus> {
    const started = Date.now();
    this.logger.log(`Loading model artifact from ${this.location.dir}`);

    try {
      const artifact = await loadArtifact({
        dir: this.location.dir,
        manifest: this.location.manifest,
        expectedClasses: this.location.expectedClasses,
      });
      this.artifact = artifact;
      this.current = 'ready';
      const { name, version, classes } = artifact.manifest;
      this.logger.log(
        `Model ${name}@${version} ready in ${Date.now() - started}ms ` +
          `(${classes.join('/')})`,
      );
    } catch (error) {
      this.failureCause = messageOf(error);
      this.current = 'failed';
      if (error instanceof ArtifactLoadError) {
        this.logger.error(`Model load failed: ${this.failureCause}`);
      } else {
        this.logger.error(
          `Model load failed unexpectedly: ${this.failureCause}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
    }
    return this.current;
  }
}
