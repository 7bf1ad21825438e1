// src/model/model-artifact.ts
import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { plainToInstance } from 'class-transformer';
import { validate, type ValidationError } from 'class-validator';

import { messageOf } from '../common/error-message';
import { ModelManifestDto } from './dto/model-manifest.dto';
import { compileNetwork, ModelNetwork } from './model-network';

/**
 * A model artifact that passed every load-time check.
 * Both the manifest and the network are frozen for the process lifetime.
 */
export interface LoadedArtifact {
  readonly manifest: Readonly<ModelManifestDto>;
  readonly network: ModelNetwork;
  readonly directory: string;
  readonly loadedAt: Date;
}

/** Why an artifact was rejected. Message is safe to surface on /health. */
export class ArtifactLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArtifactLoadError';
  }
}

export interface ArtifactLocation {
  dir: string;
  manifest: string;
  expectedClasses?: readonly string[];
}

/**
 * Read model.json + weights, validate them against each other and build the
 * network. Throws ArtifactLoadError for anything a training job could have
 * got wrong.
 */
export async function loadArtifact(
  location: ArtifactLocation,
): Promise<LoadedArtifact> {
  const directory = path.resolve(location.dir);
  const manifestPath = path.join(directory, location.manifest);

  const manifest = await readManifest(manifestPath);
  const { input, normalization } = manifest;

  const { mean, std } = normalization;
  if (mean.length !== input.channels || std.length !== input.channels) {
    throw new ArtifactLoadError(
      `normalization needs ${input.channels} mean/std values, ` +
        `got ${mean.length}/${std.length}`,
    );
  }

  const expected = location.expectedClasses;
  if (expected && !sameOrder(manifest.classes, expected)) {
    throw new ArtifactLoadError(
      `artifact classes [${manifest.classes.join(', ')}] ` +
        `do not match expected [${expected.join(', ')}]`,
    );
  }

  const weightsPath = path.join(directory, manifest.weights);
  const blob = await readBytes(weightsPath, 'weights');

  if (manifest.weightsSha256) {
    const digest = createHash('sha256').update(blob).digest('hex');
    if (digest !== manifest.weightsSha256) {
      throw new ArtifactLoadError(
        `weights checksum mismatch ` +
          `(expected ${manifest.weightsSha256}, got ${digest})`,
      );
    }
  }

  const params = decodeFloat32(blob);

  let network: ModelNetwork;
  try {
    network = compileNetwork(
      manifest.layers,
      [input.height, input.width, input.channels],
      params,
    );
  } catch (error) {
    throw new ArtifactLoadError(`invalid layer stack: ${messageOf(error)}`, {
      cause: error,
    });
  }

  if (network.outputSize !== manifest.classes.length) {
    throw new ArtifactLoadError(
      `network produces ${network.outputSize} outputs ` +
        `for ${manifest.classes.length} classes`,
    );
  }

  deepFreeze(manifest);
  return Object.freeze({ manifest, network, directory, loadedAt: new Date() });
}

/* ------------------------------- Helpers ------------------------------ */

async function readManifest(manifestPath: string): Promise<ModelManifestDto> {
  const raw = await readBytes(manifestPath, 'manifest');

  let plain: unknown;
  try {
    plain = JSON.parse(raw.toString('utf8'));
  } catch (error) {
    throw new ArtifactLoadError(
      `manifest is not valid JSON: ${messageOf(error)}`,
      { cause: error },
    );
  }
  if (!plain || typeof plain !== 'object' || Array.isArray(plain)) {
    throw new ArtifactLoadError('manifest must be a JSON object');
  }

  const manifest = plainToInstance(ModelManifestDto, plain);
  const errors = await validate(manifest, { forbidUnknownValues: true });
  if (errors.length) {
    throw new ArtifactLoadError(
      `manifest failed validation: ${flattenErrors(errors).join('; ')}`,
    );
  }
  return manifest;
}

async function readBytes(file: string, what: string): Promise<Buffer> {
  try {
    return await readFile(file);
  } catch (error) {
    throw new ArtifactLoadError(
      `cannot read ${what} file ${file}: ${messageOf(error)}`,
      { cause: error },
    );
  }
}

/** Little-endian float32 regardless of host byte order */
function decodeFloat32(blob: Buffer): Float32Array {
  if (blob.length % 4 !== 0) {
    throw new ArtifactLoadError(
      `weights file length ${blob.length} is not a multiple of 4`,
    );
  }
  const out = new Float32Array(blob.length / 4);
  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
  for (let i = 0; i < out.length; i++) {
    out[i] = view.getFloat32(i * 4, true);
  }
  for (const v of out) {
    if (!Number.isFinite(v)) {
      throw new ArtifactLoadError('weights contain NaN or Infinity');
    }
  }
  return out;
}

function flattenErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((e) => {
    const prop = parent ? `${parent}.${e.property}` : e.property;
    const own = Object.values(e.constraints ?? {}).map(
      (msg) => `${prop}: ${msg}`,
    );
    return [...own, ...flattenErrors(e.children ?? [], prop)];
  });
}

function sameOrder(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
