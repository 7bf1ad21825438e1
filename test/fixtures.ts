// Fixtures shared by unit and e2e specs: tiny model artifacts and images
// generated on the fly into temp directories.
import { createHash } from 'node:crypto';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import sharp from 'sharp';

/**
 * 8x8 RGB input, unit normalization, globalAvgPool -> dense(3->2).
 * Logits: cat = 4*r - 4*b, dog = -4*r + 4*b, with r/b the mean channel
 * in [0, 1].
 * A pure red image scores cat = 4, dog = -4.
 */
export const TEST_WEIGHTS = [4, 0, -4, -4, 0, 4, 0, 0];

export function testManifest(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    format: 'dense-classifier',
    formatVersion: 1,
    name: 'pets-test',
    version: '1.0.0',
    input: { height: 8, width: 8, channels: 3 },
    classes: ['cat', 'dog'],
    normalization: { scale: 255, mean: [0, 0, 0], std: [1, 1, 1] },
    layers: [
      { type: 'globalAvgPool' },
      { type: 'dense', units: 2, activation: 'linear' },
    ],
    weights: 'weights.bin',
    ...overrides,
  };
}

export function encodeWeights(values: readonly number[]): Buffer {
  const buf = Buffer.alloc(values.length * 4);
  values.forEach((v, i) => buf.writeFloatLE(v, i * 4));
  return buf;
}

export function sha256(buf: Buffer): string {
  return createHash('sha256').update(buf).digest('hex');
}

export interface ArtifactFiles {
  manifest?: Record<string, unknown> | string;
  weights?: Buffer;
}

export async function makeTempDir(prefix = 'classifier-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Write model.json + weights.bin into `dir` and return `dir` */
export async function writeArtifact(
  dir: string,
  files: ArtifactFiles = {},
): Promise<string> {
  const manifest = files.manifest ?? testManifest();
  const body =
    typeof manifest === 'string' ? manifest : JSON.stringify(manifest, null, 2);
  const weights = files.weights ?? encodeWeights(TEST_WEIGHTS);
  await writeFile(path.join(dir, 'model.json'), body);
  await writeFile(path.join(dir, 'weights.bin'), weights);
  return dir;
}

export interface Colour {
  r: number;
  g: number;
  b: number;
}

export const RED: Colour = { r: 255, g: 0, b: 0 };
export const BLUE: Colour = { r: 0, g: 0, b: 255 };

/** Solid-colour PNG (or JPEG) of the given size */
export async function solidImage(
  colour: Colour,
  size = 16,
  format: 'png' | 'jpeg' = 'png',
): Promise<Buffer> {
  const image = sharp({
    create: { width: size, height: size, channels: 3, background: colour },
  });
  return format === 'png'
    ? image.png().toBuffer()
    : image.jpeg({ quality: 95 }).toBuffer();
}

/** Expected top probability for logits (4, -4) */
export const STRONG_CONFIDENCE = 1 / (1 + Math.exp(-8));
