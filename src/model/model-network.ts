// src/model/model-network.ts
import type { Activation, LayerDto } from './dto/model-manifest.dto';

/** HWC float tensor; `data.length === height * width * channels` */
export interface Tensor {
  readonly shape: readonly [height: number, width: number, channels: number];
  readonly data: Float32Array;
}

export type CompiledLayer =
  | {
      readonly type: 'flatten';
      readonly inputs: number;
      readonly outputs: number;
    }
  | {
      readonly type: 'globalAvgPool';
      readonly inputs: number;
      readonly outputs: number;
      readonly pixels: number;
      readonly channels: number;
    }
  | {
      readonly type: 'dense';
      readonly inputs: number;
      readonly outputs: number;
      readonly activation: Activation;
      readonly weights: Float32Array; // outputs x inputs, row-major
      readonly bias: Float32Array;
    };

export class ShapeMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeMismatchError';
  }
}

/**
 * Number of float32 values the weights blob must hold for this layer stack.
 * Throws ShapeMismatchError when the layers don't chain.
 */
export function parameterCount(
  layers: readonly LayerDto[],
  inputShape: readonly [number, number, number],
): number {
  let total = 0;
  walkLayers(layers, inputShape, (layer, inputs) => {
    if (layer.type === 'dense') {
      const units = denseUnits(layer);
      total += units * inputs + units;
    }
  });
  return total;
}

/**
 * Bind the manifest's layer list to the weights blob.
 * The returned network only ever reads `params`; every forward pass works on
 * buffers it allocates itself.
 */
export function compileNetwork(
  layers: readonly LayerDto[],
  inputShape: readonly [number, number, number],
  params: Float32Array,
): ModelNetwork {
  const expected = parameterCount(layers, inputShape);
  if (params.length !== expected) {
    throw new ShapeMismatchError(
      `Weights hold ${params.length} values, layers need ${expected}`,
    );
  }

  const compiled: CompiledLayer[] = [];
  let offset = 0;

  walkLayers(layers, inputShape, (layer, inputs, shape) => {
    switch (layer.type) {
      case 'flatten':
        compiled.push(
          Object.freeze({ type: 'flatten', inputs, outputs: inputs }),
        );
        break;
      case 'globalAvgPool': {
        const [h, w, c] = shape;
        compiled.push(
          Object.freeze({
            type: 'globalAvgPool',
            inputs,
            outputs: c,
            pixels: h * w,
            channels: c,
          }),
        );
        break;
      }
      case 'dense': {
        const units = denseUnits(layer);
        // subarray() views share the blob; nothing writes to them
        const weights = params.subarray(offset, offset + units * inputs);
        offset += units * inputs;
        const bias = params.subarray(offset, offset + units);
        offset += units;
        compiled.push(
          Object.freeze({
            type: 'dense',
            inputs,
            outputs: units,
            activation: layer.activation ?? 'linear',
            weights,
            bias,
          }),
        );
        break;
      }
    }
  });

  return new ModelNetwork(inputShape, Object.freeze(compiled));
}

export class ModelNetwork {
  readonly inputSize: number;
  readonly outputSize: number;

  constructor(
    readonly inputShape: readonly [number, number, number],
    readonly layers: readonly CompiledLayer[],
  ) {
    this.inputSize = inputShape[0] * inputShape[1] * inputShape[2];
    const last = layers[layers.length - 1];
    this.outputSize = last ? last.outputs : this.inputSize;
  }

  /** Raw logits for one tensor. Safe to call concurrently. */
  forward(tensor: Tensor): Float32Array {
    const [h, w, c] = this.inputShape;
    const [th, tw, tc] = tensor.shape;
    const sameShape = th === h && tw === w && tc === c;
    if (!sameShape || tensor.data.length !== this.inputSize) {
      throw new ShapeMismatchError(
        `Tensor shape ${th}x${tw}x${tc} ` +
          `does not match model input ${h}x${w}x${c}`,
      );
    }

    let activations: Float32Array = tensor.data;
    for (const layer of this.layers) {
      activations = runLayer(layer, activations);
    }
    // never hand back the caller's own buffer
    return activations === tensor.data
      ? Float32Array.from(activations)
      : activations;
  }

  /** One line per layer, for the model-info endpoint */
  describe(): string[] {
    return this.layers.map((l) =>
      l.type === 'dense'
        ? `dense(${l.inputs}->${l.outputs}, ${l.activation})`
        : `${l.type}(${l.inputs}->${l.outputs})`,
    );
  }
}

/* ------------------------------- Helpers ------------------------------ */

function runLayer(layer: CompiledLayer, input: Float32Array): Float32Array {
  switch (layer.type) {
    case 'flatten':
      return input;

    case 'globalAvgPool': {
      const out = new Float32Array(layer.channels);
      for (let p = 0; p < layer.pixels; p++) {
        const base = p * layer.channels;
        for (let ch = 0; ch < layer.channels; ch++) {
          out[ch] += input[base + ch];
        }
      }
      for (let ch = 0; ch < layer.channels; ch++) out[ch] /= layer.pixels;
      return out;
    }

    case 'dense': {
      const out = new Float32Array(layer.outputs);
      for (let o = 0; o < layer.outputs; o++) {
        const row = o * layer.inputs;
        let acc = layer.bias[o];
        for (let i = 0; i < layer.inputs; i++) {
          acc += layer.weights[row + i] * input[i];
        }
        out[o] = layer.activation === 'relu' && acc < 0 ? 0 : acc;
      }
      return out;
    }
  }
}

function denseUnits(layer: LayerDto): number {
  if (!layer.units || layer.units < 1) {
    throw new ShapeMismatchError('dense layer needs a positive "units"');
  }
  return layer.units;
}

type Shape = readonly [number, number, number];

/**
 * Visit layers in order with the flat input size and HWC shape each one sees.
 */
function walkLayers(
  layers: readonly LayerDto[],
  inputShape: Shape,
  visit: (layer: LayerDto, inputs: number, shape: Shape) => void,
): void {
  let shape: Shape = inputShape;
  let spatial = true;

  layers.forEach((layer, idx) => {
    const inputs = shape[0] * shape[1] * shape[2];
    if (layer.type === 'globalAvgPool' && !spatial) {
      throw new ShapeMismatchError(
        `layer ${idx}: globalAvgPool needs a spatial input`,
      );
    }
    visit(layer, inputs, shape);

    switch (layer.type) {
      case 'flatten':
        shape = [1, 1, inputs];
        spatial = false;
        break;
      case 'globalAvgPool':
        shape = [1, 1, shape[2]];
        spatial = false;
        break;
      case 'dense':
        shape = [1, 1, denseUnits(layer)];
        spatial = false;
        break;
    }
  });
}
