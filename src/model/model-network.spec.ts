import type { LayerDto } from './dto/model-manifest.dto';
import {
  compileNetwork,
  parameterCount,
  ShapeMismatchError,
  type Tensor,
} from './model-network';

const layers: LayerDto[] = [
  { type: 'globalAvgPool' },
  { type: 'dense', units: 2, activation: 'linear' },
];

function tensor(
  h: number,
  w: number,
  c: number,
  fill: (i: number) => number,
): Tensor {
  const data = Float32Array.from({ length: h * w * c }, (_, i) => fill(i));
  return { shape: [h, w, c], data };
}

describe('parameterCount', () => {
  it('counts weights and biases of every dense layer', () => {
    expect(parameterCount(layers, [8, 8, 3])).toBe(2 * 3 + 2);
    expect(
      parameterCount(
        [
          { type: 'flatten' },
          { type: 'dense', units: 4, activation: 'relu' },
          { type: 'dense', units: 2 },
        ],
        [2, 2, 1],
      ),
    ).toBe(4 * 4 + 4 + 2 * 4 + 2);
  });

  it('rejects a dense layer without units', () => {
    expect(() => parameterCount([{ type: 'dense' }], [1, 1, 3])).toThrow(
      ShapeMismatchError,
    );
  });
});

describe('compileNetwork', () => {
  it('rejects a weights blob of the wrong length', () => {
    expect(() =>
      compileNetwork(layers, [8, 8, 3], new Float32Array(7)),
    ).toThrow('Weights hold 7 values, layers need 8');
  });

  it('averages channels then applies the dense layer', () => {
    const weights = Float32Array.from([1, 2, 3, -1, 0, 1, 0.5, -0.5]);
    const net = compileNetwork(layers, [2, 2, 3], weights);
    // every pixel is (1, 0, 2)
    const out = net.forward(tensor(2, 2, 3, (i) => [1, 0, 2][i % 3]));

    expect(Array.from(out)).toEqual([1 + 6 + 0.5, -1 + 2 - 0.5]);
    expect(net.outputSize).toBe(2);
    expect(net.inputSize).toBe(12);
  });

  it('clamps negatives under relu', () => {
    const net = compileNetwork(
      [{ type: 'flatten' }, { type: 'dense', units: 2, activation: 'relu' }],
      [1, 1, 2],
      Float32Array.from([1, 1, -1, -1, 0, 0]),
    );
    expect(Array.from(net.forward(tensor(1, 1, 2, () => 1)))).toEqual([2, 0]);
  });

  it('refuses a tensor of another shape', () => {
    const net = compileNetwork(layers, [8, 8, 3], new Float32Array(8));
    expect(() => net.forward(tensor(4, 4, 3, () => 0))).toThrow(
      'Tensor shape 4x4x3 does not match model input 8x8x3',
    );
  });

  it('never returns the input buffer', () => {
    const net = compileNetwork(
      [{ type: 'flatten' }],
      [1, 1, 2],
      new Float32Array(0),
    );
    const input = tensor(1, 1, 2, (i) => i);
    const out = net.forward(input);

    expect(out).not.toBe(input.data);
    expect(Array.from(out)).toEqual([0, 1]);
  });

  it('describes each layer', () => {
    const net = compileNetwork(layers, [4, 4, 3], new Float32Array(8));
    expect(net.describe()).toEqual([
      'globalAvgPool(48->3)',
      'dense(3->2, linear)',
    ]);
  });
});
