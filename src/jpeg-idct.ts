/**
 * Zig-zag ordering, quantization and the inverse DCT
 */

/**
 * Natural (row-major) index of each zig-zag position
 */
export const ZIGZAG_TO_NATURAL: readonly number[] = [
  0, 1, 8, 16, 9, 2, 3, 10, 17, 24, 32, 25, 18, 11, 4, 5, 12, 19, 26, 33, 40, 48, 41, 34, 27, 20, 13, 6, 7, 14, 21,
  28, 35, 42, 49, 56, 57, 50, 43, 36, 29, 22, 15, 23, 30, 37, 44, 51, 58, 59, 52, 45, 38, 31, 39, 46, 53, 60, 61,
  54, 47, 55, 62, 63,
];

/**
 * Divide natural-order coefficients by a natural-order table, rounding to
 * the nearest integer
 */
export function quantizeBlock(coefficients: ArrayLike<number>, table: ArrayLike<number>): Int32Array {
  const out = new Int32Array(64);
  for (let i = 0; i < 64; i++) {
    out[i] = Math.round(coefficients[i] / table[i]);
  }
  return out;
}

export function dequantizeBlock(
  quantized: ArrayLike<number>,
  table: ArrayLike<number>,
  out: Float32Array = new Float32Array(64),
  offset = 0
): Float32Array {
  for (let i = 0; i < 64; i++) {
    out[i] = quantized[offset + i] * table[i];
  }
  return out;
}

// IDCT_BASIS[x * 8 + u] = C(u) / 2 * cos((2x + 1) * u * pi / 16)
const IDCT_BASIS = new Float64Array(64);
for (let x = 0; x < 8; x++) {
  for (let u = 0; u < 8; u++) {
    const scale = u === 0 ? Math.SQRT1_2 : 1;
    IDCT_BASIS[x * 8 + u] = (scale / 2) * Math.cos(((2 * x + 1) * u * Math.PI) / 16);
  }
}

/**
 * Separable floating-point 8x8 inverse DCT. Input and output are
 * natural-order; the output is not level-shifted.
 */
export function idctBlock(input: ArrayLike<number>, out: Float32Array = new Float32Array(64)): Float32Array {
  const rows = new Float64Array(64);

  for (let v = 0; v < 8; v++) {
    const row = v * 8;
    for (let x = 0; x < 8; x++) {
      const basis = x * 8;
      let sum = 0;
      for (let u = 0; u < 8; u++) {
        sum += input[row + u] * IDCT_BASIS[basis + u];
      }
      rows[row + x] = sum;
    }
  }

  for (let x = 0; x < 8; x++) {
    for (let y = 0; y < 8; y++) {
      const basis = y * 8;
      let sum = 0;
      for (let v = 0; v < 8; v++) {
        sum += rows[v * 8 + x] * IDCT_BASIS[basis + v];
      }
      out[y * 8 + x] = sum;
    }
  }

  return out;
}
