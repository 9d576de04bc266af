import { AbcFlowParameterError } from "./errors";

export type Dims3 = [number, number, number];

/** Side length of the periodic ABC domain on every axis. */
export const DOMAIN_LENGTH = 2 * Math.PI;

/**
 * Isotropic cube sampled at `n` points per axis, endpoints included.
 * All three axes share one coordinate array.
 */
export interface CubeGrid {
  n: number;
  dims: Dims3;
  length: number;
  spacing: number;
  axes: readonly [Float32Array, Float32Array, Float32Array];
}

export interface CoordinateMesh {
  X: Float32Array;
  Y: Float32Array;
  Z: Float32Array;
}

/** Flat offset of point (i, j, k); the first axis varies fastest. */
export const index3D = (i: number, j: number, k: number, dims: Dims3) =>
  i + dims[0] * (j + dims[1] * k);

export const pointCount = (dims: Dims3) => dims[0] * dims[1] * dims[2];

export const linspace = (start: number, stop: number, count: number): Float32Array => {
  const out = new Float32Array(count);
  const step = (stop - start) / (count - 1);
  for (let i = 0; i < count; i += 1) {
    out[i] = start + i * step;
  }
  out[count - 1] = stop;
  return out;
};

export const buildCubeGrid = (n: number): CubeGrid => {
  if (!Number.isInteger(n) || n < 2) {
    throw new AbcFlowParameterError(`grid points per axis must be an integer >= 2 (got ${n})`);
  }
  const axis = linspace(0, DOMAIN_LENGTH, n);
  return {
    n,
    dims: [n, n, n],
    length: DOMAIN_LENGTH,
    spacing: DOMAIN_LENGTH / (n - 1),
    axes: [axis, axis, axis],
  };
};

/** Full per-axis coordinate arrays ("ij" indexing) in flat layout. */
export const buildCoordinateMesh = (grid: CubeGrid): CoordinateMesh => {
  const { dims, axes } = grid;
  const total = pointCount(dims);
  const X = new Float32Array(total);
  const Y = new Float32Array(total);
  const Z = new Float32Array(total);
  for (let k = 0; k < dims[2]; k += 1) {
    for (let j = 0; j < dims[1]; j += 1) {
      for (let i = 0; i < dims[0]; i += 1) {
        const idx = index3D(i, j, k, dims);
        X[idx] = axes[0][i];
        Y[idx] = axes[1][j];
        Z[idx] = axes[2][k];
      }
    }
  }
  return { X, Y, Z };
};
