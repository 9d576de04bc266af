import type { TAbcFlowFormulation } from "../../shared/abc-flow";
import type { CoordinateMesh } from "./grid";

export interface AbcCoefficients {
  A: number;
  B: number;
  C: number;
}

export interface VectorFieldSnapshot {
  vx: Float32Array;
  vy: Float32Array;
  vz: Float32Array;
}

/**
 * Fully phase-coupled ABC flow:
 *
 *   vx = A (sin(Z + ph) + cos(Y + ph))
 *   vy = B (sin(X + ph) + cos(Z + ph))
 *   vz = C (sin(Y + ph) + cos(X + ph))
 */
export const coupledAbcField = (
  mesh: CoordinateMesh,
  { A, B, C }: AbcCoefficients,
  ph: number,
): VectorFieldSnapshot => {
  const { X, Y, Z } = mesh;
  const total = X.length;
  const vx = new Float32Array(total);
  const vy = new Float32Array(total);
  const vz = new Float32Array(total);
  for (let idx = 0; idx < total; idx += 1) {
    const x = X[idx] + ph;
    const y = Y[idx] + ph;
    const z = Z[idx] + ph;
    vx[idx] = A * (Math.sin(z) + Math.cos(y));
    vy[idx] = B * (Math.sin(x) + Math.cos(z));
    vz[idx] = C * (Math.sin(y) + Math.cos(x));
  }
  return { vx, vy, vz };
};

/**
 * Legacy ABC flow, phase on two of the six terms:
 *
 *   vx = A sin(Z + ph) + C cos(Y)
 *   vy = B sin(X) + A cos(Z + ph)
 *   vz = C sin(Y) + B cos(X)
 */
export const legacyAbcField = (
  mesh: CoordinateMesh,
  { A, B, C }: AbcCoefficients,
  ph: number,
): VectorFieldSnapshot => {
  const { X, Y, Z } = mesh;
  const total = X.length;
  const vx = new Float32Array(total);
  const vy = new Float32Array(total);
  const vz = new Float32Array(total);
  for (let idx = 0; idx < total; idx += 1) {
    const x = X[idx];
    const y = Y[idx];
    const zp = Z[idx] + ph;
    vx[idx] = A * Math.sin(zp) + C * Math.cos(y);
    vy[idx] = B * Math.sin(x) + A * Math.cos(zp);
    vz[idx] = C * Math.sin(y) + B * Math.cos(x);
  }
  return { vx, vy, vz };
};

export type AbcFieldGenerator = typeof coupledAbcField;

export const ABC_FIELD_GENERATORS: Record<TAbcFlowFormulation, AbcFieldGenerator> = {
  coupled: coupledAbcField,
  legacy: legacyAbcField,
};
