import { add, I, mul, norm, scale, sub, ZERO, type Complex } from "./complex";

export type LatticeParams = {
  /** Side length N; the field holds N * N cells. */
  size: number;
  /** Time step applied to every update. */
  dt: number;
  /** Multiplier applied to each new amplitude, below 1. */
  damping: number;
  /** Imaginary part of an injected cell as a fraction of its real part. */
  phaseTwist: number;
  /** Weight of the |psi|^2 self-interaction term. */
  nonlinearity: number;
};

export const DEFAULT_LATTICE_PARAMS: LatticeParams = {
  size: 80,
  dt: 0.108,
  damping: 0.991,
  phaseTwist: 0.61,
  nonlinearity: 0.618,
};

/**
 * Wraps a flattened index with a Euclidean remainder.
 *
 * Wraparound happens on the 1D index, so stepping right off the end of a row
 * lands on the start of the next row rather than the start of the same one.
 */
export function neighborIndex(index: number, offset: number, cellCount: number): number {
  const r = (index + offset) % cellCount;
  return r < 0 ? r + cellCount : r;
}

// NaN is left as is: no finite bound applies to it.
function clampUnit(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * N x N field of complex amplitudes evolved under a damped nonlinear wave rule.
 *
 * The field is stored row-major as one flat array. Each `step()` computes every
 * next amplitude from the field as it was at the start of the step and then
 * swaps the whole array in.
 */
export class ResonantLattice {
  readonly params: LatticeParams;
  readonly size: number;
  readonly cellCount: number;

  private psi: Complex[];
  private currentEntropy = 0;

  constructor(params: LatticeParams = DEFAULT_LATTICE_PARAMS) {
    if (!Number.isInteger(params.size) || params.size < 1) {
      throw new RangeError(`lattice size must be a positive integer, got ${params.size}`);
    }
    this.params = { ...params };
    this.size = params.size;
    this.cellCount = params.size * params.size;
    this.psi = new Array<Complex>(this.cellCount).fill(ZERO);
  }

  /** Entropy left by the last `step()`; stale right after `inject()`. */
  get entropy(): number {
    return this.currentEntropy;
  }

  amplitudeAt(index: number): Complex {
    const value = this.psi[neighborIndex(index, 0, this.cellCount)];
    return value ?? ZERO;
  }

  snapshot(): Complex[] {
    return this.psi.slice();
  }

  /**
   * Overwrites the whole field from the bytes of `text`.
   *
   * Byte `b` at position `i` becomes `(b / 255, phaseTwist * b / 255)`. Bytes
   * past the last cell are ignored.
   */
  inject(text: string | Uint8Array): void {
    const bytes = typeof text === "string" ? Buffer.from(text, "utf8") : text;
    const limit = Math.min(bytes.length, this.cellCount);
    const next = new Array<Complex>(this.cellCount).fill(ZERO);

    for (let i = 0; i < limit; i += 1) {
      const v = (bytes[i] ?? 0) / 255;
      next[i] = { re: v, im: v * this.params.phaseTwist };
    }

    this.psi = next;
  }

  step(): void {
    const { dt, damping, nonlinearity } = this.params;
    const n = this.size;
    const total = this.cellCount;
    const current = this.psi;
    const next = new Array<Complex>(total);
    const at = (i: number): Complex => current[i] ?? ZERO;
    let dissonance = 0;

    for (let i = 0; i < total; i += 1) {
      const self = at(i);
      const up = at(neighborIndex(i, -n, total));
      const down = at(neighborIndex(i, n, total));
      const left = at(neighborIndex(i, -1, total));
      const right = at(neighborIndex(i, 1, total));

      const laplacian = sub(add(add(add(up, down), left), right), scale(self, 4));
      const mag = norm(self);
      const selfTerm = scale(self, 1 + nonlinearity * (mag * mag));

      const evolved = add(self, scale(mul(sub(laplacian, selfTerm), I), dt));
      const damped = scale(evolved, damping);

      next[i] = damped;
      dissonance += Math.abs(damped.im);
    }

    this.psi = next;
    this.currentEntropy = clampUnit(dissonance / n);
  }
}
