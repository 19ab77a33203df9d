import type { ResonantLattice } from "../lattice/resonant_lattice";
import { GATE_COHERENCE, type CoherenceVerdict, type GateOutput } from "./gate_interfaces";

export type CoherenceGateConfig = {
  /** Number of `step()` calls per line. */
  steps: number;
  /** Entropy strictly above this value blocks the line. */
  threshold: number;
};

export type CoherenceGateOutput = GateOutput & {
  gateName: typeof GATE_COHERENCE;
  status: "pass" | "fail";
  verdict: CoherenceVerdict;
  entropy: number;
  metadata: {
    entropy: number;
    threshold: number;
    steps: number;
    byteLength: number;
    truncated: boolean;
    diverged: boolean;
  };
};

/**
 * Strict comparison: a value equal to the threshold passes, and so does NaN.
 */
export function classifyEntropy(entropy: number, threshold: number): CoherenceVerdict {
  return entropy > threshold ? "BLOCKED" : "VERIFIED";
}

/**
 * Inject `text`, evolve it `steps` times and score the final entropy.
 *
 * Runs synchronously from start to finish, so nothing else can touch the
 * lattice between the injection and the last step.
 */
export function runCoherenceGate(
  lattice: ResonantLattice,
  text: string | Uint8Array,
  config: CoherenceGateConfig
): CoherenceGateOutput {
  const byteLength = typeof text === "string" ? Buffer.byteLength(text, "utf8") : text.length;

  lattice.inject(text);
  for (let k = 0; k < config.steps; k += 1) {
    lattice.step();
  }

  const entropy = lattice.entropy;
  const verdict = classifyEntropy(entropy, config.threshold);
  const diverged = !Number.isFinite(entropy);

  return {
    gateName: GATE_COHERENCE,
    status: verdict === "BLOCKED" ? "fail" : "pass",
    summary: `Verdict: ${verdict}, entropy ${entropy.toFixed(3)} (threshold ${config.threshold})`,
    verdict,
    entropy,
    metadata: {
      entropy,
      threshold: config.threshold,
      steps: config.steps,
      byteLength,
      truncated: byteLength > lattice.cellCount,
      diverged,
    },
  };
}
