export const GATE_COHERENCE = "coherence" as const;

export type CoherenceVerdict = "VERIFIED" | "BLOCKED";

export interface GateOutput {
  gateName: string;
  status: "pass" | "fail";
  summary: string;
  metadata?: Record<string, unknown>;
}
