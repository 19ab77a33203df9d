import type { CoherenceVerdict } from "../gates/gate_interfaces";

const TAG_WIDTH = 10;

const ANSI = {
  green: "\x1b[92m",
  red: "\x1b[91m",
  reset: "\x1b[0m",
} as const;

export const BANNER_LINES = [
  "LATTICE GOVERNOR",
  "Status: Listening on stdin | Pipe any model output here",
  "─".repeat(53),
] as const;

function paintTag(verdict: CoherenceVerdict, color: boolean): string {
  const pad = " ".repeat(TAG_WIDTH - verdict.length);
  if (!color) return `${verdict}${pad}`;
  const tint = verdict === "BLOCKED" ? ANSI.red : ANSI.green;
  return `${tint}${verdict}${ANSI.reset}${pad}`;
}

/**
 * One human-readable status line per scored input, without trailing newline.
 *
 *   VERIFIED  Coherent — entropy 0.251
 *   BLOCKED   Hallucination — entropy 0.741 > 0.618
 */
export function formatStatusLine(args: {
  verdict: CoherenceVerdict;
  entropy: number;
  threshold: number;
  color?: boolean;
}): string {
  const tag = paintTag(args.verdict, args.color === true);
  const value = args.entropy.toFixed(3);
  if (args.verdict === "BLOCKED") {
    return `${tag}Hallucination — entropy ${value} > ${args.threshold}`;
  }
  return `${tag}Coherent — entropy ${value}`;
}
