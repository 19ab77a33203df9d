import type { Readable, Writable } from "node:stream";

import { runCoherenceGate, type CoherenceGateOutput } from "../gates/coherence_gate";
import type { EntropySignal } from "../lattice/entropy_signal";
import type { ResonantLattice } from "../lattice/resonant_lattice";
import type { GovernorLogger } from "../logging/logger";
import { readByteLines, trimWhitespaceBytes } from "./byte_lines";
import { BANNER_LINES, formatStatusLine } from "./status_line";

export type LineGovernorOptions = {
  lattice: ResonantLattice;
  signal: EntropySignal;
  steps: number;
  threshold: number;
  /** Receives verified lines verbatim, byte for byte. */
  accepted: Writable;
  /** Receives the banner and one status line per scored input. */
  status: Writable;
  log: GovernorLogger;
  color?: boolean;
};

const NEWLINE = Buffer.from("\n");

export type GovernorSummary = {
  processed: number;
  verified: number;
  blocked: number;
  skipped: number;
};

/**
 * Reads lines, scores each one on the lattice and forwards the coherent ones.
 *
 * Per line: IDLE -> INJECTED -> EVOLVING -> SCORED -> VERIFIED | BLOCKED. Blank
 * lines never leave IDLE. There is no explicit reset between lines because the
 * next injection overwrites the whole field.
 */
export class LineGovernor {
  private readonly opts: LineGovernorOptions;
  private readonly counts: GovernorSummary = {
    processed: 0,
    verified: 0,
    blocked: 0,
    skipped: 0,
  };

  constructor(opts: LineGovernorOptions) {
    this.opts = opts;
  }

  summary(): GovernorSummary {
    return { ...this.counts };
  }

  writeBanner(): void {
    for (const line of BANNER_LINES) {
      this.opts.status.write(`${line}\n`);
    }
  }

  /**
   * Scores one raw input line. Input bytes are never decoded: the trimmed bytes
   * are what gets injected and forwarded. Returns null for blank lines, which
   * produce no output of any kind.
   */
  processLine(raw: string | Uint8Array): CoherenceGateOutput | null {
    const text = trimWhitespaceBytes(typeof raw === "string" ? Buffer.from(raw, "utf8") : raw);
    if (text.length === 0) {
      this.counts.skipped += 1;
      return null;
    }

    const { lattice, signal, steps, threshold, log } = this.opts;
    const result = runCoherenceGate(lattice, text, { steps, threshold });
    signal.publish(result.entropy);

    this.counts.processed += 1;
    if (result.verdict === "BLOCKED") {
      this.counts.blocked += 1;
    } else {
      this.counts.verified += 1;
    }

    if (result.metadata.diverged) {
      log.warn(
        { evt: "governor.lattice.diverged", entropy: String(result.entropy), steps },
        "governor.lattice.diverged"
      );
    }
    log.debug(
      {
        evt: "governor.line.scored",
        verdict: result.verdict,
        entropy: result.entropy,
        byteLength: result.metadata.byteLength,
        truncated: result.metadata.truncated,
      },
      "governor.line.scored"
    );

    this.opts.status.write(
      `${formatStatusLine({
        verdict: result.verdict,
        entropy: result.entropy,
        threshold,
        color: this.opts.color,
      })}\n`
    );

    if (result.verdict === "VERIFIED") {
      this.opts.accepted.write(Buffer.concat([text, NEWLINE]));
    }

    return result;
  }

  /**
   * Consumes `input` until it ends, one line at a time and strictly in order.
   */
  async run(input: Readable): Promise<GovernorSummary> {
    for await (const line of readByteLines(input)) {
      this.processLine(line);
    }
    return this.summary();
  }
}
