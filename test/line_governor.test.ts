import { describe, it, expect, vi } from "vitest";
import { PassThrough, Writable } from "node:stream";
import pino from "pino";

import { LineGovernor } from "../src/governor/line_governor";
import { EntropySignal } from "../src/lattice/entropy_signal";
import { DEFAULT_LATTICE_PARAMS, ResonantLattice } from "../src/lattice/resonant_lattice";

const collector = () => {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      callback();
    },
  });
  const bytes = () => Buffer.concat(chunks);
  return { stream, bytes, text: () => bytes().toString("utf8") };
};

const injectedBytes = (arg: unknown) => (arg instanceof Uint8Array ? Array.from(arg) : arg);

const makeGovernor = (overrides: { size?: number; steps?: number; threshold?: number } = {}) => {
  const lattice = new ResonantLattice({ ...DEFAULT_LATTICE_PARAMS, size: overrides.size ?? 4 });
  const signal = new EntropySignal();
  const accepted = collector();
  const status = collector();
  const log = pino({ level: "silent" });
  const governor = new LineGovernor({
    lattice,
    signal,
    steps: overrides.steps ?? 3,
    threshold: overrides.threshold ?? 0.618,
    accepted: accepted.stream,
    status: status.stream,
    log,
  });
  return { governor, lattice, signal, accepted, status, log };
};

describe("LineGovernor.processLine", () => {
  it("forwards a verified line and reports it", () => {
    const { governor, accepted, status } = makeGovernor();

    const result = governor.processLine("  hi  ");

    expect(result?.verdict).toBe("VERIFIED");
    expect(accepted.text()).toBe("hi\n");
    expect(status.text()).toBe("VERIFIED  Coherent — entropy 0.470\n");
  });

  it("drops a blocked line from the accepted channel", () => {
    const { governor, accepted, status } = makeGovernor();

    const result = governor.processLine("hello");

    expect(result?.verdict).toBe("BLOCKED");
    expect(accepted.text()).toBe("");
    expect(status.text()).toBe("BLOCKED   Hallucination — entropy 0.741 > 0.618\n");
  });

  it("publishes the scored entropy to the signal", () => {
    const { governor, signal } = makeGovernor();

    const result = governor.processLine("hi");

    expect(signal.version).toBe(1);
    expect(signal.read().value).toBe(result?.entropy);
  });

  it("skips blank lines without touching the lattice", () => {
    const { governor, lattice, signal, accepted, status } = makeGovernor();
    governor.processLine("hi");
    const field = lattice.snapshot();
    const entropy = lattice.entropy;
    const acceptedBefore = accepted.text();
    const statusBefore = status.text();

    expect(governor.processLine("")).toBeNull();
    expect(governor.processLine(" \t  ")).toBeNull();

    expect(lattice.snapshot()).toEqual(field);
    expect(lattice.entropy).toBe(entropy);
    expect(signal.version).toBe(1);
    expect(accepted.text()).toBe(acceptedBefore);
    expect(status.text()).toBe(statusBefore);
    expect(governor.summary()).toEqual({ processed: 1, verified: 1, blocked: 0, skipped: 2 });
  });

  it("warns when the lattice diverges", () => {
    const { governor, log, accepted } = makeGovernor({ size: 80, steps: 70 });
    const warn = vi.spyOn(log, "warn");

    const result = governor.processLine("hello");

    expect(result?.metadata.diverged).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(accepted.text()).toBe("hello\n");
  });
});

describe("LineGovernor.run", () => {
  it("processes a stream in order and summarizes it", async () => {
    const { governor, accepted, status } = makeGovernor();
    const input = new PassThrough();
    input.end("hello\n  \nhi  \n\n  world");

    const summary = await governor.run(input);

    expect(summary).toEqual({ processed: 3, verified: 1, blocked: 2, skipped: 2 });
    expect(accepted.text()).toBe("hi\n");
    expect(status.text()).toBe(
      [
        "BLOCKED   Hallucination — entropy 0.741 > 0.618",
        "VERIFIED  Coherent — entropy 0.470",
        "BLOCKED   Hallucination — entropy 0.772 > 0.618",
        "",
      ].join("\n")
    );
  });

  it("writes the banner to the status channel only", () => {
    const { governor, accepted, status } = makeGovernor();

    governor.writeBanner();

    expect(accepted.text()).toBe("");
    expect(status.text().split("\n")[0]).toBe("LATTICE GOVERNOR");
  });
});

describe("LineGovernor byte handling", () => {
  it("injects and forwards bytes that are not valid UTF-8 unchanged", async () => {
    const { governor, lattice, accepted } = makeGovernor({ threshold: 1 });
    const inject = vi.spyOn(lattice, "inject");
    const input = new PassThrough();
    input.end(Buffer.from([0x61, 0xff, 0x62, 0x0a]));

    const summary = await governor.run(input);

    expect(summary).toEqual({ processed: 1, verified: 1, blocked: 0, skipped: 0 });
    expect(inject).toHaveBeenCalledTimes(1);
    expect(injectedBytes(inject.mock.calls[0]?.[0])).toEqual([0x61, 0xff, 0x62]);
    expect(accepted.bytes().toString("hex")).toBe("61ff620a");
  });

  it("splits CRLF lines and keeps them in order", async () => {
    const { governor, accepted } = makeGovernor({ threshold: 1 });
    const input = new PassThrough();
    input.write("al");
    input.write("pha\r\nbe");
    input.end("ta\r\n");

    await governor.run(input);

    expect(accepted.text()).toBe("alpha\nbeta\n");
  });

  it("trims NEL but keeps a leading byte order mark", () => {
    const { governor, lattice, accepted } = makeGovernor({ threshold: 1 });
    const inject = vi.spyOn(lattice, "inject");

    governor.processLine("\u0085hi\u00a0\u0085");
    governor.processLine("\ufeffhi");

    expect(injectedBytes(inject.mock.calls[0]?.[0])).toEqual([0x68, 0x69]);
    expect(injectedBytes(inject.mock.calls[1]?.[0])).toEqual([0xef, 0xbb, 0xbf, 0x68, 0x69]);
    expect(accepted.bytes().toString("hex")).toBe("68690aefbbbf68690a");
  });

  it("treats a line of Unicode spaces as blank", () => {
    const { governor, accepted, status } = makeGovernor();

    expect(governor.processLine("\u2003\u3000 \t")).toBeNull();
    expect(accepted.text()).toBe("");
    expect(status.text()).toBe("");
  });
});
