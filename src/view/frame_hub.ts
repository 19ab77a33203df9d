import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";

import type { EntropySignal } from "../lattice/entropy_signal";
import { buildRingFrame, type RingFrame } from "./ring_frame";

export type FrameEventKind = "ping" | "ring_frame";

export type FrameEnvelopeV1 = {
  v: 1;
  ts: string;
  kind: FrameEventKind;
  payload: Record<string, unknown>;
};

export type FrameMessage = {
  id: string;
  event: FrameEventKind;
  data: string;
};

export type FrameConnection = {
  id: string;
  createdAtMs: number;
  send: (message: FrameMessage) => void;
  end: () => void;
  log?: FastifyBaseLogger;
};

export type FrameHubOptions = {
  frameIntervalMs?: number;
  pingIntervalMs?: number;
  maxConnections?: number;
};

const DEFAULT_FRAME_INTERVAL_MS = 17;
const DEFAULT_PING_MS = 30_000;
const DEFAULT_MAX_CONNECTIONS = 8;

export const buildFrameEnvelope = (args: {
  kind: FrameEventKind;
  payload?: Record<string, unknown>;
  ts?: string;
}): FrameEnvelopeV1 => ({
  v: 1,
  ts: args.ts ?? new Date().toISOString(),
  kind: args.kind,
  payload: args.payload ?? {},
});

export const ringFramePayload = (frame: RingFrame, version: number): Record<string, unknown> => ({
  ...frame,
  version,
});

class InMemoryConnectionRegistry {
  private readonly connections = new Map<string, FrameConnection>();

  add(conn: FrameConnection) {
    this.connections.set(conn.id, conn);
  }

  remove(connId: string) {
    this.connections.delete(connId);
  }

  get(connId: string): FrameConnection | undefined {
    return this.connections.get(connId);
  }

  list(): FrameConnection[] {
    return Array.from(this.connections.values());
  }

  count(): number {
    return this.connections.size;
  }
}

/**
 * Samples the entropy signal on its own cadence and fans ring frames out to
 * connected viewers.
 *
 * A frame is only sent when the signal changed since the last one sent. Timers
 * run only while somebody is connected and never keep the process alive.
 */
export class FrameHub {
  private registry = new InMemoryConnectionRegistry();
  private frameTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private lastSentVersion = -1;
  private readonly frameIntervalMs: number;
  private readonly pingIntervalMs: number;
  private readonly maxConnections: number;

  constructor(private readonly signal: EntropySignal, opts: FrameHubOptions = {}) {
    this.frameIntervalMs = positiveOr(opts.frameIntervalMs, DEFAULT_FRAME_INTERVAL_MS);
    this.pingIntervalMs = positiveOr(opts.pingIntervalMs, DEFAULT_PING_MS);
    this.maxConnections = positiveOr(opts.maxConnections, DEFAULT_MAX_CONNECTIONS);
  }

  currentFrame(): { frame: RingFrame; version: number } {
    const sample = this.signal.read();
    return { frame: buildRingFrame(sample.value), version: sample.version };
  }

  registerConnection(conn: FrameConnection) {
    if (this.registry.count() >= this.maxConnections) {
      const oldest = this.registry.list().sort((a, b) => a.createdAtMs - b.createdAtMs)[0];
      if (oldest) {
        this.removeConnection(oldest.id, "cap_exceeded");
      }
    }

    this.registry.add(conn);
    // New viewers get the current frame right away.
    const { frame, version } = this.currentFrame();
    this.send(
      conn,
      buildFrameEnvelope({ kind: "ring_frame", payload: ringFramePayload(frame, version) })
    );
    if (this.registry.get(conn.id)) {
      this.ensureLoops();
    }
  }

  removeConnection(connId: string, reason: string = "closed") {
    const conn = this.registry.get(connId);
    if (!conn) return;
    this.registry.remove(connId);
    this.closeConnection(conn, reason);
    if (this.registry.count() === 0) {
      this.stop();
    }
  }

  activeConnectionCount(): number {
    return this.registry.count();
  }

  /**
   * Takes one sample. Returns true when a frame went out.
   */
  sampleOnce(): boolean {
    const { frame, version } = this.currentFrame();
    if (version === this.lastSentVersion) return false;
    this.lastSentVersion = version;

    const event = buildFrameEnvelope({
      kind: "ring_frame",
      payload: ringFramePayload(frame, version),
    });
    for (const conn of this.registry.list()) {
      this.send(conn, event);
    }
    return true;
  }

  stop() {
    if (this.frameTimer) {
      clearInterval(this.frameTimer);
      this.frameTimer = null;
    }
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  closeAll(reason: string = "shutdown") {
    for (const conn of this.registry.list()) {
      this.removeConnection(conn.id, reason);
    }
    this.stop();
  }

  private ensureLoops() {
    if (!this.frameTimer) {
      this.lastSentVersion = this.signal.version;
      this.frameTimer = setInterval(() => {
        this.sampleOnce();
      }, this.frameIntervalMs);
      this.frameTimer.unref();
    }

    if (!this.pingTimer) {
      this.pingTimer = setInterval(() => {
        const ping = buildFrameEnvelope({ kind: "ping" });
        for (const conn of this.registry.list()) {
          this.send(conn, ping);
        }
      }, this.pingIntervalMs);
      this.pingTimer.unref();
    }
  }

  private send(conn: FrameConnection, event: FrameEnvelopeV1) {
    try {
      conn.send({
        id: randomUUID(),
        event: event.kind,
        data: JSON.stringify(event),
      });
    } catch (error) {
      conn.log?.warn(
        { err: String(error instanceof Error ? error.message : error), connId: conn.id },
        "frame_hub.send_failed"
      );
      this.removeConnection(conn.id, "send_failed");
    }
  }

  private closeConnection(conn: FrameConnection, reason: string) {
    try {
      conn.end();
    } catch (error) {
      conn.log?.debug(
        { err: String(error instanceof Error ? error.message : error), connId: conn.id, reason },
        "frame_hub.close_failed"
      );
    }
  }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return typeof value === "number" && value > 0 ? value : fallback;
}
