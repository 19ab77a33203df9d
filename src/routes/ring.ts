import "fastify-sse-v2";

import type { FastifyInstance } from "fastify";
import { randomUUID } from "node:crypto";

import type { FrameConnection, FrameHub } from "../view/frame_hub";
import { ringFramePayload } from "../view/frame_hub";

type RingRoutesOptions = {
  hub: FrameHub;
};

export async function ringRoutes(app: FastifyInstance, opts: RingRoutesOptions) {
  const { hub } = opts;

  app.options("/ring", async (_req, reply) => reply.code(204).send());

  // Single sample; non-finite numbers serialize as null.
  app.get("/ring", async () => {
    const { frame, version } = hub.currentFrame();
    return ringFramePayload(frame, version);
  });

  app.get("/ring/stream", async (req, reply) => {
    reply
      .header("Content-Type", "text/event-stream")
      .header("Cache-Control", "no-cache")
      .header("Connection", "keep-alive")
      .header("X-Accel-Buffering", "no");

    const connection: FrameConnection = {
      id: randomUUID(),
      createdAtMs: Date.now(),
      send: (message) => {
        reply.sse(message);
      },
      end: () => {
        reply.sseContext.source.end();
      },
      log: req.log,
    };
    hub.registerConnection(connection);

    reply.raw.on("close", () => {
      hub.removeConnection(connection.id, "client_closed");
    });

    return reply;
  });
}
