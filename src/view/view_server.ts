import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";
import { FastifySSEPlugin } from "fastify-sse-v2";

import type { LogLevel } from "../config/governor_config";
import { healthRoutes } from "../routes/healthz";
import { ringRoutes } from "../routes/ring";
import type { FrameHub } from "./frame_hub";

export type ViewServerOptions = {
  hub: FrameHub;
  /** false disables request logging entirely (tests). */
  logLevel: LogLevel | false;
};

/**
 * HTTP surface for the ring display. Reads frames from the hub only; it has
 * no handle on the lattice.
 */
export function buildViewServer(opts: ViewServerOptions): FastifyInstance {
  const app = Fastify({
    logger: opts.logLevel === false ? false : { level: opts.logLevel, stream: process.stderr },
    forceCloseConnections: true,
  });

  app.register(cors, {
    origin: true,
  });
  app.register(FastifySSEPlugin);

  app.register(healthRoutes);
  app.register(ringRoutes, { prefix: "/v1", hub: opts.hub });

  // Streams never go idle, so they are ended before the server waits on its sockets.
  app.addHook("preClose", async () => {
    opts.hub.closeAll("server_closed");
  });

  return app;
}
