import { GovernorConfigError } from "./config/config_error";
import { loadGovernorConfig, type GovernorConfig } from "./config/governor_config";
import { LineGovernor } from "./governor/line_governor";
import { EntropySignal } from "./lattice/entropy_signal";
import { ResonantLattice } from "./lattice/resonant_lattice";
import { createLogger, type GovernorLogger } from "./logging/logger";
import { FrameHub } from "./view/frame_hub";
import { buildViewServer } from "./view/view_server";

type ViewHandle = {
  close: () => Promise<void>;
};

async function startView(
  config: GovernorConfig,
  signal: EntropySignal,
  log: GovernorLogger
): Promise<ViewHandle | null> {
  if (config.view.port === 0) return null;

  const hub = new FrameHub(signal, { frameIntervalMs: config.view.frameIntervalMs });
  const app = buildViewServer({ hub, logLevel: config.logLevel });

  try {
    await app.listen({ port: config.view.port, host: config.view.host });
  } catch (error) {
    // The display is optional; verdicts keep flowing without it.
    log.error(
      { evt: "view.listen_failed", error: String(error instanceof Error ? error.message : error) },
      "view.listen_failed"
    );
    await app.close();
    return null;
  }

  log.info(
    { evt: "view.listening", host: config.view.host, port: config.view.port },
    "view.listening"
  );
  return { close: () => app.close() };
}

async function main() {
  const config = loadGovernorConfig(process.env, { isTTY: process.stderr.isTTY === true });
  const log = createLogger({ level: config.logLevel, pretty: config.pretty });

  const lattice = new ResonantLattice(config.lattice);
  const signal = new EntropySignal();
  const view = await startView(config, signal, log);

  const shutdown = async (reason: string) => {
    log.info({ evt: "governor.stopping", reason }, "governor.stopping");
    try {
      await view?.close();
    } catch (error) {
      log.error(
        { evt: "view.close_failed", error: String(error instanceof Error ? error.message : error) },
        "view.close_failed"
      );
    }
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  const governor = new LineGovernor({
    lattice,
    signal,
    steps: config.steps,
    threshold: config.threshold,
    accepted: process.stdout,
    status: process.stderr,
    log,
    color: config.color,
  });

  log.info(
    {
      evt: "governor.started",
      lattice: config.lattice,
      steps: config.steps,
      threshold: config.threshold,
      viewPort: config.view.port,
    },
    "governor.started"
  );
  governor.writeBanner();

  const summary = await governor.run(process.stdin);
  log.info({ evt: "governor.finished", ...summary }, "governor.finished");

  if (view) {
    await view.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof GovernorConfigError) {
    process.stderr.write(`${JSON.stringify(err.toJSON())}\n`);
  } else {
    process.stderr.write(
      `${JSON.stringify({ evt: "governor.fatal", error: String(err instanceof Error ? err.message : err) })}\n`
    );
  }
  process.exit(1);
});
