import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { DEFAULT_LATTICE_PARAMS } from "../lattice/resonant_lattice";
import { GovernorConfigError } from "./config_error";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export const DEFAULT_STEPS = 70;
export const DEFAULT_THRESHOLD = 0.618;
export const DEFAULT_FRAME_INTERVAL_MS = 17;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const finite = () => z.coerce.number().finite();

export const GovernorConfigSchema = z.object({
  lattice: z.object({
    size: z.coerce.number().int().min(1).max(1024).default(DEFAULT_LATTICE_PARAMS.size),
    dt: finite().positive().default(DEFAULT_LATTICE_PARAMS.dt),
    damping: finite().gt(0).lt(1).default(DEFAULT_LATTICE_PARAMS.damping),
    phaseTwist: finite().default(DEFAULT_LATTICE_PARAMS.phaseTwist),
    nonlinearity: finite().default(DEFAULT_LATTICE_PARAMS.nonlinearity),
  }),
  steps: z.coerce.number().int().min(1).default(DEFAULT_STEPS),
  threshold: finite().default(DEFAULT_THRESHOLD),
  view: z.object({
    port: z.coerce.number().int().min(0).max(65535).default(0),
    host: z.string().min(1).default("127.0.0.1"),
    frameIntervalMs: z.coerce.number().int().min(1).default(DEFAULT_FRAME_INTERVAL_MS),
  }),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  pretty: z.boolean().default(false),
  color: z.boolean().default(false),
});

export type GovernorConfig = z.infer<typeof GovernorConfigSchema>;

type Env = Record<string, string | undefined>;

// Maps config paths back to the env var that feeds them, for error messages.
const ENV_KEYS: Record<string, string> = {
  "lattice.size": "GOVERNOR_LATTICE_SIZE",
  "lattice.dt": "GOVERNOR_DT",
  "lattice.damping": "GOVERNOR_DAMPING",
  "lattice.phaseTwist": "GOVERNOR_PHASE_TWIST",
  "lattice.nonlinearity": "GOVERNOR_NONLINEARITY",
  steps: "GOVERNOR_STEPS",
  threshold: "GOVERNOR_THRESHOLD",
  "view.port": "GOVERNOR_VIEW_PORT",
  "view.host": "GOVERNOR_VIEW_HOST",
  "view.frameIntervalMs": "GOVERNOR_FRAME_INTERVAL_MS",
  logLevel: "LOG_LEVEL",
};

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Color follows NO_COLOR / FORCE_COLOR first, then whether stderr is a terminal.
 */
export function resolveColor(env: Env, isTTY: boolean): boolean {
  if (read(env, "NO_COLOR")) return false;
  const force = read(env, "FORCE_COLOR");
  if (force) return force !== "0" && force !== "false";
  return isTTY;
}

export function loadGovernorConfig(
  env: Env = process.env,
  opts: { isTTY?: boolean } = {}
): GovernorConfig {
  const isDev = env.NODE_ENV !== "production";
  const parsed = GovernorConfigSchema.safeParse({
    lattice: {
      size: read(env, "GOVERNOR_LATTICE_SIZE"),
      dt: read(env, "GOVERNOR_DT"),
      damping: read(env, "GOVERNOR_DAMPING"),
      phaseTwist: read(env, "GOVERNOR_PHASE_TWIST"),
      nonlinearity: read(env, "GOVERNOR_NONLINEARITY"),
    },
    steps: read(env, "GOVERNOR_STEPS"),
    threshold: read(env, "GOVERNOR_THRESHOLD"),
    view: {
      port: read(env, "GOVERNOR_VIEW_PORT"),
      host: read(env, "GOVERNOR_VIEW_HOST"),
      frameIntervalMs: read(env, "GOVERNOR_FRAME_INTERVAL_MS"),
    },
    logLevel: read(env, "LOG_LEVEL"),
    pretty: isDev && env.PINO_PRETTY === "1",
    color: resolveColor(env, opts.isTTY ?? false),
  });

  if (!parsed.success) {
    throw new GovernorConfigError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return { key: ENV_KEYS[path] ?? path, message: issue.message };
      })
    );
  }

  return parsed.data;
}
