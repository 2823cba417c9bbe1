import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import { parse_log_level } from "../logger.js";

type Env = Record<string, string | undefined>;

function env_bool(env: Env, key: string, fallback: boolean): boolean {
  const v = String(env[key] || "").trim().toLowerCase();
  if (!v) return fallback;
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return fallback;
}

function env_str(env: Env, key: string, fallback: string): string {
  return String(env[key] || "").trim() || fallback;
}

export const HeartbeatConfigSchema = z.object({
  dataDir: z.string().min(1),
  dbPath: z.string().min(1),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  color: z.boolean(),
  motdTitle: z.string().min(1),
});

export type HeartbeatConfig = z.infer<typeof HeartbeatConfigSchema>;

export function load_config_from_env(env: Env = process.env): HeartbeatConfig {
  const dataDir = resolve(env_str(env, "HEARTBEAT_DATA_DIR", join(homedir(), ".heartbeat")));
  // NO_COLOR counts as set whatever its value, empty string included.
  const no_color = env.NO_COLOR !== undefined;

  const raw = {
    dataDir,
    dbPath: resolve(env_str(env, "HEARTBEAT_DB_PATH", join(dataDir, "heartbeats.db"))),
    logLevel: parse_log_level(env.LOG_LEVEL),
    color: env_bool(env, "HEARTBEAT_COLOR", !no_color),
    motdTitle: env_str(env, "HEARTBEAT_MOTD_TITLE", "Heartbeats"),
  };

  return HeartbeatConfigSchema.parse(raw);
}
