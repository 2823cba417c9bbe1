#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import chalk, { Chalk } from "chalk";
import { create_readline_prompt, run_cli, type CliDeps } from "./cli/index.js";
import { load_config_from_env, type HeartbeatConfig } from "./config/schema.js";
import { SqliteHeartbeatStore } from "./heartbeat/index.js";
import { create_logger } from "./logger.js";
import { now_s } from "./utils/common.js";

export function create_cli_deps(config: HeartbeatConfig, ask: CliDeps["prompt"]): CliDeps {
  const logger = create_logger("heartbeat", config.logLevel);
  return {
    store: new SqliteHeartbeatStore(config.dbPath, { logger: logger.child("store") }),
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    prompt: ask,
    now_s,
    is_tty: Boolean(process.stdout.isTTY),
    paint: new Chalk({ level: config.color ? chalk.level : 0 }),
    motd_title: config.motdTitle,
    logger,
  };
}

function is_main_entry(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  // npm installs the bin as a symlink.
  const entry = realpathSync(resolve(argv1));
  const current = realpathSync(fileURLToPath(import.meta.url));
  return entry === current;
}

if (is_main_entry()) {
  void (async () => {
    const config = load_config_from_env();
    const prompt = create_readline_prompt();
    try {
      process.exitCode = await run_cli(process.argv.slice(2), create_cli_deps(config, prompt.ask));
    } finally {
      prompt.close();
    }
  })().catch((error) => {
    const detail = error instanceof Error ? error.message : JSON.stringify(error, null, 2);
    create_logger("boot", "error").error(`heartbeat failed: ${detail}`);
    process.exit(1);
  });
}
