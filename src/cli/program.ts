import type { ChalkInstance } from "chalk";
import { Command, CommanderError } from "commander";
import { is_heartbeat_error } from "../heartbeat/errors.js";
import { collect_statuses, format_list, format_motd } from "../heartbeat/status.js";
import { with_heartbeats, type HeartbeatStoreLike } from "../heartbeat/store.js";
import type { Logger } from "../logger.js";
import { prompt_heartbeat_draft, type PromptFn } from "./prompts.js";

export type CliDeps = {
  store: HeartbeatStoreLike;
  out: (line: string) => void;
  err: (line: string) => void;
  prompt: PromptFn;
  /** current time in whole epoch seconds. */
  now_s: () => number;
  /** whether stdout is a terminal; motd stays silent otherwise. */
  is_tty: boolean;
  paint: ChalkInstance;
  motd_title: string;
  logger?: Logger | null;
};

type CliOptions = {
  motd?: boolean;
  list?: boolean;
  add?: boolean;
  remove?: string;
  ping?: string;
};

export type CliAction =
  | { kind: "motd" }
  | { kind: "add" }
  | { kind: "remove"; code: string }
  | { kind: "ping"; code: string }
  | { kind: "list" };

/** With several flags the first of motd, add, remove, ping, list wins. */
export function resolve_action(opts: CliOptions): CliAction | null {
  if (opts.motd) return { kind: "motd" };
  if (opts.add) return { kind: "add" };
  if (opts.remove !== undefined) return { kind: "remove", code: opts.remove };
  if (opts.ping !== undefined) return { kind: "ping", code: opts.ping };
  if (opts.list) return { kind: "list" };
  return null;
}

export function build_program(deps: Pick<CliDeps, "out" | "err">): Command {
  return new Command("heartbeat")
    .description("Track when things were last done and show how long ago at terminal startup")
    .option("--motd", "print the heartbeat summary (only when stdout is a terminal)")
    .option("--list", "list every heartbeat with its status line")
    .option("--add", "add a heartbeat, prompting for its fields")
    .option("--remove <code>", "remove a heartbeat")
    .option("--ping <code>", "record that a heartbeat happened now")
    .exitOverride()
    .configureOutput({
      writeOut: (s) => deps.out(s.trimEnd()),
      writeErr: (s) => deps.err(s.trimEnd()),
    });
}

async function perform(action: CliAction, deps: CliDeps): Promise<void> {
  const { store, out } = deps;
  switch (action.kind) {
    case "motd": {
      if (!deps.is_tty) return;
      const statuses = with_heartbeats(store, (registry) => collect_statuses(registry, deps.now_s()));
      for (const line of format_motd(statuses, { title: deps.motd_title, paint: deps.paint })) out(line);
      return;
    }
    case "list": {
      const statuses = with_heartbeats(store, (registry) => collect_statuses(registry, deps.now_s()));
      for (const line of format_list(statuses)) out(line);
      return;
    }
    case "add": {
      const draft = await prompt_heartbeat_draft(deps.prompt);
      const record = with_heartbeats(store, (registry) => registry.add(draft));
      out(`added ${record.code}`);
      return;
    }
    case "remove": {
      const record = with_heartbeats(store, (registry) => registry.remove(action.code));
      out(`removed ${record.code}`);
      return;
    }
    case "ping": {
      const record = with_heartbeats(store, (registry) => registry.ping(action.code, deps.now_s()));
      out(`pinged ${record.code}`);
      return;
    }
  }
}

/** Runs one invocation and returns the process exit code. */
export async function run_cli(argv: string[], deps: CliDeps): Promise<number> {
  const program = build_program(deps);
  try {
    program.parse(argv, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }

  const action = resolve_action(program.opts<CliOptions>());
  if (!action) {
    program.outputHelp();
    return 0;
  }

  deps.logger?.debug("run", { action: action.kind, store: deps.store.get_path() });
  try {
    await perform(action, deps);
    return 0;
  } catch (e) {
    if (!is_heartbeat_error(e)) throw e;
    deps.logger?.debug("failed", { code: e.code, heartbeat: e.heartbeat ?? undefined });
    deps.err(`heartbeat: ${e.message}`);
    return 1;
  }
}
