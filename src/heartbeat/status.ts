import type { ChalkInstance } from "chalk";
import { render_heartbeat, type HeartbeatRegistry } from "./registry.js";
import type { HeartbeatRecord, HeartbeatStatus } from "./types.js";

export function is_overdue(record: HeartbeatRecord, now_s: number): boolean {
  if (record.last_ping === null || record.leniency_seconds <= 0) return false;
  return now_s - record.last_ping > record.leniency_seconds;
}

export function heartbeat_status(record: HeartbeatRecord, now_s: number): HeartbeatStatus {
  return {
    code: record.code,
    line: render_heartbeat(record, now_s),
    never: record.last_ping === null,
    overdue: is_overdue(record, now_s),
  };
}

export function collect_statuses(registry: HeartbeatRegistry, now_s: number): HeartbeatStatus[] {
  return registry.list().map((record) => heartbeat_status(record, now_s));
}

export type MotdOptions = {
  title: string;
  paint: ChalkInstance;
};

/** Terminal-startup summary. Lines needing attention are painted red. */
export function format_motd(statuses: HeartbeatStatus[], options: MotdOptions): string[] {
  if (statuses.length === 0) return [];
  const { title, paint } = options;
  const lines = [paint.yellow(title), paint.yellow("=".repeat(title.length)), ""];
  for (const status of statuses) {
    const line = `* ${status.line}`;
    lines.push(status.never || status.overdue ? paint.red(line) : line);
  }
  return lines;
}

export function format_list(statuses: HeartbeatStatus[]): string[] {
  return statuses.map((status) => `${status.code}: ${status.line}`);
}
