export {
  DuplicateCodeError,
  HeartbeatError,
  MalformedRecordError,
  NotFoundError,
  PersistenceError,
  is_heartbeat_error,
} from "./errors.js";
export { ZERO_DURATION, decompose_seconds, humanize } from "./interval.js";
export { HeartbeatRegistry, render_heartbeat } from "./registry.js";
export { collect_statuses, format_list, format_motd, heartbeat_status, is_overdue } from "./status.js";
export { SqliteHeartbeatStore, with_heartbeats } from "./store.js";
export { count_placeholders, fill_template } from "./template.js";
export { parse_heartbeat_draft, parse_heartbeat_record } from "./validation.js";
export { DURATION_PLACEHOLDER } from "./types.js";
export type { HeartbeatErrorCode } from "./errors.js";
export type { MotdOptions } from "./status.js";
export type { HeartbeatStoreLike, SqliteHeartbeatStoreOptions } from "./store.js";
export type { DurationParts, HeartbeatDraft, HeartbeatRecord, HeartbeatStatus } from "./types.js";
