import { DuplicateCodeError, MalformedRecordError, NotFoundError } from "./errors.js";
import { humanize } from "./interval.js";
import { fill_template } from "./template.js";
import type { HeartbeatDraft, HeartbeatRecord } from "./types.js";
import { parse_heartbeat_draft } from "./validation.js";

/**
 * Display line for one record: the never message verbatim until the first
 * ping, then the template filled with the time since. A ping stamped in the
 * future (clock skew) renders as zero elapsed.
 */
export function render_heartbeat(record: HeartbeatRecord, now_s: number): string {
  if (record.last_ping === null) return record.never_message;
  return fill_template(record.last_message_template, humanize(Math.max(0, now_s - record.last_ping)));
}

/**
 * In-memory heartbeat set for one invocation. Records keep insertion order;
 * every successful mutation marks the registry dirty so the caller knows to
 * persist it.
 */
export class HeartbeatRegistry {
  private readonly records = new Map<string, HeartbeatRecord>();
  private _dirty = false;

  constructor(records: Iterable<HeartbeatRecord> = []) {
    for (const record of records) {
      if (this.records.has(record.code)) {
        throw new MalformedRecordError(`duplicate heartbeat '${record.code}' in stored data`, record.code);
      }
      this.records.set(record.code, { ...record });
    }
  }

  get dirty(): boolean {
    return this._dirty;
  }

  get size(): number {
    return this.records.size;
  }

  mark_clean(): void {
    this._dirty = false;
  }

  has(code: string): boolean {
    return this.records.has(code);
  }

  get(code: string): HeartbeatRecord | null {
    const record = this.records.get(code);
    return record ? { ...record } : null;
  }

  add(draft: HeartbeatDraft): HeartbeatRecord {
    const valid = parse_heartbeat_draft(draft);
    if (this.records.has(valid.code)) throw new DuplicateCodeError(valid.code);
    const record: HeartbeatRecord = { ...valid, last_ping: null };
    this.records.set(record.code, record);
    this._dirty = true;
    return { ...record };
  }

  remove(code: string): HeartbeatRecord {
    const record = this.require(code);
    this.records.delete(code);
    this._dirty = true;
    return { ...record };
  }

  ping(code: string, now_s: number): HeartbeatRecord {
    const record = this.require(code);
    record.last_ping = Math.floor(now_s);
    this._dirty = true;
    return { ...record };
  }

  list(): HeartbeatRecord[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  render(code: string, now_s: number): string {
    return render_heartbeat(this.require(code), now_s);
  }

  private require(code: string): HeartbeatRecord {
    const record = this.records.get(code);
    if (!record) throw new NotFoundError(code);
    return record;
  }
}
