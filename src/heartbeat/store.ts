import { existsSync, mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { Logger } from "../logger.js";
import { with_sqlite_strict } from "../utils/sqlite-helper.js";
import { PersistenceError } from "./errors.js";
import { HeartbeatRegistry } from "./registry.js";
import { parse_heartbeat_record } from "./validation.js";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS heartbeats (
    code TEXT PRIMARY KEY,
    position INTEGER NOT NULL,
    last_message_template TEXT NOT NULL,
    never_message TEXT NOT NULL,
    leniency_seconds INTEGER NOT NULL,
    last_ping INTEGER
  );
`;

export interface HeartbeatStoreLike {
  load(): HeartbeatRegistry;
  save(registry: HeartbeatRegistry): void;
  get_path(): string;
}

export type SqliteHeartbeatStoreOptions = {
  logger?: Logger | null;
};

/**
 * Whole-set persistence: load reads every row, save rewrites the table in one
 * transaction. Row order is kept in `position`.
 */
export class SqliteHeartbeatStore implements HeartbeatStoreLike {
  readonly sqlite_path: string;
  private readonly logger: Logger | null;

  constructor(sqlite_path: string, options?: SqliteHeartbeatStoreOptions) {
    this.sqlite_path = resolve(sqlite_path);
    this.logger = options?.logger ?? null;
  }

  get_path(): string {
    return this.sqlite_path;
  }

  load(): HeartbeatRegistry {
    if (!existsSync(this.sqlite_path)) {
      this.logger?.debug("no heartbeat database yet", { path: this.sqlite_path });
      return new HeartbeatRegistry();
    }

    let rows: unknown[];
    try {
      rows = with_sqlite_strict(this.sqlite_path, (db) => {
        const table = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'heartbeats'").get();
        if (!table) return [];
        return db.prepare(`
          SELECT code, last_message_template, never_message, leniency_seconds, last_ping
          FROM heartbeats
          ORDER BY position ASC
        `).all();
      }, { readonly: true, file_must_exist: true });
    } catch (e) {
      throw new PersistenceError("could not read heartbeats", this.sqlite_path, e);
    }

    const records = rows.map((row, i) => parse_heartbeat_record(row, `stored heartbeat #${i + 1}`));
    this.logger?.debug("heartbeats loaded", { path: this.sqlite_path, count: records.length });
    return new HeartbeatRegistry(records);
  }

  save(registry: HeartbeatRegistry): void {
    const records = registry.list();
    try {
      mkdirSync(dirname(this.sqlite_path), { recursive: true });
      with_sqlite_strict(this.sqlite_path, (db) => {
        db.exec(SCHEMA_SQL);
        db.exec("BEGIN IMMEDIATE");
        try {
          db.prepare("DELETE FROM heartbeats").run();
          const stmt = db.prepare(`
            INSERT INTO heartbeats (
              code, position, last_message_template, never_message, leniency_seconds, last_ping
            ) VALUES (?, ?, ?, ?, ?, ?)
          `);
          records.forEach((record, position) => {
            stmt.run(
              record.code,
              position,
              record.last_message_template,
              record.never_message,
              record.leniency_seconds,
              record.last_ping,
            );
          });
          db.exec("COMMIT");
        } catch (e) {
          db.exec("ROLLBACK");
          throw e;
        }
      });
    } catch (e) {
      throw new PersistenceError("could not save heartbeats", this.sqlite_path, e);
    }
    registry.mark_clean();
    this.logger?.debug("heartbeats saved", { path: this.sqlite_path, count: records.length });
  }
}

/**
 * Load, run, then persist if anything changed. The save runs on every exit
 * path, including when `run` throws after a mutation.
 */
export function with_heartbeats<T>(store: HeartbeatStoreLike, run: (registry: HeartbeatRegistry) => T): T {
  const registry = store.load();
  try {
    return run(registry);
  } finally {
    if (registry.dirty) store.save(registry);
  }
}
