/** Shared SQLite helper: one connection per call, always closed. */

import Database from "better-sqlite3";

type DatabaseSync = Database.Database;
export type { DatabaseSync };

export type SqliteRunOptions = {
  /** PRAGMAs applied right after opening (e.g. ["foreign_keys=ON"]). */
  pragmas?: string[];
  readonly?: boolean;
  /** fail instead of creating an empty database file. */
  file_must_exist?: boolean;
};

/** Open the database, run the callback, close. Errors propagate to the caller. */
export function with_sqlite_strict<T>(
  db_path: string,
  run: (db: DatabaseSync) => T,
  options?: SqliteRunOptions,
): T {
  let db: DatabaseSync | null = null;
  try {
    db = new Database(db_path, {
      readonly: options?.readonly ?? false,
      fileMustExist: options?.file_must_exist ?? false,
    });
    if (options?.pragmas) {
      for (const p of options.pragmas) db.pragma(p);
    }
    return run(db);
  } finally {
    db?.close();
  }
}
