export type HeartbeatErrorCode =
  | "duplicate_code"
  | "not_found"
  | "persistence_failed"
  | "malformed_record";

export abstract class HeartbeatError extends Error {
  abstract readonly code: HeartbeatErrorCode;
  /** heartbeat code the failure is about, when there is one. */
  readonly heartbeat: string | null;

  constructor(message: string, heartbeat: string | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.heartbeat = heartbeat;
  }
}

export class DuplicateCodeError extends HeartbeatError {
  readonly code = "duplicate_code";

  constructor(heartbeat: string) {
    super(`heartbeat '${heartbeat}' already exists`, heartbeat);
  }
}

export class NotFoundError extends HeartbeatError {
  readonly code = "not_found";

  constructor(heartbeat: string) {
    super(`heartbeat '${heartbeat}' not found`, heartbeat);
  }
}

export class PersistenceError extends HeartbeatError {
  readonly code = "persistence_failed";
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(`${message}: ${path}`, null, { cause });
    this.path = path;
  }
}

export class MalformedRecordError extends HeartbeatError {
  readonly code = "malformed_record";
}

export function is_heartbeat_error(e: unknown): e is HeartbeatError {
  return e instanceof HeartbeatError;
}
