import { z } from "zod";
import { MalformedRecordError } from "./errors.js";
import { count_placeholders } from "./template.js";
import type { HeartbeatDraft, HeartbeatRecord } from "./types.js";

export const HeartbeatDraftSchema = z.object({
  code: z.string().trim().min(1, "code must not be empty"),
  last_message_template: z.string().refine((t) => count_placeholders(t) === 1, {
    message: "must contain exactly one %s placeholder",
  }),
  never_message: z.string(),
  leniency_seconds: z.number().int().min(0),
});

export const HeartbeatRecordSchema = HeartbeatDraftSchema.extend({
  last_ping: z.number().int().min(0).nullable(),
});

export function format_issues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "record"}: ${issue.message}`)
    .join("; ");
}

function code_of(input: unknown): string | null {
  if (!input || typeof input !== "object" || !("code" in input)) return null;
  return typeof input.code === "string" ? input.code : null;
}

export function parse_heartbeat_draft(input: unknown): HeartbeatDraft {
  const parsed = HeartbeatDraftSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedRecordError(`invalid heartbeat: ${format_issues(parsed.error)}`, code_of(input));
  }
  return parsed.data;
}

/** `source` names where the record came from (e.g. a database row) for the error message. */
export function parse_heartbeat_record(input: unknown, source = "record"): HeartbeatRecord {
  const parsed = HeartbeatRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedRecordError(`invalid ${source}: ${format_issues(parsed.error)}`, code_of(input));
  }
  return parsed.data;
}
