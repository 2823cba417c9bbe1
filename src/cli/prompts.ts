import { createInterface, type Interface } from "node:readline/promises";
import { MalformedRecordError } from "../heartbeat/errors.js";
import type { HeartbeatDraft } from "../heartbeat/types.js";

export type PromptFn = (question: string) => Promise<string>;

export type ReadlinePrompt = {
  ask: PromptFn;
  close(): void;
};

/** stdin is only attached once a question is asked, so non-interactive runs never hold it open. */
export function create_readline_prompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ReadlinePrompt {
  let rl: Interface | null = null;
  return {
    ask(question) {
      rl ??= createInterface({ input, output });
      return rl.question(question);
    },
    close() {
      rl?.close();
      rl = null;
    },
  };
}

/** Blank means no threshold (0). */
export function parse_leniency(raw: string): number {
  const v = raw.trim();
  if (!v) return 0;
  if (!/^\d+$/.test(v)) {
    throw new MalformedRecordError(`invalid heartbeat: leniency_seconds: expected a whole number of seconds, got '${v}'`);
  }
  return Number(v);
}

export async function prompt_heartbeat_draft(ask: PromptFn): Promise<HeartbeatDraft> {
  const code = (await ask("Code: ")).trim();
  const last_message_template = await ask("Last line: ");
  const never_message = await ask("Never line: ");
  const leniency_seconds = parse_leniency(await ask("Leniency (seconds): "));
  return { code, last_message_template, never_message, leniency_seconds };
}
