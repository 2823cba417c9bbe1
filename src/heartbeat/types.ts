/** Placeholder in `last_message_template` that receives the humanized duration. */
export const DURATION_PLACEHOLDER = "%s";

export type HeartbeatRecord = {
  code: string;
  last_message_template: string;
  never_message: string;
  leniency_seconds: number;
  /** epoch seconds; null until the first ping. */
  last_ping: number | null;
};

/** Input to `HeartbeatRegistry.add`: a record before it has ever been pinged. */
export type HeartbeatDraft = Omit<HeartbeatRecord, "last_ping">;

export type HeartbeatStatus = {
  code: string;
  line: string;
  never: boolean;
  overdue: boolean;
};

export type DurationParts = {
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
};
