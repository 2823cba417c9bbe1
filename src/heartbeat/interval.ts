import type { DurationParts } from "./types.js";

const SECONDS_PER_DAY = 86_400;
const SECONDS_PER_HOUR = 3_600;
const SECONDS_PER_MINUTE = 60;

const UNITS: ReadonlyArray<readonly [keyof DurationParts, string, string]> = [
  ["days", "day", "days"],
  ["hours", "hour", "hours"],
  ["minutes", "minute", "minutes"],
  ["seconds", "second", "seconds"],
];

export const ZERO_DURATION = "0 seconds";

function whole_seconds(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new RangeError(`duration must be a non-negative number of seconds, got ${seconds}`);
  }
  return Math.floor(seconds);
}

export function decompose_seconds(seconds: number): DurationParts {
  let rest = whole_seconds(seconds);
  const days = Math.floor(rest / SECONDS_PER_DAY);
  rest %= SECONDS_PER_DAY;
  const hours = Math.floor(rest / SECONDS_PER_HOUR);
  rest %= SECONDS_PER_HOUR;
  const minutes = Math.floor(rest / SECONDS_PER_MINUTE);
  return { days, hours, minutes, seconds: rest % SECONDS_PER_MINUTE };
}

export function format_count(count: number, single: string, plural: string): string {
  return `${count} ${count === 1 ? single : plural}`;
}

/** "a, b and c" */
export function join_parts(parts: string[]): string {
  if (parts.length <= 1) return parts.join("");
  return `${parts.slice(0, -1).join(", ")} and ${parts[parts.length - 1]}`;
}

/**
 * Render an elapsed time as English, largest unit first, zero units omitted.
 *
 *   humanize(93784) === "1 day, 2 hours, 3 minutes and 4 seconds"
 *
 * Fractions are floored. Under one second yields {@link ZERO_DURATION}.
 */
export function humanize(seconds: number): string {
  const parts = decompose_seconds(seconds);
  const out: string[] = [];
  for (const [key, single, plural] of UNITS) {
    if (parts[key] > 0) out.push(format_count(parts[key], single, plural));
  }
  return out.length > 0 ? join_parts(out) : ZERO_DURATION;
}
