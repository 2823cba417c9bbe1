export function now_ms(): number {
  return Date.now();
}

/** whole epoch seconds, the resolution heartbeats are stored at. */
export function now_s(): number {
  return Math.floor(now_ms() / 1000);
}
