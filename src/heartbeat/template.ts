import { DURATION_PLACEHOLDER } from "./types.js";

const TOKEN_RE = /%%|%s/g;

/** Number of `%s` substitution points; `%%` is an escaped percent sign, not a placeholder. */
export function count_placeholders(template: string): number {
  let n = 0;
  for (const m of template.matchAll(TOKEN_RE)) {
    if (m[0] === DURATION_PLACEHOLDER) n += 1;
  }
  return n;
}

export function fill_template(template: string, value: string): string {
  return template.replace(TOKEN_RE, (token) => (token === DURATION_PLACEHOLDER ? value : "%"));
}
