const QUOTE = '"';
const BACKSLASH = '\\';

/**
 * Quoted wire form of a version token. A `"` already escaped by an odd run of
 * backslashes is left alone; every other `"` gets a backslash.
 */
export function toEtag(value: string): string {
  let out = '';
  let backslashes = 0;
  for (const ch of value) {
    if (ch === QUOTE && backslashes % 2 === 0) out += BACKSLASH;
    out += ch;
    backslashes = ch === BACKSLASH ? backslashes + 1 : 0;
  }
  return `${QUOTE}${out}${QUOTE}`;
}

/** Strips one leading and one trailing quote (when both are present) and unescapes `\"`. */
export function fromEtag(etag: string): string {
  let value = etag;
  if (value.length >= 2 && value.startsWith(QUOTE) && value.endsWith(QUOTE)) {
    value = value.slice(1, -1);
  }
  return value.split(`${BACKSLASH}${QUOTE}`).join(QUOTE);
}
