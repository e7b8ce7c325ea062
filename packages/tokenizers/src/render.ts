/**
 * Human-readable rendering of tokens for the `.vocab` file and CLI output.
 */

const hex = (n: number, width: number): string =>
  n.toString(16).padStart(width, "0");

/**
 * Render raw token bytes. Control bytes (0x00-0x1f, 0x7f) become `\xHH`;
 * every other byte is shown as the character with that code point.
 */
export function renderToken(bytes: ArrayLike<number>): string {
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i];
    out += b <= 0x1f || b === 0x7f ? `\\x${hex(b, 2)}` : String.fromCharCode(b);
  }
  return out;
}

/** Escape Unicode control characters (C0, DEL and C1) as `\uHHHH`. */
export function replaceControlCharacters(s: string): string {
  let out = "";
  for (const ch of s) {
    const cp = ch.codePointAt(0) ?? 0;
    const control = cp <= 0x1f || (cp >= 0x7f && cp <= 0x9f);
    out += control ? `\\u${hex(cp, 4)}` : ch;
  }
  return out;
}
