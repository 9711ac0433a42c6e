/**
 * Unicode character classes for basic segmentation.
 *
 * `\t`, `\n` and `\r` are whitespace and never control characters. Every
 * non-alphanumeric printable ASCII character is punctuation, including the
 * ones Unicode files under symbols (`$`, `+`, `^`, `` ` ``, ...).
 */

const SPACE_SEPARATOR = /^\p{Zs}$/u;
const OTHER = /^\p{C}$/u;
const PUNCTUATION = /^\p{P}$/u;
const NONSPACING_MARKS = /\p{Mn}/gu;

/** Closed code point intervals of the CJK Unified Ideograph blocks. */
const CJK_RANGES: readonly (readonly [number, number])[] = [
  [0x4e00, 0x9fff],
  [0x3400, 0x4dbf],
  [0x20000, 0x2a6df],
  [0x2a700, 0x2b73f],
  [0x2b740, 0x2b81f],
  [0x2b820, 0x2ceaf],
  [0xf900, 0xfaff],
  [0x2f800, 0x2fa1f],
];

export function isWhitespace(ch: string): boolean {
  if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") return true;
  return SPACE_SEPARATOR.test(ch);
}

export function isControl(ch: string): boolean {
  if (ch === "\t" || ch === "\n" || ch === "\r") return false;
  return OTHER.test(ch);
}

export function isPunctuation(ch: string): boolean {
  const cp = ch.codePointAt(0) ?? 0;
  if (
    (cp >= 33 && cp <= 47) ||
    (cp >= 58 && cp <= 64) ||
    (cp >= 91 && cp <= 96) ||
    (cp >= 123 && cp <= 126)
  ) {
    return true;
  }
  return PUNCTUATION.test(ch);
}

/**
 * Whether the code point is a CJK ideograph. Hangul, Hiragana and Katakana
 * are not: those scripts separate words with spaces.
 */
export function isCjkCodePoint(cp: number): boolean {
  for (const [start, end] of CJK_RANGES) {
    if (cp >= start && cp <= end) return true;
  }
  return false;
}

/** Drop NUL, U+FFFD and control characters; map whitespace to a space. */
export function cleanText(text: string): string {
  const out: string[] = [];
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp === 0 || cp === 0xfffd || isControl(ch)) continue;
    out.push(isWhitespace(ch) ? " " : ch);
  }
  return out.join("");
}

/** Surround every CJK ideograph with spaces. */
export function isolateCjk(text: string): string {
  const out: string[] = [];
  for (const ch of text) {
    if (isCjkCodePoint(ch.codePointAt(0) ?? 0)) {
      out.push(" ", ch, " ");
    } else {
      out.push(ch);
    }
  }
  return out.join("");
}

/** Canonical decomposition with nonspacing marks removed (no recomposition). */
export function stripAccents(text: string): string {
  return text.normalize("NFD").replace(NONSPACING_MARKS, "");
}
