/**
 * Small text utilities used across the pipeline.
 */

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Strict UTF-8 decode. Returns null for malformed byte sequences. */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

const CONTROL = /[\p{Cc}\p{Cs}\uFFFD]/u;

/**
 * Share of characters that are printable. Tab, newline and carriage return
 * count as printable.
 */
export function printableRatio(text: string): number {
  let total = 0;
  let printable = 0;
  for (const ch of text) {
    total++;
    if (ch === "\t" || ch === "\n" || ch === "\r" || !CONTROL.test(ch)) printable++;
  }
  return total === 0 ? 0 : printable / total;
}

const ASCII_TEXT = /^[\x20-\x7E\t\n\r]$/;

/** Share of characters that are printable ASCII or ASCII whitespace. */
export function asciiTextRatio(text: string): number {
  let total = 0;
  let ascii = 0;
  for (const ch of text) {
    total++;
    if (ASCII_TEXT.test(ch)) ascii++;
  }
  return total === 0 ? 0 : ascii / total;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

export function trimChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text.charAt(start))) start++;
  while (end > start && chars.includes(text.charAt(end - 1))) end--;
  return text.slice(start, end);
}

export function trimTrailing(text: string, chars: string): string {
  let end = text.length;
  while (end > 0 && chars.includes(text.charAt(end - 1))) end--;
  return text.slice(0, end);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
