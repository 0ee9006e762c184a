/**
 * Encoding resolver.
 *
 * Peels percent-encoding and base64 layers off captured text so the
 * detectors see what the user actually meant. Each round tries both
 * decodings; a candidate must decode to printable UTF-8 that differs from
 * its input, otherwise the round ends the chain. Base64 output must also be
 * mostly ASCII text, since short alphanumeric tokens such as `User0411`
 * happen to decode to valid but meaningless non-Latin characters.
 */

import { Buffer } from "node:buffer";
import { asciiTextRatio, decodeUtf8, printableRatio } from "../core/text.js";
import type { Encoding, EncodingResolution } from "../core/types.js";

const MIN_PRINTABLE_RATIO = 0.85;
const MIN_BASE64_LENGTH = 8;
const MIN_BASE64_ASCII_RATIO = 0.85;

const PERCENT_ESCAPE = /%[0-9A-Fa-f]{2}/;
const BASE64_BODY = /^[A-Za-z0-9+/]+={0,2}$/;
// Plain lowercase words are valid base64 too; real payloads mix in
// capitals, digits, symbols or padding.
const BASE64_MARKER = /[A-Z0-9+/=]/;

const encoder = new TextEncoder();

type Candidate = {
  encoding: Encoding;
  decoded: string;
  ratio: number;
};

export type EncodingOptions = {
  maxDepth?: number;
};

function percentDecode(text: string): string | null {
  if (!PERCENT_ESCAPE.test(text)) return null;
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "%" && /^[0-9A-Fa-f]{2}$/.test(text.slice(i + 1, i + 3))) {
      bytes.push(parseInt(text.slice(i + 1, i + 3), 16));
      i += 2;
      continue;
    }
    const code = text.codePointAt(i);
    if (code === undefined) continue;
    const char = String.fromCodePoint(code);
    for (const b of encoder.encode(char)) bytes.push(b);
    if (char.length === 2) i++;
  }
  return decodeUtf8(Uint8Array.from(bytes));
}

function base64Decode(text: string): string | null {
  const compact = text.replace(/\s+/g, "");
  if (compact.length < MIN_BASE64_LENGTH || compact.length % 4 !== 0) return null;
  if (!BASE64_BODY.test(compact) || !BASE64_MARKER.test(compact)) return null;
  return decodeUtf8(Buffer.from(compact, "base64"));
}

function accept(encoding: Encoding, input: string, decoded: string | null): Candidate | null {
  if (decoded === null) return null;
  if (decoded.trim().length === 0 || decoded === input) return null;
  const ratio = printableRatio(decoded);
  if (ratio < MIN_PRINTABLE_RATIO) return null;
  if (encoding === "base64" && asciiTextRatio(decoded) < MIN_BASE64_ASCII_RATIO) return null;
  return { encoding, decoded, ratio };
}

function decodeOnce(text: string): Candidate | null {
  const url = accept("url", text, percentDecode(text));
  const base64 = accept("base64", text, base64Decode(text));
  if (url && base64) return base64.ratio > url.ratio ? base64 : url;
  return url ?? base64;
}

export function resolveEncoding(text: string, options: EncodingOptions = {}): EncodingResolution {
  const maxDepth = options.maxDepth ?? 3;
  const steps: Encoding[] = [];
  let current = text;
  let lastRatio = 0;

  for (let round = 0; round < maxDepth; round++) {
    const next = decodeOnce(current);
    if (!next) break;
    steps.push(next.encoding);
    current = next.decoded;
    lastRatio = next.ratio;
  }

  if (steps.length === 0) {
    return { original: text, decoded: text, steps, confidence: 0 };
  }

  const confidence = Math.min(
    0.95,
    0.75 + 0.05 * steps.length + (0.1 * (lastRatio - MIN_PRINTABLE_RATIO)) / 0.15,
  );
  return { original: text, decoded: current, steps, confidence };
}
