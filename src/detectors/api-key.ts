/**
 * API key detection.
 *
 * A provider-tagged pattern table, checked in order. Specific prefixes come
 * first so a key is credited to the most precise provider; generic
 * assignments and bearer tokens are last and carry lower confidence.
 */

import { overlapsAny } from "../core/spans.js";
import type { Detection, Detector, Span } from "../core/types.js";
import type { ApiKeyItem } from "../metadata/schema.js";

type KeyPattern = {
  provider: string;
  pattern: RegExp;
  confidence?: number;
  /** Capture group holding the key; the whole match when absent. */
  group?: number;
  /**
   * No provider prefix: the key must be delimited by whitespace or quoting
   * punctuation and mix upper, lower and digit characters.
   */
  prefixless?: boolean;
};

const DEFAULT_CONFIDENCE = 0.95;
const MIN_TEXT_LENGTH = 16;

const KEY_PATTERNS: KeyPattern[] = [
  // OpenAI
  { provider: "OpenAI", pattern: /sk-[a-zA-Z0-9]{20}T3BlbkFJ[a-zA-Z0-9]{20}/g },
  { provider: "OpenAI", pattern: /sk-proj-[a-zA-Z0-9\-_]{80,180}/g },
  { provider: "OpenAI", pattern: /sk-[a-zA-Z0-9]{48}/g, confidence: 0.85 },
  // Anthropic
  { provider: "Anthropic", pattern: /sk-ant-api03-[a-zA-Z0-9\-_]{93}/g },
  { provider: "Anthropic", pattern: /sk-ant-[a-zA-Z0-9\-_]{40,100}/g, confidence: 0.9 },
  // Cloud
  { provider: "Google Cloud", pattern: /AIza[0-9A-Za-z\-_]{35}/g },
  { provider: "AWS", pattern: /AKIA[0-9A-Z]{16}/g },
  { provider: "DigitalOcean", pattern: /do[op]_v1_[a-f0-9]{64}/g },
  // Source hosting and registries
  { provider: "GitHub", pattern: /gh[pousr]_[a-zA-Z0-9]{36}/g },
  { provider: "GitHub", pattern: /github_pat_[a-zA-Z0-9]{22}_[a-zA-Z0-9]{59}/g },
  { provider: "npm", pattern: /npm_[a-zA-Z0-9]{36}/g },
  { provider: "PyPI", pattern: /pypi-[A-Za-z0-9\-_]{100,}/g },
  // Payments and messaging
  { provider: "Stripe", pattern: /(?:sk|pk|rk)_(?:live|test)_[a-zA-Z0-9]{24,}/g },
  { provider: "Slack", pattern: /xox[bp]-[0-9]{10,13}-[0-9]{10,13}-[a-zA-Z0-9]{24}/g },
  { provider: "Slack", pattern: /xapp-[0-9]-[A-Z0-9]+-[0-9]+-[a-f0-9]{64}/g },
  {
    provider: "Slack",
    pattern: /https:\/\/hooks\.slack\.com\/services\/T[A-Z0-9]+\/B[A-Z0-9]+\/[a-zA-Z0-9]{24}/g,
  },
  { provider: "Twilio", pattern: /(?:SK|AC)[a-f0-9]{32}/g },
  { provider: "SendGrid", pattern: /SG\.[\w-]{22}\.[\w-]{43}/g },
  { provider: "Mailgun", pattern: /key-[a-f0-9]{32}/g },
  { provider: "Discord", pattern: /[MN][A-Za-z\d]{23,}\.[\w-]{6}\.[\w-]{27}/g },
  {
    provider: "Discord",
    pattern: /https:\/\/discord(?:app)?\.com\/api\/webhooks\/[0-9]+\/[A-Za-z0-9_-]+/g,
  },
  { provider: "Firebase", pattern: /AAAA[A-Za-z0-9_-]{7}:[A-Za-z0-9_-]{140}/g },
  // Developer platforms
  { provider: "Linear", pattern: /lin_api_[a-zA-Z0-9]{40}/g },
  { provider: "Supabase", pattern: /sbp_[a-f0-9]{40}/g },
  { provider: "Replicate", pattern: /r8_[a-zA-Z0-9]{37}/g },
  { provider: "HuggingFace", pattern: /hf_[a-zA-Z0-9]{34}/g },
  { provider: "Mapbox", pattern: /[ps]k\.[a-zA-Z0-9]{60,}\.[a-zA-Z0-9_-]{20,}/g },
  { provider: "PlanetScale", pattern: /pscale_tkn_[a-zA-Z0-9_-]{43}/g },
  // No prefix at all, so the weakest of the specific patterns.
  {
    provider: "AWS Secret",
    pattern: /(?<![A-Za-z0-9/+=])[A-Za-z0-9/+=]{40}(?![A-Za-z0-9/+=])/g,
    confidence: 0.7,
    prefixless: true,
  },
  // Generic
  {
    provider: "Generic",
    pattern: /(?:api[_-]?key|secret[_-]?key|access[_-]?token)\s*[=:]\s*["']?([A-Za-z0-9\-_.]{20,})/gi,
    confidence: 0.65,
    group: 1,
  },
  { provider: "Bearer Token", pattern: /Bearer\s+([A-Za-z0-9\-_.=]{20,})/g, confidence: 0.8, group: 1 },
];

const DELIMITERS = " \t\n\r\"'=:,;()[]{}<>|`";
const ALPHANUMERIC = /^[A-Za-z0-9]$/;

const TEST_INDICATORS = [
  "test",
  "example",
  "sample",
  "demo",
  "fake",
  "dummy",
  "placeholder",
  "xxx",
  "your_",
  "your-",
  "insert",
  "replace",
  "todo",
  "fixme",
  "changeme",
  "secret_here",
  "key_here",
  "0000000",
  "1111111",
  "aaaaaaa",
  "abcdef",
];

function isDelimited(text: string, span: Span, strict: boolean): boolean {
  const isBoundary = (ch: string) => ch === "" || (strict ? DELIMITERS.includes(ch) : !ALPHANUMERIC.test(ch));
  const before = span.start === 0 ? "" : text.charAt(span.start - 1);
  const after = span.end >= text.length ? "" : text.charAt(span.end);
  return isBoundary(before) && isBoundary(after);
}

function hasMixedCharacters(key: string): boolean {
  return /[A-Z]/.test(key) && /[a-z]/.test(key) && /\d/.test(key);
}

export function isTestOrExampleKey(key: string): boolean {
  const lower = key.toLowerCase();
  if (TEST_INDICATORS.some((marker) => lower.includes(marker))) return true;
  const distinct = new Set(lower.replace(/[^a-z0-9]/g, ""));
  return key.length > 10 && distinct.size < 4;
}

export const apiKeyDetector: Detector<ApiKeyItem> = {
  detect(text, ctx) {
    if (text.length < MIN_TEXT_LENGTH) return [];

    const seen = new Set<string>();
    const claimed: Span[] = [];
    const found: Detection<ApiKeyItem>[] = [];

    for (const { provider, pattern, confidence, group = 0, prefixless = false } of KEY_PATTERNS) {
      for (const m of text.matchAll(pattern)) {
        const key = m[group];
        if (m.index === undefined || key === undefined) continue;
        const start = m.index + (group === 0 ? 0 : m[0].lastIndexOf(key));
        const span = { start, end: start + key.length };

        if (!isDelimited(text, span, prefixless)) continue;
        if (prefixless && !hasMixedCharacters(key)) continue;
        if (overlapsAny(span, ctx.ignoreSpans) || overlapsAny(span, claimed)) continue;
        if (seen.has(key)) continue;

        const isLikelyLive = !isTestOrExampleKey(key);
        const base = confidence ?? DEFAULT_CONFIDENCE;
        seen.add(key);
        claimed.push(span);
        found.push({
          match: key,
          span,
          item: { key, provider, isLikelyLive, confidence: isLikelyLive ? base : base * 0.5 },
        });
      }
    }

    found.sort((a, b) => b.item.confidence - a.item.confidence);
    const top = found[0];
    if (!top || top.item.confidence < 0.85) return found;
    return found.filter(
      (d) => d.item.confidence >= 0.6 || d.item.provider === top.item.provider,
    );
  },
};
