import { z } from "zod";
import { loadDataFile } from "../core/data.js";
import { overlapsAny } from "../core/spans.js";
import type { Detection, Detector } from "../core/types.js";
import type { UrlItem } from "../metadata/schema.js";

const CategoryTableSchema = z.object({
  rules: z.array(
    z.object({
      category: z.string(),
      domains: z.array(z.string()),
      subdomains: z.boolean(),
    }),
  ),
  suffixes: z.array(z.object({ category: z.string(), suffix: z.string() })),
  fallback: z.string(),
});

const CATEGORIES = loadDataFile("url-categories.json", CategoryTableSchema);

const URL_PATTERN = /(?<![\w.+-])(?:https?|ftp):\/\/[^\s<>"'`]+/gi;
const TRAILING = ".,;:!?'\"]}>";

function stripTrailing(raw: string): string {
  let url = raw;
  for (;;) {
    const last = url.charAt(url.length - 1);
    if (TRAILING.includes(last)) {
      url = url.slice(0, -1);
      continue;
    }
    // Keep a closing paren that balances one inside the URL.
    if (last === ")" && url.split("(").length < url.split(")").length) {
      url = url.slice(0, -1);
      continue;
    }
    return url;
  }
}

export function categorizeDomain(domain: string): string {
  for (const rule of CATEGORIES.rules) {
    for (const d of rule.domains) {
      if (domain === d || (rule.subdomains && domain.endsWith(`.${d}`))) return rule.category;
    }
  }
  for (const { category, suffix } of CATEGORIES.suffixes) {
    if (domain.endsWith(suffix)) return category;
  }
  return CATEGORIES.fallback;
}

export const urlDetector: Detector<UrlItem> = {
  detect(text, ctx) {
    const seen = new Set<string>();
    const found: Detection<UrlItem>[] = [];

    for (const m of text.matchAll(URL_PATTERN)) {
      if (m.index === undefined) continue;
      const url = stripTrailing(m[0]);
      const span = { start: m.index, end: m.index + url.length };
      if (overlapsAny(span, ctx.ignoreSpans) || seen.has(url)) continue;

      let parsed: URL;
      try {
        parsed = new URL(url);
      } catch {
        continue;
      }
      const domain = parsed.hostname.toLowerCase();
      if (!domain) continue;

      seen.add(url);
      found.push({
        match: url,
        span,
        item: { url, domain, category: categorizeDomain(domain), hotCount: 1, confidence: 0.95 },
      });
    }
    return found;
  },
};
