import { isIPv6 } from "node:net";
import { matchSpan, overlapsAny } from "../core/spans.js";
import type { Detection, Detector, Span } from "../core/types.js";
import type { IpAddressItem } from "../metadata/schema.js";

const OCTET = "(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)";
const IPV4 = new RegExp(`(?<!\\d|\\d\\.)(${OCTET}(?:\\.${OCTET}){3})(?!\\d|\\.\\d)`, "g");

// Candidate only; node:net decides whether it really is an IPv6 address.
const IPV6_CANDIDATE =
  /(?<![\w:.%])(?:[0-9a-f]{0,4}:){2,7}(?:[0-9a-f]{0,4}|\d{1,3}(?:\.\d{1,3}){3})(?:%[0-9a-z]+)?(?![\w:%]|\.\d)/gi;

function classifyV4(address: string): Omit<IpAddressItem, "address" | "version" | "confidence"> {
  const [a = 0, b = 0] = address.split(".").map(Number);
  return {
    isPrivate: a === 10 || (a === 172 && b >= 16 && b <= 31) || (a === 192 && b === 168),
    isLoopback: a === 127,
    isLinkLocal: a === 169 && b === 254,
    isMulticast: a >= 224 && a <= 239,
  };
}

function classifyV6(address: string): Omit<IpAddressItem, "address" | "version" | "confidence"> {
  const lower = address.toLowerCase();
  return {
    isPrivate: lower.startsWith("fc") || lower.startsWith("fd"),
    isLoopback: lower === "::1" || lower === "0:0:0:0:0:0:0:1",
    isLinkLocal: /^fe[89ab]/.test(lower),
    isMulticast: lower.startsWith("ff"),
  };
}

export const ipAddressDetector: Detector<IpAddressItem> = {
  detect(text, ctx) {
    const seen = new Set<string>();
    const v6Spans: Span[] = [];
    const found: Detection<IpAddressItem>[] = [];

    for (const m of text.matchAll(IPV6_CANDIDATE)) {
      const span = matchSpan(m);
      const address = m[0].toLowerCase();
      if (!span || !isIPv6(address)) continue;
      v6Spans.push(span);
      if (overlapsAny(span, ctx.ignoreSpans) || seen.has(address)) continue;
      seen.add(address);
      found.push({
        match: m[0],
        span,
        item: { address, version: 6, ...classifyV6(address), confidence: 0.85 },
      });
    }

    for (const m of text.matchAll(IPV4)) {
      const span = matchSpan(m, 1);
      const address = m[1];
      if (!span || address === undefined) continue;
      // Embedded in an IPv4-mapped IPv6 address.
      if (overlapsAny(span, v6Spans) || overlapsAny(span, ctx.ignoreSpans)) continue;
      if (seen.has(address)) continue;
      seen.add(address);
      found.push({
        match: address,
        span,
        item: { address, version: 4, ...classifyV4(address), confidence: 0.9 },
      });
    }

    return found.sort((a, b) => a.span.start - b.span.start);
  },
};
