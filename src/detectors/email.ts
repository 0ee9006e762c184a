import { matchSpan, overlapsAny } from "../core/spans.js";
import type { Detection, Detector } from "../core/types.js";
import type { EmailItem } from "../metadata/schema.js";

// Look-arounds keep the whole token: "xxa@example.comyy" is matched as one
// address, and a second "@" on either side rejects the candidate.
const EMAIL_PATTERN =
  /(?<![A-Z0-9._%+\-@])([A-Z0-9](?:[A-Z0-9._%+\-]{0,62}[A-Z0-9])?)@([A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?(?:\.[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?)+)(?![A-Z0-9_%+\-@])/gi;

const TLD = /\.[A-Z]{2,}$/i;

export const emailDetector: Detector<EmailItem> = {
  detect(text, ctx) {
    const seen = new Set<string>();
    const found: Detection<EmailItem>[] = [];

    for (const m of text.matchAll(EMAIL_PATTERN)) {
      const span = matchSpan(m);
      const domain = m[2];
      if (!span || domain === undefined || !TLD.test(domain)) continue;
      if (overlapsAny(span, ctx.ignoreSpans)) continue;

      const email = m[0];
      const key = email.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);

      found.push({ match: email, span, item: { email, confidence: 0.95 } });
    }
    return found;
  },
};
