import { matchSpan, overlapsAny } from "../core/spans.js";
import type { Detection, Detector, Span } from "../core/types.js";
import type { PhoneNumberItem } from "../metadata/schema.js";

// +44 20 7946 0958, +1-555-123-4567, +4915112345678
const INTERNATIONAL = /(?<![\w+])\+\d{1,3}(?:[ .-]?\(?\d{1,4}\)?){1,5}(?![\w-]|\.\d)/g;
// (555) 123-4567, 555-123-4567, 555.123.4567, 1 555 123 4567
const NANP =
  /(?<![\w+.-])(?:1[ .-]?)?(?:\(\d{3}\)[ ]?|\d{3}[ .-])\d{3}[ .-]\d{4}(?![\w-]|\.\d)/g;

function digitsOf(value: string): string {
  return value.replace(/\D/g, "");
}

export const phoneNumberDetector: Detector<PhoneNumberItem> = {
  detect(text, ctx) {
    const seen = new Set<string>();
    const claimed: Span[] = [];
    const found: Detection<PhoneNumberItem>[] = [];

    const take = (m: RegExpMatchArray, isInternational: boolean): void => {
      const span = matchSpan(m);
      if (!span) return;
      if (overlapsAny(span, ctx.ignoreSpans) || overlapsAny(span, claimed)) return;

      const number = m[0];
      const digits = digitsOf(number);
      const min = isInternational ? 8 : 10;
      if (digits.length < min || digits.length > 15) return;
      // A separator-free run after "+" is only a phone number when it is long
      // enough to carry a country code and subscriber number.
      if (isInternational && /^\+\d+$/.test(number) && digits.length < 10) return;
      if (seen.has(digits)) return;

      seen.add(digits);
      claimed.push(span);
      found.push({
        match: number,
        span,
        item: { number, digits, isInternational, confidence: isInternational ? 0.9 : 0.85 },
      });
    };

    for (const m of text.matchAll(INTERNATIONAL)) take(m, true);
    for (const m of text.matchAll(NANP)) take(m, false);

    return found.sort((a, b) => a.span.start - b.span.start);
  },
};
