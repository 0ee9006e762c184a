import jwt, { type Jwt } from "jsonwebtoken";
import { matchSpan, overlapsAny } from "../core/spans.js";
import type { Detection, Detector } from "../core/types.js";
import type { JwtClaims, JwtItem } from "../metadata/schema.js";

const JWT_PATTERN =
  /(?<![A-Za-z0-9_-])([A-Za-z0-9_-]+)\.([A-Za-z0-9_-]+)\.([A-Za-z0-9_-]+)(?![A-Za-z0-9_-])/g;

type Decoded = {
  header: Record<string, unknown>;
  payload: Record<string, unknown>;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decode(token: string): Decoded | null {
  let complete: Jwt | null;
  try {
    // Throws when a "typ": "JWT" header carries a payload that is not JSON.
    complete = jwt.decode(token, { complete: true });
  } catch {
    return null;
  }
  if (!complete) return null;
  const header: unknown = complete.header;
  const payload: unknown = complete.payload;
  if (!isPlainObject(header) || !isPlainObject(payload)) return null;
  return { header, payload };
}

function numericClaim(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && /^\d+(?:\.\d+)?$/.test(value)) return Number(value);
  return undefined;
}

function stringClaim(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function readClaims(payload: Record<string, unknown>): JwtClaims {
  const claims: JwtClaims = {};
  const sub = stringClaim(payload["sub"]);
  const iss = stringClaim(payload["iss"]);
  const iat = numericClaim(payload["iat"]);
  const exp = numericClaim(payload["exp"]);
  if (sub !== undefined) claims.sub = sub;
  if (iss !== undefined) claims.iss = iss;
  if (iat !== undefined) claims.iat = iat;
  if (exp !== undefined) claims.exp = exp;
  return claims;
}

export const jwtDetector: Detector<JwtItem> = {
  detect(text, ctx) {
    const seen = new Set<string>();
    const found: Detection<JwtItem>[] = [];

    for (const m of text.matchAll(JWT_PATTERN)) {
      const span = matchSpan(m);
      const token = m[0];
      if (!span || seen.has(token) || overlapsAny(span, ctx.ignoreSpans)) continue;

      const decoded = decode(token);
      if (!decoded) continue;
      seen.add(token);

      const claims = readClaims(decoded.payload);
      const item: JwtItem = {
        token,
        headerJSON: JSON.stringify(decoded.header),
        payloadJSON: JSON.stringify(decoded.payload),
        claims,
        confidence: 0.95,
      };
      if (claims.exp !== undefined) {
        item.isExpired = claims.exp * 1000 < ctx.now().getTime();
      }
      found.push({ match: token, span, item });
    }
    return found;
  },
};
