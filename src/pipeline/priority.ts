/**
 * Ordering tables for the classifier.
 *
 * SUPPRESSORS decides which family owns a contested span. PRIMARY_PRIORITY
 * decides which family names the capture when several clear their
 * thresholds.
 */

import type { ContentType, Family } from "../core/types.js";

/** Families whose spans a family must not re-detect. */
export const SUPPRESSORS: Readonly<Record<Family, readonly Family[]>> = {
  jwt: [],
  url: [],
  email: ["url"],
  uuid: [],
  ipAddress: [],
  apiKey: ["jwt"],
  hash: ["jwt", "apiKey", "uuid"],
  phoneNumber: ["jwt", "url", "uuid", "ipAddress", "hash", "apiKey"],
  filePath: ["url", "jwt"],
  env: [],
  shellCommand: [],
  code: [],
  prose: [],
};

/** Best env confidence a multi-assignment capture needs to be split. */
export const ENV_BLOCK_THRESHOLD = 0.8;

export type PrimaryCandidate = {
  type: ContentType;
  family: Family;
  threshold: number;
};

// Strongly structured tokens first, then loosely patterned content.
export const PRIMARY_PRIORITY: readonly PrimaryCandidate[] = [
  { type: "envVarBlock", family: "env", threshold: ENV_BLOCK_THRESHOLD },
  { type: "jwt", family: "jwt", threshold: 0.8 },
  { type: "envVar", family: "env", threshold: 0.8 },
  { type: "apiKey", family: "apiKey", threshold: 0.6 },
  { type: "email", family: "email", threshold: 0.8 },
  { type: "phoneNumber", family: "phoneNumber", threshold: 0.8 },
  { type: "ipAddress", family: "ipAddress", threshold: 0.8 },
  { type: "uuid", family: "uuid", threshold: 0.8 },
  { type: "hash", family: "hash", threshold: 0.8 },
  { type: "shellCommand", family: "shellCommand", threshold: 0.5 },
  { type: "url", family: "url", threshold: 0.8 },
  { type: "filePath", family: "filePath", threshold: 0.7 },
  { type: "code", family: "code", threshold: 0.6 },
  { type: "prose", family: "prose", threshold: 0.6 },
];

/** Content type of a child record extracted from a family. */
export const FAMILY_TYPES: Readonly<Record<Family, ContentType>> = {
  email: "email",
  url: "url",
  phoneNumber: "phoneNumber",
  ipAddress: "ipAddress",
  uuid: "uuid",
  hash: "hash",
  apiKey: "apiKey",
  jwt: "jwt",
  env: "envVar",
  filePath: "filePath",
  shellCommand: "shellCommand",
  code: "code",
  prose: "prose",
};

export const MIN_CLASSIFIABLE_LENGTH = 2;
export const TEXT_FALLBACK_CONFIDENCE = 0.5;
