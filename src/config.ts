/**
 * Configuration for the clipsift classifier.
 */

import { homedir } from "node:os";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export type ClassifierConfig = {
  // Enrichment
  extractContent?: boolean;
  skipApiKeys?: boolean;
  maxExtractedItems?: number;

  // Decoding
  maxDecodeDepth?: number;

  // Bounded cost
  maxScanLength?: number;

  // File paths
  checkFileExistence?: boolean;
  filePathProbeTimeoutMs?: number;
  homeDir?: string;

  // Metadata codec
  containmentCacheSize?: number;

  logLevel?: LogLevel;

  /** Clock used for JWT expiry. */
  now?: () => Date;
};

export type ResolvedConfig = Required<ClassifierConfig>;

function checkRange(value: number, min: number, max: number, field: string): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${field} must be an integer between ${min} and ${max}`);
  }
  return value;
}

export function resolveConfig(cfg: ClassifierConfig = {}): ResolvedConfig {
  const maxDecodeDepth = checkRange(cfg.maxDecodeDepth ?? 3, 1, 5, "maxDecodeDepth");
  const maxExtractedItems = checkRange(cfg.maxExtractedItems ?? 50, 1, 500, "maxExtractedItems");
  const maxScanLength = checkRange(cfg.maxScanLength ?? 100_000, 1_000, 1_000_000, "maxScanLength");
  const filePathProbeTimeoutMs = checkRange(
    cfg.filePathProbeTimeoutMs ?? 50,
    1,
    5_000,
    "filePathProbeTimeoutMs",
  );
  const containmentCacheSize = checkRange(
    cfg.containmentCacheSize ?? 512,
    16,
    100_000,
    "containmentCacheSize",
  );

  const logLevel = cfg.logLevel ?? "warn";
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new Error(`logLevel must be one of ${LOG_LEVELS.join(", ")}, got: "${logLevel}"`);
  }

  const homeDir = cfg.homeDir ?? homedir();
  if (!homeDir) throw new Error("homeDir must not be empty");

  return {
    extractContent: cfg.extractContent ?? true,
    skipApiKeys: cfg.skipApiKeys ?? false,
    maxExtractedItems,
    maxDecodeDepth,
    maxScanLength,
    checkFileExistence: cfg.checkFileExistence ?? true,
    filePathProbeTimeoutMs,
    homeDir,
    containmentCacheSize,
    logLevel,
    now: cfg.now ?? (() => new Date()),
  };
}
