export { ContentClassifier } from "./classifier.js";
export type { CaptureKind, ClassifierDeps, ClassifyInput } from "./classifier.js";
export { enrichCapture } from "./capture.js";
export type { CaptureInput, CaptureMode, CaptureResult, ClipboardRecord, EnrichOptions } from "./capture.js";
export { resolveEncoding } from "./encoding.js";
export type { EncodingOptions } from "./encoding.js";
export { PRIMARY_PRIORITY, SUPPRESSORS, FAMILY_TYPES } from "./priority.js";
export type { PrimaryCandidate } from "./priority.js";
