/**
 * Metadata document schema.
 *
 * The document is the JSON string stored beside a clipboard record. Every
 * family owns one key; keys are present only when the family found
 * something. Item types are inferred from the schemas so the codec and the
 * detectors can never drift apart.
 */

import { z } from "zod";
import {
  CODE_LANGUAGES,
  ENCODINGS,
  FILE_TYPES,
  HASH_KINDS,
  UUID_VARIANTS,
} from "../core/types.js";

// ============================================================================
// Family items
// ============================================================================

export const EmailItemSchema = z.object({
  email: z.string(),
  confidence: z.number(),
});

export const UrlItemSchema = z.object({
  url: z.string(),
  domain: z.string(),
  category: z.string(),
  hotCount: z.number().int(),
  confidence: z.number(),
});

export const PhoneNumberItemSchema = z.object({
  number: z.string(),
  digits: z.string(),
  isInternational: z.boolean(),
  confidence: z.number(),
});

export const IpAddressItemSchema = z.object({
  address: z.string(),
  version: z.union([z.literal(4), z.literal(6)]),
  isPrivate: z.boolean(),
  isLoopback: z.boolean(),
  isLinkLocal: z.boolean(),
  isMulticast: z.boolean(),
  confidence: z.number(),
});

export const UuidItemSchema = z.object({
  uuid: z.string(),
  version: z.number().int().optional(),
  variant: z.enum(UUID_VARIANTS),
  confidence: z.number(),
});

export const HashItemSchema = z.object({
  hash: z.string(),
  kind: z.enum(HASH_KINDS),
  bits: z.number().int(),
  confidence: z.number(),
});

export const ApiKeyItemSchema = z.object({
  key: z.string(),
  provider: z.string(),
  isLikelyLive: z.boolean(),
  confidence: z.number(),
});

export const JwtClaimsSchema = z.object({
  sub: z.string().optional(),
  iss: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export const JwtItemSchema = z.object({
  token: z.string(),
  headerJSON: z.string(),
  payloadJSON: z.string(),
  claims: JwtClaimsSchema,
  isExpired: z.boolean().optional(),
  confidence: z.number(),
});

export const EnvVarItemSchema = z.object({
  key: z.string(),
  value: z.string(),
  isExported: z.boolean(),
  confidence: z.number(),
});

export const EnvSectionSchema = z.object({
  isBlock: z.boolean(),
  vars: z.array(EnvVarItemSchema),
});

export const FilePathItemSchema = z.object({
  path: z.string(),
  filename: z.string(),
  extension: z.string().optional(),
  fileType: z.enum(FILE_TYPES),
  mimeType: z.string().optional(),
  exists: z.boolean(),
  confidence: z.number(),
});

export const ShellCommandItemSchema = z.object({
  command: z.string(),
  executable: z.string(),
  confidence: z.number(),
});

export const CodeItemSchema = z.object({
  language: z.enum(CODE_LANGUAGES),
  confidence: z.number(),
});

export const ProseItemSchema = z.object({
  wordCount: z.number().int(),
  estimatedReadingTimeSeconds: z.number().int(),
  confidence: z.number(),
});

export const EncodingSectionSchema = z.object({
  encoding: z.union([z.enum(ENCODINGS), z.literal("nested")]),
  steps: z.array(z.enum(ENCODINGS)),
  decodedPreview: z.string(),
});

export type EmailItem = z.infer<typeof EmailItemSchema>;
export type UrlItem = z.infer<typeof UrlItemSchema>;
export type PhoneNumberItem = z.infer<typeof PhoneNumberItemSchema>;
export type IpAddressItem = z.infer<typeof IpAddressItemSchema>;
export type UuidItem = z.infer<typeof UuidItemSchema>;
export type HashItem = z.infer<typeof HashItemSchema>;
export type ApiKeyItem = z.infer<typeof ApiKeyItemSchema>;
export type JwtClaims = z.infer<typeof JwtClaimsSchema>;
export type JwtItem = z.infer<typeof JwtItemSchema>;
export type EnvVarItem = z.infer<typeof EnvVarItemSchema>;
export type EnvSection = z.infer<typeof EnvSectionSchema>;
export type FilePathItem = z.infer<typeof FilePathItemSchema>;
export type ShellCommandItem = z.infer<typeof ShellCommandItemSchema>;
export type CodeItem = z.infer<typeof CodeItemSchema>;
export type ProseItem = z.infer<typeof ProseItemSchema>;
export type EncodingSection = z.infer<typeof EncodingSectionSchema>;

// ============================================================================
// Document
// ============================================================================

export const MetadataDocumentSchema = z
  .object({
    emails: z.array(EmailItemSchema).optional(),
    urls: z.array(UrlItemSchema).optional(),
    phoneNumbers: z.array(PhoneNumberItemSchema).optional(),
    ipAddresses: z.array(IpAddressItemSchema).optional(),
    uuids: z.array(UuidItemSchema).optional(),
    hashes: z.array(HashItemSchema).optional(),
    apiKeys: z.array(ApiKeyItemSchema).optional(),
    jwt: z.array(JwtItemSchema).optional(),
    env: EnvSectionSchema.optional(),
    filePaths: z.array(FilePathItemSchema).optional(),
    shellCommands: z.array(ShellCommandItemSchema).optional(),
    code: z.array(CodeItemSchema).optional(),
    prose: ProseItemSchema.optional(),
    encoding: EncodingSectionSchema.optional(),
  })
  .strict();

export type MetadataDocument = z.infer<typeof MetadataDocumentSchema>;
export type MetadataKey = keyof MetadataDocument;

/** Serialization order of the document keys. */
export const METADATA_KEYS = [
  "emails",
  "urls",
  "phoneNumbers",
  "ipAddresses",
  "uuids",
  "hashes",
  "apiKeys",
  "jwt",
  "env",
  "filePaths",
  "shellCommands",
  "code",
  "prose",
  "encoding",
] as const satisfies readonly MetadataKey[];
