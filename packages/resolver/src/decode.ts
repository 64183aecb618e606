/**
 * Record Decoder
 *
 * Ingestion boundary for the JSON-shaped PREMIS records handed over by
 * the markup parser. Validates structure with Zod and decodes role
 * literals into the closed role unions, so that business logic never
 * compares free text.
 */

import { z } from "zod";
import type { PreservationRecord, SipRecords } from "@sip-provenance/types";
import { invalidRecord } from "./errors.js";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IdentifierSchema = z.object({
  kind: z.string().min(1),
  value: z.string().min(1),
});

const IdentifiersSchema = z.array(IdentifierSchema).min(1);

export const RelationshipSchema = z.object({
  type: z.string(),
  subType: z.string(),
  relatedObjectIdentifiers: IdentifiersSchema,
});

const FixitySchema = z.object({
  messageDigestAlgorithm: z.string(),
  messageDigest: z.string(),
  messageDigestOriginator: z.string().optional(),
});

const FormatSchema = z.object({
  designation: z
    .object({ name: z.string(), version: z.string().optional() })
    .optional(),
  registry: z
    .object({ name: z.string(), key: z.string(), role: z.string().optional() })
    .optional(),
});

const CharacteristicsSchema = z.object({
  size: z.number().int().min(0).nullable().default(null),
  fixity: z.array(FixitySchema).default([]),
  formats: z.array(FormatSchema).min(1),
});

const SignificantPropertiesSchema = z.object({
  type: z.string().optional(),
  value: z.string().optional(),
  extensions: z.array(z.unknown()).default([]),
});

const objectBase = {
  identifiers: IdentifiersSchema,
  significantProperties: z.array(SignificantPropertiesSchema).default([]),
  relationships: z.array(RelationshipSchema).default([]),
};

// =============================================================================
// Objects
// =============================================================================

export const PreservationObjectSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("intellectualEntity"),
    ...objectBase,
    originalName: z.string().optional(),
  }),
  z.object({
    kind: z.literal("representation"),
    ...objectBase,
    originalName: z.string().optional(),
  }),
  z.object({
    kind: z.literal("file"),
    ...objectBase,
    characteristics: z.array(CharacteristicsSchema).min(1),
    originalName: z.string().optional(),
  }),
  z.object({
    kind: z.literal("bitstream"),
    ...objectBase,
    characteristics: z.array(CharacteristicsSchema).min(1),
  }),
]);

// =============================================================================
// Agents and Events
// =============================================================================

export const AgentSchema = z.object({
  identifiers: IdentifiersSchema,
  name: z.string(),
  type: z.string(),
});

export const AgentRoleSchema = z.enum(["implementer", "executer", "instrument"]);
export const ObjectRoleSchema = z.enum(["source", "outcome"]);

export const EventSchema = z.object({
  identifier: IdentifierSchema,
  type: z.string().min(1),
  datetime: z.string().min(1),
  detailInformation: z.array(z.object({ detail: z.string().optional() })).default([]),
  outcomeInformation: z
    .array(
      z.object({
        outcome: z.string().optional(),
        outcomeDetails: z.array(z.object({ note: z.string().optional() })).default([]),
      }),
    )
    .default([]),
  linkingAgents: z
    .array(z.object({ identifier: IdentifierSchema, roles: z.array(AgentRoleSchema).default([]) }))
    .default([]),
  linkingObjects: z
    .array(z.object({ identifier: IdentifierSchema, roles: z.array(ObjectRoleSchema).default([]) }))
    .default([]),
});

// =============================================================================
// Records
// =============================================================================

export const PreservationRecordSchema = z.object({
  objects: z.array(PreservationObjectSchema).default([]),
  agents: z.array(AgentSchema).default([]),
  events: z.array(EventSchema).default([]),
});

export const SipRecordsSchema = z.object({
  package: PreservationRecordSchema,
  representations: z
    .array(z.object({ relativePath: z.string().min(1), record: PreservationRecordSchema }))
    .default([]),
});

/**
 * @throws {ResolutionError} INVALID_RECORD with the Zod issues
 */
export function decodePreservationRecord(raw: unknown): PreservationRecord {
  const result = PreservationRecordSchema.safeParse(raw);
  if (!result.success) {
    throw invalidRecord("preservation record", result.error);
  }
  return result.data;
}

/**
 * @throws {ResolutionError} INVALID_RECORD with the Zod issues
 */
export function decodeSipRecords(raw: unknown): SipRecords {
  const result = SipRecordsSchema.safeParse(raw);
  if (!result.success) {
    throw invalidRecord("SIP records", result.error);
  }
  return result.data;
}
