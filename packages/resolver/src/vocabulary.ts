/**
 * Vocabulary mappings.
 *
 * Projects local vocabulary literals onto external URIs. Open vocabularies
 * (event type, carrier medium) are projected by prefix concatenation;
 * closed vocabularies reject unknown literals.
 */

import { isColoringType } from "@sip-provenance/types";
import type { ColoringType, FormatRegistry } from "@sip-provenance/types";
import { ResolutionError } from "./errors.js";

export const EVENT_TYPE_BASE_URI = "https://data.hetarchief.be/id/event-type/";
export const CARRIER_TYPE_BASE_URI = "https://data.hetarchief.be/id/carrier-type/";
export const PRONOM_BASE_URI = "https://www.nationalarchives.gov.uk/pronom/";

const EVENT_OUTCOME_URIS: Readonly<Record<string, string>> = {
  success: "http://id.loc.gov/vocabulary/preservation/eventOutcome/suc",
  fail: "http://id.loc.gov/vocabulary/preservation/eventOutcome/fai",
  warning: "http://id.loc.gov/vocabulary/preservation/eventOutcome/war",
};

const HASH_FUNCTION_URIS: Readonly<Record<string, string>> = {
  md5: "http://id.loc.gov/vocabulary/preservation/cryptographicHashFunctions/md5",
  MD5: "http://id.loc.gov/vocabulary/preservation/cryptographicHashFunctions/md5",
};

export const PRONOM_REGISTRY = "PRONOM";

// ─── Relationship subtypes ───────────────────────────────────────────────

export type CopyRelationship =
  | "is master copy of"
  | "is mezzanine copy of"
  | "is access copy of"
  | "is transcription copy of";

export const COPY_RELATIONSHIPS: readonly CopyRelationship[] = [
  "is master copy of",
  "is mezzanine copy of",
  "is access copy of",
  "is transcription copy of",
];

const COPY_RELATIONSHIP_SET = new Set<string>(COPY_RELATIONSHIPS);

export function isCopyRelationship(subType: string): subType is CopyRelationship {
  return COPY_RELATIONSHIP_SET.has(subType);
}

export const CARRIER_COPY_RELATIONSHIP = "is carrier copy of";

/** Inverse relationships declared on the intellectual entity. */
export const HAS_MASTER_COPY = "has master copy";
export const HAS_MEZZANINE_COPY = "has mezzanine copy";
export const HAS_ACCESS_COPY = "has access copy";
export const HAS_TRANSCRIPTION_COPY = "has transcription copy";

// ─── Mappers ─────────────────────────────────────────────────────────────

export function mapEventTypeToUri(type: string): string {
  return EVENT_TYPE_BASE_URI + type;
}

export function mapMediumToUri(medium: string): string {
  return CARRIER_TYPE_BASE_URI + medium;
}

/**
 * @throws {ResolutionError} UNKNOWN_VOCABULARY for anything but success, fail or warning
 */
export function mapOutcomeToUri(outcome: string): string {
  const uri = Object.hasOwn(EVENT_OUTCOME_URIS, outcome) ? EVENT_OUTCOME_URIS[outcome] : undefined;
  if (uri === undefined) {
    throw new ResolutionError(
      "UNKNOWN_VOCABULARY",
      `Event outcome must be one of success, fail or warning, got "${outcome}"`,
    );
  }
  return uri;
}

/**
 * @throws {ResolutionError} UNKNOWN_VOCABULARY for an unsupported digest algorithm
 */
export function mapFixityAlgorithmToUri(algorithm: string): string {
  const uri = Object.hasOwn(HASH_FUNCTION_URIS, algorithm) ? HASH_FUNCTION_URIS[algorithm] : undefined;
  if (uri === undefined) {
    throw new ResolutionError(
      "UNKNOWN_VOCABULARY",
      `Unknown fixity message digest algorithm "${algorithm}"`,
    );
  }
  return uri;
}

/**
 * @throws {ResolutionError} MISSING_FIELD without a registry, UNKNOWN_VOCABULARY for a non-PRONOM one
 */
export function mapFormatRegistryToUri(registry: FormatRegistry | undefined): string {
  if (registry === undefined) {
    throw new ResolutionError("MISSING_FIELD", "Format registry must be present");
  }
  if (registry.name !== PRONOM_REGISTRY) {
    throw new ResolutionError(
      "UNKNOWN_VOCABULARY",
      `Only the PRONOM format registry is supported, got "${registry.name}"`,
    );
  }
  return PRONOM_BASE_URI + registry.key;
}

/**
 * @throws {ResolutionError} UNKNOWN_VOCABULARY for a value outside the closed set
 */
export function parseColoringType(value: string): ColoringType {
  if (!isColoringType(value)) {
    throw new ResolutionError(
      "UNKNOWN_VOCABULARY",
      `Unknown coloring type "${value}"`,
    );
  }
  return value;
}
