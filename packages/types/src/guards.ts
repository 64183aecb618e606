/**
 * Runtime Type Guards
 *
 * Narrowing functions for the record and provenance types.
 * These enable safe runtime checks at system boundaries
 * (decoded records, carrier extensions, consumers of the output graph).
 */

import type { Identifier } from "./identifier.js";
import type {
  AgentRole,
  LinkRole,
  ObjectRole,
  PreservationObject,
  PreservationObjectKind,
  ResolvedObject,
  TemporaryObject,
} from "./records.js";
import type { ColoringType } from "./carrier.js";
import type { EphemeralObject, Reference } from "./provenance.js";

// =============================================================================
// Identifier guards
// =============================================================================

export function isIdentifier(value: unknown): value is Identifier {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.kind === "string" && typeof v.value === "string";
}

// =============================================================================
// Role guards
// =============================================================================

export const AGENT_ROLES: readonly AgentRole[] = ["implementer", "executer", "instrument"];
export const OBJECT_ROLES: readonly ObjectRole[] = ["source", "outcome"];

const AGENT_ROLE_SET = new Set<string>(AGENT_ROLES);
const OBJECT_ROLE_SET = new Set<string>(OBJECT_ROLES);

export function isAgentRole(value: unknown): value is AgentRole {
  return typeof value === "string" && AGENT_ROLE_SET.has(value);
}

export function isObjectRole(value: unknown): value is ObjectRole {
  return typeof value === "string" && OBJECT_ROLE_SET.has(value);
}

export function isLinkRole(value: unknown): value is LinkRole {
  return isAgentRole(value) || isObjectRole(value);
}

// =============================================================================
// Object guards
// =============================================================================

const OBJECT_KINDS = new Set<string>([
  "intellectualEntity", "representation", "file", "bitstream",
]);

export function isPreservationObjectKind(value: unknown): value is PreservationObjectKind {
  return typeof value === "string" && OBJECT_KINDS.has(value);
}

export function isTemporaryObject(value: ResolvedObject): value is TemporaryObject {
  return value.kind === "temporary";
}

export function isPreservationObject(value: ResolvedObject): value is PreservationObject {
  return value.kind !== "temporary";
}

// =============================================================================
// Carrier guards
// =============================================================================

export const COLORING_TYPES: readonly ColoringType[] = ["black-and-white", "colour", "mixed"];

const COLORING_TYPE_SET = new Set<string>(COLORING_TYPES);

export function isColoringType(value: unknown): value is ColoringType {
  return typeof value === "string" && COLORING_TYPE_SET.has(value);
}

// =============================================================================
// Provenance guards
// =============================================================================

export function isReference(value: unknown): value is Reference {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return v.kind === "reference" && typeof v.id === "string";
}

export function isEphemeralObject(value: unknown): value is EphemeralObject {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return v.kind === "object" && typeof v.id === "string";
}
