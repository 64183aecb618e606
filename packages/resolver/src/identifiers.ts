/**
 * Identifier helpers shared by the transformers.
 */

import { canonicalize } from "json-canonicalize";
import { isPidIdentifier, isUuidIdentifier } from "@sip-provenance/types";
import type { Agent, Identifier, Relationship } from "@sip-provenance/types";
import { ResolutionError, atMostOne, exactlyOne } from "./errors.js";

/**
 * Map key for an identifier. Canonical JSON keeps (kind, value) pairs
 * apart even when either field contains separator characters.
 */
export function identifierKey(id: Identifier): string {
  return canonicalize([id.kind, id.value]);
}

export function formatIdentifier(id: Identifier): string {
  return `${id.kind}:${id.value}`;
}

/**
 * The UUID value among `identifiers`.
 *
 * @throws {ResolutionError} when there is no UUID identifier, or several
 */
export function uuidOf(identifiers: readonly Identifier[], owner: string): string {
  return exactlyOne(identifiers.filter(isUuidIdentifier), `UUID identifier on ${owner}`).value;
}

export function pidOf(identifiers: readonly Identifier[], owner: string): string | null {
  return atMostOne(identifiers.filter(isPidIdentifier), `pid identifier on ${owner}`)?.value ?? null;
}

/**
 * The first declared identifier of an agent.
 */
export function primaryIdentifierOf(agent: Agent): Identifier {
  const [first] = agent.identifiers;
  if (first === undefined) {
    throw new ResolutionError("MISSING_FIELD", `Agent "${agent.name}" declares no identifier`);
  }
  return first;
}

/**
 * UUID of the object a relationship points at.
 */
export function relatedObjectUuid(relationship: Relationship): string {
  return uuidOf(
    relationship.relatedObjectIdentifiers,
    `relationship "${relationship.subType}"`,
  );
}
