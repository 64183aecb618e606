/**
 * Identifier Types
 *
 * Agents and objects are referenced across records by a (kind, value) pair.
 * Uniqueness only holds within a kind: two UUID-kind values never collide
 * inside one SIP, but the same value may appear under different kinds.
 */

/**
 * A typed composite key for agent and object lookup.
 * Two identifiers are equal when both fields are equal.
 */
export interface Identifier {
  /** Identifier type literal (e.g. "UUID", "MEEMOO-PID") */
  readonly kind: string;

  /** Identifier value, opaque */
  readonly value: string;
}

/** Kind of the identifier every persisted entity is expected to carry. */
export const UUID_KIND = "UUID";

/** Kind of the persistent identifier, preferred as the externally visible id. */
export const PID_KIND = "MEEMOO-PID";

/** Kind of the content partner's primary identifier. */
export const PRIMARY_KIND = "MEEMOO-LOCAL-ID";

export function isUuidIdentifier(id: Identifier): boolean {
  return id.kind === UUID_KIND;
}

export function isPidIdentifier(id: Identifier): boolean {
  return id.kind === PID_KIND;
}

export function isPrimaryIdentifier(id: Identifier): boolean {
  return id.kind === PRIMARY_KIND;
}

/**
 * Any identifier that is not a UUID, pid or primary identifier.
 */
export function isLocalIdentifier(id: Identifier): boolean {
  return id.kind !== UUID_KIND && id.kind !== PID_KIND && id.kind !== PRIMARY_KIND;
}

export function identifierEquals(a: Identifier, b: Identifier): boolean {
  return a.kind === b.kind && a.value === b.value;
}
