/**
 * Entity Index
 *
 * Cross-record identifier index over every agent and object of a SIP.
 * Built once from the package record and every representation record,
 * then only read.
 *
 * Every entity is inserted under each identifier it declares, so it is
 * reachable by any of them. Object misses resolve to a temporary
 * placeholder; agent misses are fatal.
 */

import { canonicalize } from "json-canonicalize";
import { temporaryObject } from "@sip-provenance/types";
import type {
  Agent,
  Identifier,
  PreservationObject,
  PreservationRecord,
  ResolvedObject,
  SipRecords,
} from "@sip-provenance/types";
import type { DuplicateIdentifierPolicy } from "./config.js";
import { ResolutionError } from "./errors.js";
import { formatIdentifier, identifierKey } from "./identifiers.js";

export interface EntityIndexOptions {
  /**
   * How a key claimed twice is handled. Under both policies the first
   * insertion stays; "strict" additionally raises when the second entity
   * differs structurally from the first.
   */
  readonly duplicatePolicy?: DuplicateIdentifierPolicy;
}

interface Declared<T> {
  readonly entity: T;
  readonly canonical: string;
}

export class EntityIndex {
  private readonly _agents: ReadonlyMap<string, Declared<Agent>>;
  private readonly _objects: ReadonlyMap<string, Declared<PreservationObject>>;

  private constructor(
    agents: ReadonlyMap<string, Declared<Agent>>,
    objects: ReadonlyMap<string, Declared<PreservationObject>>,
  ) {
    this._agents = agents;
    this._objects = objects;
  }

  /**
   * Index every agent and object of the SIP, package record first, then
   * representation records in order.
   *
   * @throws {ResolutionError} DUPLICATE_IDENTIFIER under the strict policy
   */
  static build(records: SipRecords, options: EntityIndexOptions = {}): EntityIndex {
    const policy = options.duplicatePolicy ?? "first-write-wins";
    const all: PreservationRecord[] = [
      records.package,
      ...records.representations.map((r) => r.record),
    ];

    const agents = new Map<string, Declared<Agent>>();
    const objects = new Map<string, Declared<PreservationObject>>();

    for (const record of all) {
      for (const agent of record.agents) {
        insert(agents, agent, agent.identifiers, "agent", policy);
      }
      for (const object of record.objects) {
        insert(objects, object, object.identifiers, "object", policy);
      }
    }

    return new EntityIndex(agents, objects);
  }

  /**
   * @throws {ResolutionError} AGENT_NOT_FOUND when no record declares the identifier
   */
  resolveAgent(id: Identifier): Agent {
    const found = this._agents.get(identifierKey(id));
    if (found === undefined) {
      throw new ResolutionError(
        "AGENT_NOT_FOUND",
        `No agent declared with identifier ${formatIdentifier(id)}`,
        { identifier: id },
      );
    }
    return found.entity;
  }

  /**
   * Resolve to the persisted object, or to a temporary placeholder
   * wrapping exactly `id`. Never throws.
   */
  resolveObject(id: Identifier): ResolvedObject {
    return this._objects.get(identifierKey(id))?.entity ?? temporaryObject(id);
  }

  /** Number of distinct agents indexed. */
  get agentCount(): number {
    return distinct(this._agents).size;
  }

  /** Number of distinct objects indexed. */
  get objectCount(): number {
    return distinct(this._objects).size;
  }

  /** Number of (kind, value) keys across agents and objects. */
  get keyCount(): number {
    return this._agents.size + this._objects.size;
  }
}

function insert<T>(
  map: Map<string, Declared<T>>,
  entity: T,
  identifiers: readonly Identifier[],
  label: "agent" | "object",
  policy: DuplicateIdentifierPolicy,
): void {
  const canonical = canonicalize(entity);
  // The same entity object may repeat an identifier; one entry suffices.
  const declared: Declared<T> = { entity, canonical };

  for (const id of identifiers) {
    const key = identifierKey(id);
    const existing = map.get(key);
    if (existing === undefined) {
      map.set(key, declared);
      continue;
    }
    if (policy === "strict" && existing.canonical !== canonical) {
      throw new ResolutionError(
        "DUPLICATE_IDENTIFIER",
        `Identifier ${formatIdentifier(id)} is declared by two different ${label}s`,
        { identifier: id },
      );
    }
  }
}

function distinct<T>(map: ReadonlyMap<string, Declared<T>>): Set<T> {
  const entities = new Set<T>();
  for (const declared of map.values()) {
    entities.add(declared.entity);
  }
  return entities;
}
