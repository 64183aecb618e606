/**
 * Event Transformer
 *
 * Turns a raw PREMIS event into a normalized event: every linked agent
 * and object is resolved once through the entity index, then projected
 * by role.
 *
 *   implementer  → implementedBy       (exactly one organization)
 *   executer     → executedBy          (zero or one software agent)
 *   instrument   → instrument          (hardware agents)
 *   no role      → wasAssociatedWith   (persons)
 *   source       → source              (references)
 *   outcome      → result              (references or embedded objects)
 */

import { z } from "zod";
import { isUuidIdentifier } from "@sip-provenance/types";
import type {
  Agent,
  AgentRole,
  EphemeralObject,
  HardwareAgent,
  LangString,
  NormalizedEvent,
  ObjectRole,
  Organization,
  Person,
  PreservationEvent,
  Reference,
  ResolvedObject,
  SoftwareAgent,
} from "@sip-provenance/types";
import type { Logger } from "pino";
import type { EntityIndex } from "./entity-index.js";
import { ResolutionError, atMostOne, exactlyOne } from "./errors.js";
import { formatIdentifier, primaryIdentifierOf, uuidOf } from "./identifiers.js";
import {
  hasNoRole,
  isExecuter,
  isImplementer,
  isInstrument,
  isResult,
  isSource,
} from "./roles.js";
import { mapEventTypeToUri, mapOutcomeToUri } from "./vocabulary.js";

/**
 * ISO 8601 date-time, extended or basic format: optional time, comma or
 * dot fraction, optional UTC designator or offset.
 */
const DatetimeSchema = z
  .string()
  .regex(
    /^\d{4}-?(0[1-9]|1[0-2])-?(0[1-9]|[12]\d|3[01])([T ]([01]\d|2[0-4])(:?[0-5]\d(:?([0-5]\d|60)([.,]\d+)?)?)?(Z|[+-]([01]\d|2[0-3])(:?[0-5]\d)?)?)?$/,
  );

/** Separator between joined note fragments: a backslash followed by "n". */
export const NOTE_SEPARATOR = "\\n";

export interface EventTransformerOptions {
  /** Language tag for names in the output */
  readonly language: string;
  readonly logger: Logger;
}

interface ResolvedAgentLink {
  readonly agent: Agent;
  readonly roles: readonly AgentRole[];
}

interface ResolvedObjectLink {
  readonly object: ResolvedObject;
  readonly roles: readonly ObjectRole[];
}

export class EventTransformer {
  private readonly index: EntityIndex;
  private readonly language: string;
  private readonly logger: Logger;

  constructor(index: EntityIndex, options: EventTransformerOptions) {
    this.index = index;
    this.language = options.language;
    this.logger = options.logger;
  }

  /**
   * @throws {ResolutionError} on an unknown agent, a wrong implementer count,
   * several executers or outcomes, an unknown outcome literal or an unparseable datetime
   */
  parse(event: PreservationEvent): NormalizedEvent {
    const id = event.identifier.value;
    const datetime = parseDatetime(event.datetime, id);

    const agents: ResolvedAgentLink[] = event.linkingAgents.map((link) => ({
      agent: this.index.resolveAgent(link.identifier),
      roles: link.roles,
    }));
    const objects: ResolvedObjectLink[] = event.linkingObjects.map((link) => {
      const object = this.index.resolveObject(link.identifier);
      if (object.kind === "temporary") {
        this.logger.debug(
          { eventId: id, identifier: formatIdentifier(link.identifier) },
          "Linked object not declared in any record, treating it as ephemeral",
        );
      }
      return { object, roles: link.roles };
    });

    const implementer = exactlyOne(
      agents.filter((l) => isImplementer(l.roles)),
      `implementer agent on event ${id}`,
    );
    const executer = atMostOne(
      agents.filter((l) => isExecuter(l.roles)),
      `executer agent on event ${id}`,
    );

    return {
      id,
      type: mapEventTypeToUri(event.type),
      startedAtTime: datetime,
      endedAtTime: datetime,
      implementedBy: this.organization(implementer.agent),
      executedBy: executer ? this.softwareAgent(executer.agent) : null,
      instrument: agents
        .filter((l) => isInstrument(l.roles))
        .map((l) => this.hardwareAgent(l.agent)),
      wasAssociatedWith: agents
        .filter((l) => hasNoRole(l.roles))
        .map((l) => this.person(l.agent)),
      source: objects
        .filter((l) => isSource(l.roles))
        .map((l) => reference(l.object)),
      result: results(objects.filter((l) => isResult(l.roles)).map((l) => l.object)),
      note: joinNotes(event.detailInformation.map((info) => info.detail)),
      outcome: outcome(event, id),
      outcomeNote: joinNotes(
        event.outcomeInformation.flatMap((info) => info.outcomeDetails.map((d) => d.note)),
      ),
    };
  }

  // ─── Agent shapes ────────────────────────────────────────────────────

  private langString(text: string): LangString {
    return { [this.language]: text };
  }

  private organization(agent: Agent): Organization {
    return {
      kind: "organization",
      identifier: primaryIdentifierOf(agent).value,
      prefLabel: this.langString(agent.name),
    };
  }

  private softwareAgent(agent: Agent): SoftwareAgent {
    return {
      kind: "softwareAgent",
      id: primaryIdentifierOf(agent).value,
      name: this.langString(agent.name),
      model: null,
      serialNumber: null,
      version: null,
    };
  }

  private hardwareAgent(agent: Agent): HardwareAgent {
    return {
      kind: "hardwareAgent",
      name: this.langString(agent.name),
      model: null,
      serialNumber: null,
      version: null,
    };
  }

  private person(agent: Agent): Person {
    return {
      kind: "person",
      id: uuidOf(agent.identifiers, `agent "${agent.name}"`),
      name: this.langString(agent.name),
      birthDate: null,
      deathDate: null,
    };
  }
}

// ─── Objects ─────────────────────────────────────────────────────────────

function reference(object: ResolvedObject): Reference {
  return { kind: "reference", id: objectUuid(object) };
}

/**
 * Persisted results become references, ephemeral ones are embedded.
 * References come first, each group keeps link order.
 */
function results(objects: readonly ResolvedObject[]): (Reference | EphemeralObject)[] {
  const refs: Reference[] = [];
  const embedded: EphemeralObject[] = [];
  for (const object of objects) {
    if (object.kind === "temporary") {
      embedded.push({ kind: "object", id: objectUuid(object) });
    } else {
      refs.push(reference(object));
    }
  }
  return [...refs, ...embedded];
}

function objectUuid(object: ResolvedObject): string {
  switch (object.kind) {
    case "temporary":
      if (!isUuidIdentifier(object.identifier)) {
        throw new ResolutionError(
          "INVALID_IDENTIFIER",
          `Ephemeral object ${formatIdentifier(object.identifier)} must be identified by a UUID`,
        );
      }
      return object.identifier.value;
    case "intellectualEntity":
    case "representation":
    case "file":
    case "bitstream":
      return uuidOf(object.identifiers, `${object.kind} object`);
  }
}

// ─── Details and outcome ─────────────────────────────────────────────────

function joinNotes(fragments: readonly (string | undefined)[]): string | null {
  const present = fragments.filter((f): f is string => f !== undefined && f !== "");
  return present.length === 0 ? null : present.join(NOTE_SEPARATOR);
}

function outcome(event: PreservationEvent, id: string): string | null {
  const literals = event.outcomeInformation
    .map((info) => info.outcome)
    .filter((o): o is string => o !== undefined && o !== "");
  const literal = atMostOne(literals, `outcome on event ${id}`);
  return literal === null ? null : mapOutcomeToUri(literal);
}

function parseDatetime(datetime: string, id: string): string {
  if (!DatetimeSchema.safeParse(datetime).success) {
    throw new ResolutionError(
      "INVALID_DATETIME",
      `Event ${id} has an unparseable datetime "${datetime}"`,
    );
  }
  return datetime;
}
