/**
 * SIP Transformer: top-level coordinator
 *
 * Builds the entity index over every record of one SIP, then runs the
 * representation, carrier, entity and event transformers against it.
 *
 * Usage:
 *   const transformer = new SipTransformer({ logger });
 *   const provenance = transformer.transform(records);
 *
 * Each call builds its own index; nothing is shared between calls.
 * Any error aborts the whole SIP.
 */

import { isUuidIdentifier } from "@sip-provenance/types";
import type {
  PreservationRecord,
  PremisAgent,
  Representation,
  SipProvenance,
  SipRecords,
} from "@sip-provenance/types";
import type { Logger } from "pino";
import type { AppConfig, DuplicateIdentifierPolicy } from "./config.js";
import { CarrierTransformer } from "./carrier.js";
import { decodeSipRecords } from "./decode.js";
import { EntityIndex } from "./entity-index.js";
import { EntityTransformer } from "./entity.js";
import { EventTransformer } from "./events.js";
import { uuidOf } from "./identifiers.js";
import { silentLogger } from "./logger.js";
import { RepresentationTransformer } from "./representation.js";

// =============================================================================
// Configuration
// =============================================================================

export interface SipTransformerOptions {
  /** Defaults to a silent logger. */
  readonly logger?: Logger;
  /** Defaults to "first-write-wins". */
  readonly duplicatePolicy?: DuplicateIdentifierPolicy;
  /** Language tag for names in the output. Defaults to "nl". */
  readonly language?: string;
}

/**
 * Map loaded configuration onto transformer options.
 */
export function transformerOptionsFromConfig(
  config: Pick<AppConfig, "DUPLICATE_IDENTIFIER_POLICY" | "OUTPUT_LANGUAGE">,
  logger?: Logger,
): SipTransformerOptions {
  return {
    duplicatePolicy: config.DUPLICATE_IDENTIFIER_POLICY,
    language: config.OUTPUT_LANGUAGE,
    ...(logger ? { logger } : {}),
  };
}

// =============================================================================
// Transformer
// =============================================================================

export class SipTransformer {
  private readonly logger: Logger;
  private readonly duplicatePolicy: DuplicateIdentifierPolicy;
  private readonly language: string;
  private readonly carrierTransformer = new CarrierTransformer();
  private readonly entityTransformer = new EntityTransformer();
  private readonly representationTransformer: RepresentationTransformer;

  constructor(options: SipTransformerOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.duplicatePolicy = options.duplicatePolicy ?? "first-write-wins";
    this.language = options.language ?? "nl";
    this.representationTransformer = new RepresentationTransformer({
      language: this.language,
    });
  }

  /**
   * Resolve the structural and provenance graph of one SIP.
   *
   * @throws {ResolutionError} on the first unresolvable reference or cardinality violation
   */
  transform(records: SipRecords): SipProvenance {
    const index = EntityIndex.build(records, { duplicatePolicy: this.duplicatePolicy });
    this.logger.debug(
      {
        agents: index.agentCount,
        objects: index.objectCount,
        keys: index.keyCount,
        representations: records.representations.length,
      },
      "Entity index built",
    );

    const digital = records.representations.map((r) =>
      this.representationTransformer.parse(r),
    );
    const carrier = this.carrierTransformer.parse(records.package);
    const isRepresentedBy: Representation[] = carrier ? [...digital, carrier] : digital;

    const entity = this.entityTransformer.parse(
      records.package,
      carrier ? { kind: "reference", id: carrier.id } : null,
      isRepresentedBy,
    );

    const eventTransformer = new EventTransformer(index, {
      language: this.language,
      logger: this.logger,
    });
    const events = records.package.events.map((event) => eventTransformer.parse(event));

    this.logger.info(
      {
        entityId: entity.id,
        representations: isRepresentedBy.length,
        carrier: carrier !== null,
        events: events.length,
      },
      "SIP provenance resolved",
    );

    return {
      entity,
      events,
      premisAgents: premisAgents(records.package),
    };
  }
}

/**
 * Package-level agents that carry a UUID identifier.
 */
function premisAgents(packageRecord: PreservationRecord): PremisAgent[] {
  return packageRecord.agents
    .filter((agent) => agent.identifiers.some(isUuidIdentifier))
    .map((agent) => ({
      identifier: uuidOf(agent.identifiers, `agent "${agent.name}"`),
      name: agent.name,
      type: agent.type,
    }));
}

// =============================================================================
// One-shot helpers
// =============================================================================

export function transformSip(
  records: SipRecords,
  options?: SipTransformerOptions,
): SipProvenance {
  return new SipTransformer(options).transform(records);
}

/**
 * Decode raw records first, then transform.
 *
 * @throws {ResolutionError} INVALID_RECORD when the records do not decode
 */
export function transformRawSip(
  raw: unknown,
  options?: SipTransformerOptions,
): SipProvenance {
  return transformSip(decodeSipRecords(raw), options);
}
