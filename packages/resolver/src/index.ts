/**
 * @sip-provenance/resolver: Preservation provenance resolution for SIPs.
 *
 * Reconstructs a normalized structural and provenance graph from the
 * cross-referencing PREMIS records of one SIP:
 * - Indexes every agent and object across all records by every identifier
 * - Resolves event links, substituting placeholders for ephemeral objects
 * - Classifies roles and relationships against closed vocabularies
 * - Emits role-typed events and representation-typed structure
 *
 * Design rules:
 * - All output is readonly and computed once per SIP
 * - Fail-closed: the first resolution error aborts the SIP
 * - No I/O, no shared state between calls
 */

// Orchestrator
export {
  SipTransformer,
  transformSip,
  transformRawSip,
  transformerOptionsFromConfig,
} from "./transformer.js";
export type { SipTransformerOptions } from "./transformer.js";

// Components
export { EntityIndex } from "./entity-index.js";
export type { EntityIndexOptions } from "./entity-index.js";
export { EventTransformer, NOTE_SEPARATOR } from "./events.js";
export type { EventTransformerOptions } from "./events.js";
export { RepresentationTransformer, DATA_DIRECTORY } from "./representation.js";
export type { RepresentationTransformerOptions } from "./representation.js";
export { CarrierTransformer } from "./carrier.js";
export { parseCarrierProperties, CarrierPropertiesSchema } from "./carrier-properties.js";
export { EntityTransformer } from "./entity.js";

// Role classifier
export {
  isImplementer,
  isExecuter,
  isInstrument,
  hasNoRole,
  isSource,
  isResult,
} from "./roles.js";

// Ingestion
export {
  decodePreservationRecord,
  decodeSipRecords,
  PreservationRecordSchema,
  SipRecordsSchema,
} from "./decode.js";

// Vocabulary
export {
  EVENT_TYPE_BASE_URI,
  CARRIER_TYPE_BASE_URI,
  PRONOM_BASE_URI,
  COPY_RELATIONSHIPS,
  CARRIER_COPY_RELATIONSHIP,
  mapEventTypeToUri,
  mapMediumToUri,
  mapOutcomeToUri,
  mapFixityAlgorithmToUri,
  mapFormatRegistryToUri,
  parseColoringType,
} from "./vocabulary.js";
export type { CopyRelationship } from "./vocabulary.js";

// Errors
export { ResolutionError, exactlyOne, atMostOne } from "./errors.js";
export type { ResolutionErrorCode } from "./errors.js";

// Configuration and logging
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig, DuplicateIdentifierPolicy } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
