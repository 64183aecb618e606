/**
 * @sip-provenance/types: Shared domain types for the SIP provenance resolver.
 *
 * These types are used across all packages:
 * - Identifiers and identifier kinds
 * - Decoded PREMIS records (agents, objects, events, relationships)
 * - Carrier significant properties
 * - The normalized provenance output graph
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in the resolver
 */

// Identifier types
export type { Identifier } from "./identifier.js";
export {
  UUID_KIND,
  PID_KIND,
  PRIMARY_KIND,
  isUuidIdentifier,
  isPidIdentifier,
  isPrimaryIdentifier,
  isLocalIdentifier,
  identifierEquals,
} from "./identifier.js";

// Record types
export type {
  Agent,
  Relationship,
  Fixity,
  FormatDesignation,
  FormatRegistry,
  Format,
  ObjectCharacteristics,
  SignificantProperties,
  IntellectualEntityObject,
  RepresentationObject,
  FileObject,
  BitstreamObject,
  PreservationObject,
  PreservationObjectKind,
  TemporaryObject,
  ResolvedObject,
  AgentRole,
  ObjectRole,
  LinkRole,
  LinkingAgent,
  LinkingObject,
  EventDetailInformation,
  EventOutcomeDetail,
  EventOutcomeInformation,
  PreservationEvent,
  PreservationRecord,
  RepresentationRecord,
  SipRecords,
} from "./records.js";
export { temporaryObject } from "./records.js";

// Carrier types
export type {
  ColoringType,
  OpenCaptions,
  Captioning,
  PhysicalCarrier,
  AudioReel,
  ImageReel,
  GenericCarrier,
  StoredAt,
  CarrierSignificantProperties,
} from "./carrier.js";

// Provenance output types
export type {
  LangString,
  Reference,
  Organization,
  SoftwareAgent,
  HardwareAgent,
  Person,
  PremisAgent,
  EphemeralObject,
  NormalizedEvent,
  FileFixity,
  File,
  DigitalRepresentation,
  CarrierRepresentation,
  Representation,
  IntellectualEntityInfo,
  SipProvenance,
} from "./provenance.js";

// Runtime type guards
export {
  AGENT_ROLES,
  OBJECT_ROLES,
  COLORING_TYPES,
  isIdentifier,
  isAgentRole,
  isObjectRole,
  isLinkRole,
  isPreservationObjectKind,
  isTemporaryObject,
  isPreservationObject,
  isColoringType,
  isReference,
  isEphemeralObject,
} from "./guards.js";
