/**
 * Provenance Output Types
 *
 * The normalized structural and provenance graph produced for one SIP.
 * References are emitted wherever the target is persisted on its own;
 * ephemeral objects are embedded inline.
 */

import type { Identifier } from "./identifier.js";
import type { StoredAt } from "./carrier.js";

/** Language-tagged string, keyed by language tag (e.g. `{ nl: "File" }`). */
export type LangString = Readonly<Record<string, string>>;

export interface Reference {
  readonly kind: "reference";
  readonly id: string;
}

// =============================================================================
// Agents
// =============================================================================

export interface Organization {
  readonly kind: "organization";
  readonly identifier: string;
  readonly prefLabel: LangString;
}

export interface SoftwareAgent {
  readonly kind: "softwareAgent";
  readonly id: string;
  readonly name: LangString;
  readonly model: null;
  readonly serialNumber: null;
  readonly version: null;
}

export interface HardwareAgent {
  readonly kind: "hardwareAgent";
  readonly name: LangString;
  readonly model: null;
  readonly serialNumber: null;
  readonly version: null;
}

export interface Person {
  readonly kind: "person";
  readonly id: string;
  readonly name: LangString;
  readonly birthDate: null;
  readonly deathDate: null;
}

/** A package-level PREMIS agent, listed as-is. */
export interface PremisAgent {
  readonly identifier: string;
  readonly name: string;
  readonly type: string;
}

// =============================================================================
// Events
// =============================================================================

/** An intermediate artifact that only exists as the result of an event. */
export interface EphemeralObject {
  readonly kind: "object";
  readonly id: string;
}

export interface NormalizedEvent {
  readonly id: string;
  /** Event-type URI */
  readonly type: string;
  readonly startedAtTime: string;
  readonly endedAtTime: string;
  readonly implementedBy: Organization;
  readonly executedBy: SoftwareAgent | null;
  readonly instrument: readonly HardwareAgent[];
  readonly wasAssociatedWith: readonly Person[];
  readonly source: readonly Reference[];
  readonly result: readonly (Reference | EphemeralObject)[];
  readonly note: string | null;
  /** Event-outcome URI */
  readonly outcome: string | null;
  readonly outcomeNote: string | null;
}

// =============================================================================
// Representations
// =============================================================================

export interface FileFixity {
  readonly id: string;
  /** Hash-function URI */
  readonly type: string;
  readonly value: string;
}

export interface File {
  readonly kind: "file";
  readonly id: string;
  readonly isIncludedIn: readonly Reference[];
  readonly size: number;
  readonly name: LangString;
  readonly originalName: string;
  readonly fixity: FileFixity;
  /** Format-registry URL */
  readonly format: { readonly id: string };
  readonly storedAt: { readonly filePath: string };
}

export interface DigitalRepresentation {
  readonly kind: "digitalRepresentation";
  readonly id: string;
  readonly represents: Reference;
  readonly includes: readonly File[];
  readonly name: LangString;
  /** Exactly one of the four copy references is set. */
  readonly isMasterCopyOf: Reference | null;
  readonly isMezzanineCopyOf: Reference | null;
  readonly isAccessCopyOf: Reference | null;
  readonly isTranscriptionCopyOf: Reference | null;
}

export interface CarrierRepresentation {
  readonly kind: "carrierRepresentation";
  readonly id: string;
  readonly represents: Reference;
  readonly isCarrierCopyOf: Reference;
  readonly numberOfReels: number | null;
  readonly hasMissingAudioReels: boolean | null;
  readonly hasMissingImageReels: boolean | null;
  readonly storedAt: readonly StoredAt[];
}

export type Representation = DigitalRepresentation | CarrierRepresentation;

// =============================================================================
// Package
// =============================================================================

export interface IntellectualEntityInfo {
  /** UUID of the entity */
  readonly id: string;
  /** Externally visible id: the pid when present, the UUID otherwise */
  readonly identifier: string;
  readonly primaryIdentifier: readonly Identifier[];
  readonly localIdentifier: readonly Identifier[];
  readonly hasCarrierCopy: Reference | null;
  readonly hasMasterCopy: readonly Reference[];
  readonly hasMezzanineCopy: readonly Reference[];
  readonly hasAccessCopy: readonly Reference[];
  readonly hasTranscriptionCopy: readonly Reference[];
  readonly isRepresentedBy: readonly Representation[];
}

export interface SipProvenance {
  readonly entity: IntellectualEntityInfo;
  readonly events: readonly NormalizedEvent[];
  readonly premisAgents: readonly PremisAgent[];
}
