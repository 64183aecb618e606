/**
 * Preservation Record Types
 *
 * The decoded form of the PREMIS records found in a SIP: one package-level
 * record plus one record per representation. Agents and objects may be
 * declared in any of them; events and relationships only point at them
 * through identifiers.
 *
 * Rules:
 * - Records are immutable once decoded
 * - Role literals are already decoded into closed unions
 * - Object variants are a closed tagged union on `kind`
 */

import type { Identifier } from "./identifier.js";

// =============================================================================
// Agents
// =============================================================================

/**
 * A person, organization, software or hardware participant.
 * The first declared identifier is the agent's primary identifier.
 */
export interface Agent {
  readonly identifiers: readonly Identifier[];
  readonly name: string;
  readonly type: string;
}

// =============================================================================
// Objects
// =============================================================================

/** Unresolved directed edge to another object. */
export interface Relationship {
  readonly type: string;
  readonly subType: string;
  readonly relatedObjectIdentifiers: readonly Identifier[];
}

export interface Fixity {
  readonly messageDigestAlgorithm: string;
  readonly messageDigest: string;
  readonly messageDigestOriginator?: string;
}

export interface FormatDesignation {
  readonly name: string;
  readonly version?: string;
}

export interface FormatRegistry {
  readonly name: string;
  readonly key: string;
  readonly role?: string;
}

export interface Format {
  readonly designation?: FormatDesignation;
  readonly registry?: FormatRegistry;
}

export interface ObjectCharacteristics {
  readonly size: number | null;
  readonly fixity: readonly Fixity[];
  readonly formats: readonly Format[];
}

/**
 * Significant properties of an object. Extensions are opaque trees
 * interpreted by consumers (e.g. the carrier properties parser).
 */
export interface SignificantProperties {
  readonly type?: string;
  readonly value?: string;
  readonly extensions: readonly unknown[];
}

interface ObjectBase {
  readonly identifiers: readonly Identifier[];
  readonly significantProperties: readonly SignificantProperties[];
  readonly relationships: readonly Relationship[];
}

export interface IntellectualEntityObject extends ObjectBase {
  readonly kind: "intellectualEntity";
  readonly originalName?: string;
}

export interface RepresentationObject extends ObjectBase {
  readonly kind: "representation";
  readonly originalName?: string;
}

export interface FileObject extends ObjectBase {
  readonly kind: "file";
  readonly characteristics: readonly ObjectCharacteristics[];
  readonly originalName?: string;
}

export interface BitstreamObject extends ObjectBase {
  readonly kind: "bitstream";
  readonly characteristics: readonly ObjectCharacteristics[];
}

/** A persisted preservation object, discriminated by `kind`. */
export type PreservationObject =
  | IntellectualEntityObject
  | RepresentationObject
  | FileObject
  | BitstreamObject;

export type PreservationObjectKind = PreservationObject["kind"];

/**
 * Placeholder for an object that an event references but no record declares.
 * Models an intermediate artifact that was consumed without being persisted.
 */
export interface TemporaryObject {
  readonly kind: "temporary";
  readonly identifier: Identifier;
}

/** What an object reference resolves to. */
export type ResolvedObject = PreservationObject | TemporaryObject;

/**
 * The only way to forge a placeholder: it carries exactly the identifier
 * it was asked to resolve.
 */
export function temporaryObject(identifier: Identifier): TemporaryObject {
  return { kind: "temporary", identifier: { kind: identifier.kind, value: identifier.value } };
}

// =============================================================================
// Events
// =============================================================================

export type AgentRole = "implementer" | "executer" | "instrument";

export type ObjectRole = "source" | "outcome";

/** Closed role vocabulary; an empty role list stands for "none". */
export type LinkRole = AgentRole | ObjectRole;

export interface LinkingAgent {
  readonly identifier: Identifier;
  readonly roles: readonly AgentRole[];
}

export interface LinkingObject {
  readonly identifier: Identifier;
  readonly roles: readonly ObjectRole[];
}

export interface EventDetailInformation {
  readonly detail?: string;
}

export interface EventOutcomeDetail {
  readonly note?: string;
}

export interface EventOutcomeInformation {
  readonly outcome?: string;
  readonly outcomeDetails: readonly EventOutcomeDetail[];
}

export interface PreservationEvent {
  readonly identifier: Identifier;
  /** Local event-type vocabulary literal (open vocabulary) */
  readonly type: string;
  /** Date and time the event occurred, as recorded */
  readonly datetime: string;
  readonly detailInformation: readonly EventDetailInformation[];
  readonly outcomeInformation: readonly EventOutcomeInformation[];
  readonly linkingAgents: readonly LinkingAgent[];
  readonly linkingObjects: readonly LinkingObject[];
}

// =============================================================================
// Records
// =============================================================================

/** One decoded PREMIS document. */
export interface PreservationRecord {
  readonly objects: readonly PreservationObject[];
  readonly agents: readonly Agent[];
  readonly events: readonly PreservationEvent[];
}

export interface RepresentationRecord {
  /** Path of the representation directory, relative to the SIP root */
  readonly relativePath: string;
  readonly record: PreservationRecord;
}

/**
 * Every record of one SIP. Representations without a record are simply
 * left out by the caller.
 */
export interface SipRecords {
  readonly package: PreservationRecord;
  readonly representations: readonly RepresentationRecord[];
}
