/**
 * Entity Transformer
 *
 * Package-level structural info of the intellectual entity: its ids,
 * the identifiers carried through unchanged, and the copies it declares.
 */

import {
  isLocalIdentifier,
  isPrimaryIdentifier,
} from "@sip-provenance/types";
import type {
  IntellectualEntityInfo,
  IntellectualEntityObject,
  PreservationRecord,
  Reference,
  Relationship,
  Representation,
} from "@sip-provenance/types";
import { exactlyOne } from "./errors.js";
import { pidOf, relatedObjectUuid, uuidOf } from "./identifiers.js";
import {
  HAS_ACCESS_COPY,
  HAS_MASTER_COPY,
  HAS_MEZZANINE_COPY,
  HAS_TRANSCRIPTION_COPY,
} from "./vocabulary.js";

export class EntityTransformer {
  /**
   * @param carrier - The carrier representation's reference, when there is one
   * @throws {ResolutionError} unless the package record holds exactly one intellectual entity
   */
  parse(
    packageRecord: PreservationRecord,
    carrier: Reference | null,
    isRepresentedBy: readonly Representation[],
  ): IntellectualEntityInfo {
    const entity = exactlyOne(
      packageRecord.objects.filter(
        (o): o is IntellectualEntityObject => o.kind === "intellectualEntity",
      ),
      "intellectual entity in the package record",
    );
    const id = uuidOf(entity.identifiers, "intellectual entity");

    return {
      id,
      identifier: pidOf(entity.identifiers, "intellectual entity") ?? id,
      primaryIdentifier: entity.identifiers.filter(isPrimaryIdentifier),
      localIdentifier: entity.identifiers.filter(isLocalIdentifier),
      hasCarrierCopy: carrier,
      hasMasterCopy: references(entity.relationships, HAS_MASTER_COPY),
      hasMezzanineCopy: references(entity.relationships, HAS_MEZZANINE_COPY),
      hasAccessCopy: references(entity.relationships, HAS_ACCESS_COPY),
      hasTranscriptionCopy: references(entity.relationships, HAS_TRANSCRIPTION_COPY),
      isRepresentedBy,
    };
  }
}

function references(relationships: readonly Relationship[], subType: string): Reference[] {
  return relationships
    .filter((rel) => rel.subType === subType)
    .map((rel): Reference => ({ kind: "reference", id: relatedObjectUuid(rel) }));
}
