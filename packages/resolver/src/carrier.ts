/**
 * Carrier Transformer
 *
 * Derives the physical-carrier representation from the package record.
 * Only film-like SIPs declare a representation object at package level;
 * when there is none, no carrier is emitted.
 */

import type {
  CarrierRepresentation,
  PreservationRecord,
  Reference,
  RepresentationObject,
} from "@sip-provenance/types";
import { atMostOne, exactlyOne } from "./errors.js";
import { relatedObjectUuid, uuidOf } from "./identifiers.js";
import { parseCarrierProperties } from "./carrier-properties.js";
import { CARRIER_COPY_RELATIONSHIP } from "./vocabulary.js";

export class CarrierTransformer {
  /**
   * @returns null when the package record declares no representation
   * @throws {ResolutionError} on several carrier representations, a missing or
   * repeated carrier relationship, or malformed carrier properties
   */
  parse(packageRecord: PreservationRecord): CarrierRepresentation | null {
    const carrier = atMostOne(
      packageRecord.objects.filter((o): o is RepresentationObject => o.kind === "representation"),
      "carrier representation in the package record",
    );
    if (carrier === null) {
      return null;
    }

    const id = uuidOf(carrier.identifiers, "carrier representation");
    const relationship = exactlyOne(
      carrier.relationships.filter((rel) => rel.subType === CARRIER_COPY_RELATIONSHIP),
      `"${CARRIER_COPY_RELATIONSHIP}" relationship on carrier ${id}`,
    );
    const entity: Reference = { kind: "reference", id: relatedObjectUuid(relationship) };

    const extension = atMostOne(
      carrier.significantProperties.flatMap((p) => p.extensions),
      `significant-properties extension on carrier ${id}`,
    );
    const properties = extension === null ? null : parseCarrierProperties(extension);

    return {
      kind: "carrierRepresentation",
      id,
      represents: entity,
      isCarrierCopyOf: entity,
      numberOfReels: properties?.numberOfReels ?? null,
      hasMissingAudioReels: properties?.hasMissingAudioReels ?? null,
      hasMissingImageReels: properties?.hasMissingImageReels ?? null,
      storedAt: properties?.storedAt ?? [],
    };
  }
}
