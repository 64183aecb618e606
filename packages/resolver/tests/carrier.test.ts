/**
 * Tests for CarrierTransformer and the carrier properties parser.
 */

import { describe, it, expect } from "vitest";
import { CarrierTransformer } from "../src/carrier.js";
import { parseCarrierProperties } from "../src/carrier-properties.js";
import { ResolutionError } from "../src/errors.js";
import { entityObject, record, relationship, representationObject } from "./fixtures.js";

const CARRIER_TYPE = "https://data.hetarchief.be/id/carrier-type/";

const FILM_TREE = {
  numberOfReels: "2",
  hasMissingAudioReels: "false",
  hasMissingImageReels: true,
  storedAt: [
    {
      imageReel: [
        {
          identifier: "R1",
          medium: "35mm",
          coloringType: ["colour"],
          hasCaptioning: { openCaptions: [{ inLanguage: ["nl", "fr"] }] },
          brand: { name: "Kodak" },
          value: "Shelf 4",
        },
      ],
      audioReel: [{ identifier: "A1", medium: "magnetic", stockType: "polyester" }],
    },
  ],
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof ResolutionError ? err.code : undefined;
  }
  return undefined;
}

// =============================================================================
// Properties Parser
// =============================================================================

describe("parseCarrierProperties", () => {
  it("parses counts, flags and reels", () => {
    const props = parseCarrierProperties(FILM_TREE);

    expect(props.numberOfReels).toBe(2);
    expect(props.hasMissingAudioReels).toBe(false);
    expect(props.hasMissingImageReels).toBe(true);
    expect(props.storedAt).toEqual([
      {
        physicalCarriers: [],
        imageReels: [
          {
            kind: "imageReel",
            identifier: "R1",
            medium: `${CARRIER_TYPE}35mm`,
            material: null,
            preservationProblems: [],
            brandName: "Kodak",
            storageLocationValue: "Shelf 4",
            aspectRatio: null,
            stockType: null,
            coloringType: ["colour"],
            hasCaptioning: { openCaptions: [{ inLanguages: ["nl", "fr"] }] },
          },
        ],
        audioReels: [
          {
            kind: "audioReel",
            identifier: "A1",
            medium: `${CARRIER_TYPE}magnetic`,
            material: null,
            preservationProblems: [],
            brandName: null,
            storageLocationValue: null,
            aspectRatio: null,
            stockType: "polyester",
          },
        ],
      },
    ]);
  });

  it("leaves absent fields null", () => {
    expect(parseCarrierProperties({})).toEqual({
      numberOfReels: null,
      hasMissingAudioReels: null,
      hasMissingImageReels: null,
      storedAt: [],
    });
  });

  it("accepts numeric flags", () => {
    const props = parseCarrierProperties({ hasMissingAudioReels: "1", hasMissingImageReels: "0" });

    expect(props.hasMissingAudioReels).toBe(true);
    expect(props.hasMissingImageReels).toBe(false);
  });

  it("parses generic physical carriers", () => {
    const props = parseCarrierProperties({
      storedAt: [{ physicalCarrier: [{ identifier: "T1", medium: "betacam", material: "tape", preservationProblems: ["mould"] }] }],
    });

    expect(props.storedAt[0]?.physicalCarriers).toEqual([
      {
        kind: "physicalCarrier",
        identifier: "T1",
        medium: `${CARRIER_TYPE}betacam`,
        material: "tape",
        preservationProblems: ["mould"],
        brandName: null,
        storageLocationValue: null,
      },
    ]);
  });

  it("rejects a non-numeric reel count", () => {
    try {
      parseCarrierProperties({ numberOfReels: "two" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ResolutionError);
      const error = err as ResolutionError;
      expect(error.code).toBe("INVALID_RECORD");
      expect(error.message).toBe("Invalid carrier significant properties");
      expect(error.details?.["issues"]).toEqual([
        { path: "numberOfReels", message: "Expected a non-negative integer" },
      ]);
    }
  });

  it("rejects an unknown flag literal", () => {
    try {
      parseCarrierProperties({ hasMissingAudioReels: "yes" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ResolutionError);
      expect((err as ResolutionError).details?.["issues"]).toEqual([
        { path: "hasMissingAudioReels", message: "Expected true, false, 1 or 0" },
      ]);
    }
  });

  it("rejects a negative reel count", () => {
    try {
      parseCarrierProperties({ numberOfReels: -1 });
      expect.unreachable();
    } catch (err) {
      expect((err as ResolutionError).details?.["issues"]).toEqual([
        { path: "numberOfReels", message: "Expected a non-negative integer" },
      ]);
    }
  });

  it("rejects a reel without medium", () => {
    expect(
      codeOf(() => parseCarrierProperties({ storedAt: [{ imageReel: [{ identifier: "R1" }] }] })),
    ).toBe("INVALID_RECORD");
  });

  it("rejects an unknown coloring type", () => {
    const tree = { storedAt: [{ imageReel: [{ identifier: "R1", medium: "16mm", coloringType: ["sepia"] }] }] };
    expect(() => parseCarrierProperties(tree)).toThrow('Unknown coloring type "sepia"');
  });

  it("rejects a tree that is not an object", () => {
    expect(codeOf(() => parseCarrierProperties("reels"))).toBe("INVALID_RECORD");
  });
});

// =============================================================================
// Transformer
// =============================================================================

describe("CarrierTransformer", () => {
  const transformer = new CarrierTransformer();

  it("returns null without a package-level representation", () => {
    expect(transformer.parse(record({ objects: [entityObject("ie-1")] }))).toBeNull();
  });

  it("builds the carrier from its relationship and extension", () => {
    const carrier = representationObject(
      "car-1",
      [relationship("is carrier copy of", "ie-1")],
      [{ extensions: [FILM_TREE] }],
    );
    const result = transformer.parse(record({ objects: [entityObject("ie-1"), carrier] }));

    expect(result).not.toBeNull();
    expect(result!.kind).toBe("carrierRepresentation");
    expect(result!.id).toBe("car-1");
    expect(result!.represents).toEqual({ kind: "reference", id: "ie-1" });
    expect(result!.isCarrierCopyOf).toEqual({ kind: "reference", id: "ie-1" });
    expect(result!.numberOfReels).toBe(2);
    expect(result!.hasMissingAudioReels).toBe(false);
    expect(result!.storedAt[0]?.imageReels[0]?.identifier).toBe("R1");
  });

  it("leaves reel data empty without an extension", () => {
    const carrier = representationObject("car-1", [relationship("is carrier copy of", "ie-1")]);

    expect(transformer.parse(record({ objects: [carrier] }))).toEqual({
      kind: "carrierRepresentation",
      id: "car-1",
      represents: { kind: "reference", id: "ie-1" },
      isCarrierCopyOf: { kind: "reference", id: "ie-1" },
      numberOfReels: null,
      hasMissingAudioReels: null,
      hasMissingImageReels: null,
      storedAt: [],
    });
  });

  it("requires the carrier copy relationship", () => {
    const carrier = representationObject("car-1", [relationship("is master copy of", "ie-1")]);
    expect(() => transformer.parse(record({ objects: [carrier] }))).toThrow(
      'Expected exactly one "is carrier copy of" relationship on carrier car-1, found none',
    );
  });

  it("rejects two package-level representations", () => {
    const a = representationObject("car-1", [relationship("is carrier copy of", "ie-1")]);
    const b = representationObject("car-2", [relationship("is carrier copy of", "ie-1")]);
    expect(codeOf(() => transformer.parse(record({ objects: [a, b] })))).toBe("MULTIPLE_MATCHES");
  });

  it("rejects two extensions", () => {
    const carrier = representationObject(
      "car-1",
      [relationship("is carrier copy of", "ie-1")],
      [{ extensions: [{}] }, { extensions: [{}] }],
    );
    expect(codeOf(() => transformer.parse(record({ objects: [carrier] })))).toBe("MULTIPLE_MATCHES");
  });
});
