/**
 * Carrier Properties Parser
 *
 * Parses the significant-properties extension of a carrier representation:
 * reel counts, missing-reel flags and the reels (image, audio, other
 * physical carriers) the entity was stored on.
 *
 * The tree mirrors the extension's element names:
 *
 *   {
 *     numberOfReels: "2",
 *     hasMissingAudioReels: "false",
 *     storedAt: [{ imageReel: [...], audioReel: [...], physicalCarrier: [...] }]
 *   }
 *
 * Structure is validated with Zod; vocabulary checks (coloring type) and
 * URI projection (medium) happen while mapping to the output shape.
 */

import { z } from "zod";
import type {
  AudioReel,
  CarrierSignificantProperties,
  GenericCarrier,
  ImageReel,
  PhysicalCarrier,
  StoredAt,
} from "@sip-provenance/types";
import { invalidRecord } from "./errors.js";
import { mapMediumToUri, parseColoringType } from "./vocabulary.js";

// =============================================================================
// Schema
// =============================================================================

const FlagSchema = z.union(
  [
    z.boolean(),
    z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1"),
  ],
  { errorMap: () => ({ message: "Expected true, false, 1 or 0" }) },
);

const COUNT_MESSAGE = "Expected a non-negative integer";

/** Integers, or digit strings as found in the extension's text nodes. */
const CountSchema = z.preprocess(
  (v) => (typeof v === "string" && /^\d+$/.test(v) ? Number(v) : v),
  z
    .number({ invalid_type_error: COUNT_MESSAGE })
    .int(COUNT_MESSAGE)
    .min(0, COUNT_MESSAGE),
);

const CarrierSchema = z.object({
  identifier: z.string(),
  medium: z.string().min(1),
  material: z.string().optional(),
  preservationProblems: z.array(z.string()).default([]),
  brand: z.object({ name: z.string() }).optional(),
  value: z.string().optional(),
});

const ReelSchema = CarrierSchema.extend({
  aspectRatio: z.string().optional(),
  stockType: z.string().optional(),
});

const ImageReelSchema = ReelSchema.extend({
  coloringType: z.array(z.string()).default([]),
  hasCaptioning: z
    .object({
      openCaptions: z
        .array(z.object({ inLanguage: z.array(z.string().min(1)).default([]) }))
        .default([]),
    })
    .optional(),
});

const StoredAtSchema = z.object({
  physicalCarrier: z.array(CarrierSchema).default([]),
  imageReel: z.array(ImageReelSchema).default([]),
  audioReel: z.array(ReelSchema).default([]),
});

export const CarrierPropertiesSchema = z.object({
  numberOfReels: CountSchema.optional(),
  hasMissingAudioReels: FlagSchema.optional(),
  hasMissingImageReels: FlagSchema.optional(),
  storedAt: z.array(StoredAtSchema).default([]),
});

type CarrierTree = z.infer<typeof CarrierSchema>;
type ReelTree = z.infer<typeof ReelSchema>;
type ImageReelTree = z.infer<typeof ImageReelSchema>;
type StoredAtTree = z.infer<typeof StoredAtSchema>;

// =============================================================================
// Parser
// =============================================================================

/**
 * @throws {ResolutionError} INVALID_RECORD on a malformed tree,
 * UNKNOWN_VOCABULARY on an unknown coloring type
 */
export function parseCarrierProperties(tree: unknown): CarrierSignificantProperties {
  const result = CarrierPropertiesSchema.safeParse(tree);
  if (!result.success) {
    throw invalidRecord("carrier significant properties", result.error);
  }

  const parsed = result.data;
  return {
    numberOfReels: parsed.numberOfReels ?? null,
    hasMissingAudioReels: parsed.hasMissingAudioReels ?? null,
    hasMissingImageReels: parsed.hasMissingImageReels ?? null,
    storedAt: parsed.storedAt.map(storedAt),
  };
}

function storedAt(tree: StoredAtTree): StoredAt {
  return {
    physicalCarriers: tree.physicalCarrier.map(
      (c): GenericCarrier => ({ kind: "physicalCarrier", ...carrier(c) }),
    ),
    imageReels: tree.imageReel.map(imageReel),
    audioReels: tree.audioReel.map(
      (r): AudioReel => ({ kind: "audioReel", ...reel(r) }),
    ),
  };
}

function carrier(tree: CarrierTree): PhysicalCarrier {
  return {
    identifier: tree.identifier,
    medium: mapMediumToUri(tree.medium),
    material: tree.material ?? null,
    preservationProblems: tree.preservationProblems,
    brandName: tree.brand?.name ?? null,
    storageLocationValue: tree.value ?? null,
  };
}

function reel(tree: ReelTree): PhysicalCarrier & Pick<AudioReel, "aspectRatio" | "stockType"> {
  return {
    ...carrier(tree),
    aspectRatio: tree.aspectRatio ?? null,
    stockType: tree.stockType ?? null,
  };
}

function imageReel(tree: ImageReelTree): ImageReel {
  return {
    kind: "imageReel",
    ...reel(tree),
    coloringType: tree.coloringType.map(parseColoringType),
    hasCaptioning: tree.hasCaptioning
      ? {
          openCaptions: tree.hasCaptioning.openCaptions.map((c) => ({
            inLanguages: c.inLanguage,
          })),
        }
      : null,
  };
}
