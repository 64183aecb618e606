/**
 * Carrier Significant Properties
 *
 * Describes the physical medium (film reels, tapes, ...) that historically
 * carried an intellectual entity, as parsed from the carrier
 * representation's significant-properties extension.
 */

export type ColoringType = "black-and-white" | "colour" | "mixed";

export interface OpenCaptions {
  readonly inLanguages: readonly string[];
}

export interface Captioning {
  readonly openCaptions: readonly OpenCaptions[];
}

export interface PhysicalCarrier {
  readonly identifier: string;
  /** Carrier-type URI */
  readonly medium: string;
  readonly material: string | null;
  readonly preservationProblems: readonly string[];
  readonly brandName: string | null;
  readonly storageLocationValue: string | null;
}

export interface AudioReel extends PhysicalCarrier {
  readonly kind: "audioReel";
  readonly aspectRatio: string | null;
  readonly stockType: string | null;
}

export interface ImageReel extends PhysicalCarrier {
  readonly kind: "imageReel";
  readonly aspectRatio: string | null;
  readonly stockType: string | null;
  readonly coloringType: readonly ColoringType[];
  readonly hasCaptioning: Captioning | null;
}

export interface GenericCarrier extends PhysicalCarrier {
  readonly kind: "physicalCarrier";
}

export interface StoredAt {
  readonly physicalCarriers: readonly GenericCarrier[];
  readonly imageReels: readonly ImageReel[];
  readonly audioReels: readonly AudioReel[];
}

export interface CarrierSignificantProperties {
  readonly numberOfReels: number | null;
  readonly hasMissingAudioReels: boolean | null;
  readonly hasMissingImageReels: boolean | null;
  readonly storedAt: readonly StoredAt[];
}
