/**
 * Representation Transformer
 *
 * Derives one digital representation, with its files, from each
 * representation-level record. Every "exactly one" expectation is
 * asserted; nothing is picked arbitrarily.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  DigitalRepresentation,
  File,
  FileFixity,
  FileObject,
  LangString,
  Reference,
  RepresentationObject,
  RepresentationRecord,
} from "@sip-provenance/types";
import { ResolutionError, exactlyOne } from "./errors.js";
import { relatedObjectUuid, uuidOf } from "./identifiers.js";
import {
  isCopyRelationship,
  mapFixityAlgorithmToUri,
  mapFormatRegistryToUri,
} from "./vocabulary.js";

/** Directory, inside a representation, that holds the payload files. */
export const DATA_DIRECTORY = "data";

const REPRESENTATION_NAME = "Digital Representation";
const FILE_NAME = "File";

export interface RepresentationTransformerOptions {
  readonly language: string;
}

export class RepresentationTransformer {
  private readonly language: string;

  constructor(options: RepresentationTransformerOptions) {
    this.language = options.language;
  }

  /**
   * @throws {ResolutionError} when the record does not hold exactly one
   * representation with exactly one copy relationship, or a file is incomplete
   */
  parse(representationRecord: RepresentationRecord): DigitalRepresentation {
    const { record, relativePath } = representationRecord;
    const representation = exactlyOne(
      record.objects.filter((o): o is RepresentationObject => o.kind === "representation"),
      `representation object in record "${relativePath}"`,
    );
    const id = uuidOf(representation.identifiers, `representation in "${relativePath}"`);

    const { relationship, copy } = exactlyOne(
      representation.relationships.flatMap((rel) =>
        isCopyRelationship(rel.subType) ? [{ relationship: rel, copy: rel.subType }] : [],
      ),
      `copy relationship on representation ${id}`,
    );
    const entity: Reference = { kind: "reference", id: relatedObjectUuid(relationship) };

    const files = record.objects
      .filter((o): o is FileObject => o.kind === "file")
      .map((file) => this.parseFile(file, id, relativePath));

    return {
      kind: "digitalRepresentation",
      id,
      represents: entity,
      includes: files,
      name: this.langString(REPRESENTATION_NAME),
      isMasterCopyOf: copy === "is master copy of" ? entity : null,
      isMezzanineCopyOf: copy === "is mezzanine copy of" ? entity : null,
      isAccessCopyOf: copy === "is access copy of" ? entity : null,
      isTranscriptionCopyOf: copy === "is transcription copy of" ? entity : null,
    };
  }

  /**
   * @throws {ResolutionError} unless the file has exactly one size, fixity and
   * format, a supported algorithm and registry, and an original name
   */
  parseFile(file: FileObject, representationId: string, relativePath: string): File {
    const id = uuidOf(file.identifiers, "file");

    const size = exactlyOne(
      file.characteristics.map((c) => c.size).filter((s): s is number => s !== null),
      `size on file ${id}`,
    );
    const fixity = exactlyOne(
      file.characteristics.flatMap((c) => c.fixity),
      `fixity on file ${id}`,
    );
    const format = exactlyOne(
      file.characteristics.flatMap((c) => c.formats),
      `format on file ${id}`,
    );

    if (file.originalName === undefined || file.originalName === "") {
      throw new ResolutionError("MISSING_FIELD", `File ${id} has no original name`);
    }

    return {
      kind: "file",
      id,
      isIncludedIn: [{ kind: "reference", id: representationId }],
      size,
      name: this.langString(FILE_NAME),
      originalName: file.originalName,
      fixity: fileFixity(
        id,
        mapFixityAlgorithmToUri(fixity.messageDigestAlgorithm),
        fixity.messageDigest,
      ),
      format: { id: mapFormatRegistryToUri(format.registry) },
      storedAt: {
        filePath: [relativePath, DATA_DIRECTORY, file.originalName].join("/"),
      },
    };
  }

  private langString(text: string): LangString {
    return { [this.language]: text };
  }
}

/**
 * Fixity ids are derived from their content so that repeated runs over
 * the same records produce identical output.
 */
function fileFixity(fileId: string, type: string, value: string): FileFixity {
  const id = createHash("sha256")
    .update(canonicalize({ fileId, type, value }))
    .digest("hex");
  return { id, type, value };
}
