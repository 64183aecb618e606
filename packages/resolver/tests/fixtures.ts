/**
 * Record builders shared by the resolver tests.
 */

import type {
  Agent,
  AgentRole,
  FileObject,
  Identifier,
  IntellectualEntityObject,
  ObjectRole,
  PreservationEvent,
  PreservationRecord,
  Relationship,
  RepresentationObject,
  SignificantProperties,
} from "@sip-provenance/types";

export const TS = "2024-03-01T10:00:00+01:00";

export function uuid(value: string): Identifier {
  return { kind: "UUID", value };
}

export function relationship(subType: string, target: string): Relationship {
  return {
    type: "structural",
    subType,
    relatedObjectIdentifiers: [uuid(target)],
  };
}

export function agent(id: string, name: string, type = "organization", extra: Identifier[] = []): Agent {
  return { identifiers: [uuid(id), ...extra], name, type };
}

export function entityObject(
  id: string,
  relationships: Relationship[] = [],
  extra: Identifier[] = [],
): IntellectualEntityObject {
  return {
    kind: "intellectualEntity",
    identifiers: [uuid(id), ...extra],
    significantProperties: [],
    relationships,
  };
}

export function representationObject(
  id: string,
  relationships: Relationship[],
  significantProperties: SignificantProperties[] = [],
): RepresentationObject {
  return {
    kind: "representation",
    identifiers: [uuid(id)],
    significantProperties,
    relationships,
  };
}

export function fileObject(
  id: string,
  originalName: string,
  overrides: Partial<Pick<FileObject, "characteristics" | "originalName">> = {},
): FileObject {
  return {
    kind: "file",
    identifiers: [uuid(id)],
    significantProperties: [],
    relationships: [],
    originalName,
    characteristics: [
      {
        size: 1024,
        fixity: [{ messageDigestAlgorithm: "MD5", messageDigest: "d41d8cd98f00b204e9800998ecf8427e" }],
        formats: [{ registry: { name: "PRONOM", key: "fmt/199" } }],
      },
    ],
    ...overrides,
  };
}

export function event(
  id: string,
  links: {
    agents?: { id: Identifier; roles: AgentRole[] }[];
    objects?: { id: Identifier; roles: ObjectRole[] }[];
  },
  extra: Partial<PreservationEvent> = {},
): PreservationEvent {
  return {
    identifier: uuid(id),
    type: "digitization",
    datetime: TS,
    detailInformation: [],
    outcomeInformation: [],
    linkingAgents: (links.agents ?? []).map((l) => ({ identifier: l.id, roles: l.roles })),
    linkingObjects: (links.objects ?? []).map((l) => ({ identifier: l.id, roles: l.roles })),
    ...extra,
  };
}

export function record(parts: Partial<PreservationRecord>): PreservationRecord {
  return { objects: [], agents: [], events: [], ...parts };
}
