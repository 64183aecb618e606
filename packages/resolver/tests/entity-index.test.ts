/**
 * Tests for the cross-record EntityIndex.
 *
 * Covers:
 * - Aggregation over package and representation records
 * - Lookup by every declared identifier
 * - Temporary placeholders for object misses
 * - Fatal agent misses
 * - Duplicate identifier policies
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Agent, Identifier, SipRecords } from "@sip-provenance/types";
import { EntityIndex } from "../src/entity-index.js";
import { ResolutionError } from "../src/errors.js";
import { agent, entityObject, fileObject, record, uuid } from "./fixtures.js";

const PID: Identifier = { kind: "MEEMOO-PID", value: "qs123" };

function sip(parts: Partial<SipRecords>): SipRecords {
  return { package: record({}), representations: [], ...parts };
}

describe("EntityIndex", () => {
  describe("build", () => {
    it("indexes agents and objects from every record", () => {
      const index = EntityIndex.build(
        sip({
          package: record({ objects: [entityObject("ie-1")], agents: [agent("a-1", "Archive")] }),
          representations: [
            {
              relativePath: "representations/representation_1",
              record: record({ objects: [fileObject("f-1", "video.mxf")], agents: [agent("a-2", "Encoder")] }),
            },
          ],
        }),
      );

      expect(index.resolveAgent(uuid("a-1")).name).toBe("Archive");
      expect(index.resolveAgent(uuid("a-2")).name).toBe("Encoder");
      expect(index.resolveObject(uuid("f-1")).kind).toBe("file");
      expect(index.agentCount).toBe(2);
      expect(index.objectCount).toBe(2);
    });

    it("makes an entity reachable by each of its identifiers", () => {
      const entity = entityObject("ie-1", [], [PID]);
      const index = EntityIndex.build(sip({ package: record({ objects: [entity] }) }));

      expect(index.resolveObject(uuid("ie-1"))).toBe(entity);
      expect(index.resolveObject(PID)).toBe(entity);
      expect(index.keyCount).toBe(2);
      expect(index.objectCount).toBe(1);
    });

    it("keeps kinds apart for the same value", () => {
      const byUuid = entityObject("x");
      const index = EntityIndex.build(sip({ package: record({ objects: [byUuid] }) }));

      expect(index.resolveObject(uuid("x"))).toBe(byUuid);
      expect(index.resolveObject({ kind: "MEEMOO-PID", value: "x" }).kind).toBe("temporary");
    });
  });

  describe("resolveObject", () => {
    it("returns a temporary object wrapping exactly the missing identifier", () => {
      const index = EntityIndex.build(sip({}));

      expect(index.resolveObject(uuid("ghost"))).toEqual({
        kind: "temporary",
        identifier: { kind: "UUID", value: "ghost" },
      });
    });

    it("does not insert the placeholder back into the index", () => {
      const index = EntityIndex.build(sip({}));
      index.resolveObject(uuid("ghost"));

      expect(index.objectCount).toBe(0);
      expect(index.keyCount).toBe(0);
    });
  });

  describe("resolveAgent", () => {
    it("throws AGENT_NOT_FOUND for an undeclared agent", () => {
      const index = EntityIndex.build(sip({}));

      expect(() => index.resolveAgent(uuid("nobody"))).toThrow(ResolutionError);
      try {
        index.resolveAgent(uuid("nobody"));
      } catch (err) {
        expect((err as ResolutionError).code).toBe("AGENT_NOT_FOUND");
        expect((err as ResolutionError).message).toBe(
          "No agent declared with identifier UUID:nobody",
        );
      }
    });
  });

  describe("duplicate identifiers", () => {
    const first = agent("a-1", "Archive");
    const conflicting: Agent = { ...agent("a-1", "Other archive") };

    const records = sip({
      package: record({ agents: [first] }),
      representations: [
        { relativePath: "representations/representation_1", record: record({ agents: [conflicting] }) },
      ],
    });

    it("keeps the first insertion by default", () => {
      const index = EntityIndex.build(records);
      expect(index.resolveAgent(uuid("a-1")).name).toBe("Archive");
    });

    it("raises on conflicting entities under the strict policy", () => {
      expect(() => EntityIndex.build(records, { duplicatePolicy: "strict" })).toThrow(
        "Identifier UUID:a-1 is declared by two different agents",
      );
    });

    it("accepts identical re-declarations under the strict policy", () => {
      const repeated = sip({
        package: record({ agents: [agent("a-1", "Archive")] }),
        representations: [
          { relativePath: "representations/representation_1", record: record({ agents: [agent("a-1", "Archive")] }) },
        ],
      });

      const index = EntityIndex.build(repeated, { duplicatePolicy: "strict" });
      expect(index.agentCount).toBe(1);
    });
  });

  describe("properties", () => {
    const arbIdentifier = fc.record({
      kind: fc.constantFrom("UUID", "MEEMOO-PID", "MEEMOO-LOCAL-ID", "CP-ID"),
      value: fc.string({ minLength: 1, maxLength: 12 }),
    });

    it("resolves an object by any of its declared identifiers", () => {
      fc.assert(
        fc.property(
          fc.uniqueArray(arbIdentifier, {
            minLength: 1,
            maxLength: 5,
            selector: (id) => `${id.kind}|${id.value}`,
          }),
          (identifiers) => {
            const object = { ...entityObject("unused"), identifiers };
            const index = EntityIndex.build(sip({ package: record({ objects: [object] }) }));
            for (const id of identifiers) {
              expect(index.resolveObject(id)).toBe(object);
            }
          },
        ),
      );
    });

    it("resolves an agent by any of its declared identifiers", () => {
      fc.assert(
        fc.property(
          fc.uniqueArray(arbIdentifier, {
            minLength: 1,
            maxLength: 5,
            selector: (id) => `${id.kind}|${id.value}`,
          }),
          (identifiers) => {
            const declared: Agent = { identifiers, name: "Archive", type: "organization" };
            const index = EntityIndex.build(sip({ package: record({ agents: [declared] }) }));
            for (const id of identifiers) {
              expect(index.resolveAgent(id)).toBe(declared);
            }
            expect(index.agentCount).toBe(1);
          },
        ),
      );
    });

    it("resolves an agent declared in a representation record by a later identifier", () => {
      const declared = agent("sw-1", "ffmpeg", "software", [{ kind: "SOFTWARE-ID", value: "ffmpeg-6" }]);
      const index = EntityIndex.build(
        sip({
          representations: [
            { relativePath: "representations/representation_1", record: record({ agents: [declared] }) },
          ],
        }),
      );

      expect(index.resolveAgent({ kind: "SOFTWARE-ID", value: "ffmpeg-6" })).toBe(declared);
    });

    it("never throws on an object miss", () => {
      fc.assert(
        fc.property(arbIdentifier, (id) => {
          const index = EntityIndex.build(sip({}));
          expect(index.resolveObject(id)).toEqual({ kind: "temporary", identifier: id });
        }),
      );
    });
  });
});
