import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { makeFlow } from "../../tests/helpers/flows.js";
import { StoreError } from "../shared/errors.js";
import type { Chunk } from "../shared/types.js";
import { ChunkStore } from "./chunk-store.js";
import { encodeFlow } from "./codec.js";

describe("ChunkStore", () => {
  let db: Database.Database;
  let store: ChunkStore;

  beforeEach(() => {
    db = new Database(":memory:");
    store = new ChunkStore(db);
  });

  afterEach(() => {
    db.close();
  });

  function kindsOf(flowId: string): string[] {
    return (store.readChunks([flowId]).get(flowId) ?? []).map((chunk) => chunk.kind);
  }

  describe("put", () => {
    it("stores each chunk once per flow and kind", () => {
      const rows = encodeFlow(makeFlow({ id: "f1" }));
      store.put(rows);
      store.put(rows);
      expect(store.countChunks()).toBe(rows.length);
    });

    it("replaces the payload of an existing chunk", () => {
      store.put([{ flowId: "f1", kind: "request_content", payload: Buffer.from("first") }]);
      store.put([{ flowId: "f1", kind: "request_content", payload: Buffer.from("second") }]);

      const stored = store.readChunks(["f1"]).get("f1");
      expect(stored).toEqual([{ flowId: "f1", kind: "request_content", payload: Buffer.from("second") }]);
    });

    it("keeps metadata as text and content as bytes", () => {
      store.put([
        { flowId: "f1", kind: "client_conn", payload: '{"id":"c"}' },
        { flowId: "f1", kind: "response_content", payload: Buffer.from("body") },
      ]);
      const types = db
        .prepare<[], { kind: string; type: string }>("SELECT kind, typeof(payload) AS type FROM chunk ORDER BY id")
        .all();
      expect(types).toEqual([
        { kind: "client_conn", type: "text" },
        { kind: "response_content", type: "blob" },
      ]);
    });

    it("rolls back the whole batch when one row fails", () => {
      db.exec(`
        CREATE TRIGGER reject_bad BEFORE INSERT ON chunk WHEN new.flow_id = 'bad'
        BEGIN SELECT RAISE(ABORT, 'rejected'); END;
      `);
      const rows: Chunk[] = [
        { flowId: "good", kind: "request_content", payload: Buffer.from("a") },
        { flowId: "bad", kind: "request_content", payload: Buffer.from("b") },
      ];

      let caught: unknown;
      try {
        store.put(rows);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(StoreError);
      expect(caught instanceof StoreError && caught.message).toBe("Failed to put chunks: rejected");
      expect(caught instanceof StoreError && caught.cause).toBeInstanceOf(Error);
      expect(store.countChunks()).toBe(0);
    });
  });

  describe("replaceFlow", () => {
    it("drops kinds the new state no longer has", () => {
      store.replaceFlow("f1", encodeFlow(makeFlow({ id: "f1", requestBody: "x" })));
      expect(kindsOf("f1")).toContain("request_content");

      store.replaceFlow("f1", encodeFlow(makeFlow({ id: "f1" })));
      expect(kindsOf("f1").sort()).toEqual(["client_conn", "http_flow", "response_content", "server_conn"]);
    });

    it("leaves other flows alone", () => {
      store.replaceFlow("f1", encodeFlow(makeFlow({ id: "f1" })));
      store.replaceFlow("f2", encodeFlow(makeFlow({ id: "f2", status: null })));
      expect(kindsOf("f1")).toHaveLength(4);
      expect(kindsOf("f2")).toHaveLength(3);
    });

    it("rejects chunks of another flow", () => {
      expect(() => store.replaceFlow("f1", encodeFlow(makeFlow({ id: "f2" })))).toThrow(StoreError);
      expect(store.countChunks()).toBe(0);
    });
  });

  describe("remove and clear", () => {
    beforeEach(() => {
      store.put(encodeFlow(makeFlow({ id: "f1" })));
      store.put(encodeFlow(makeFlow({ id: "f2", status: null })));
    });

    it("removes every chunk of the given flows", () => {
      expect(store.remove(["f1", "missing"])).toBe(4);
      expect(store.readChunks(["f1", "f2"]).has("f1")).toBe(false);
      expect(store.countChunks()).toBe(3);
    });

    it("ignores an empty id list", () => {
      expect(store.remove([])).toBe(0);
      expect(store.countChunks()).toBe(7);
    });

    it("clears everything", () => {
      expect(store.clear()).toBe(7);
      expect(store.countChunks()).toBe(0);
    });
  });

  describe("readChunks", () => {
    it("groups rows by flow in insertion order", () => {
      store.put(encodeFlow(makeFlow({ id: "f1" })));
      store.put(encodeFlow(makeFlow({ id: "f2", status: null })));

      const grouped = store.readChunks(["f2", "f1", "missing"]);
      expect([...grouped.keys()]).toEqual(["f1", "f2"]);
      expect(grouped.get("f2")?.map((chunk) => chunk.kind)).toEqual(["client_conn", "server_conn", "http_flow"]);
      expect(grouped.has("missing")).toBe(false);
    });
  });
});
