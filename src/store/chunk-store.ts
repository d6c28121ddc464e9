import type Database from "better-sqlite3";
import type { Chunk, ChunkKind, FlowId } from "../shared/types.js";
import { StoreError, getErrorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { StoredChunk } from "./codec.js";
import { chunkTableSql } from "./schema.js";

interface ChunkRow {
  flow_id: string;
  kind: string;
  payload: string | Buffer | null;
}

interface CountRow {
  count: number;
}

/**
 * Raw access to the `chunk` table. Every write runs in its own transaction
 * and is all-or-nothing.
 */
export class ChunkStore {
  private readonly upsert: Database.Statement<[string, string, string | Buffer]>;
  private readonly deleteKinds: Database.Statement<[string, string]>;
  private readonly deleteFlows: Database.Statement<[string]>;

  constructor(
    private readonly db: Database.Database,
    private readonly logger?: Logger
  ) {
    this.db.exec(chunkTableSql());

    this.upsert = this.db.prepare<[string, string, string | Buffer]>(`
      INSERT INTO chunk (flow_id, kind, payload) VALUES (?, ?, ?)
      ON CONFLICT (flow_id, kind) DO UPDATE SET payload = excluded.payload
    `);
    this.deleteKinds = this.db.prepare<[string, string]>(`
      DELETE FROM chunk
      WHERE flow_id = ? AND kind NOT IN (SELECT value FROM json_each(?))
    `);
    this.deleteFlows = this.db.prepare<[string]>(`
      DELETE FROM chunk WHERE flow_id IN (SELECT value FROM json_each(?))
    `);
  }

  /**
   * Insert or replace a batch of chunks keyed by (flow id, kind).
   */
  put(rows: readonly Chunk[]): void {
    this.write("put chunks", () => {
      for (const row of rows) {
        this.upsert.run(row.flowId, row.kind, row.payload);
      }
    });
    this.logger?.trace("Stored chunks", { count: rows.length });
  }

  /**
   * Write a flow's chunks and delete any of its other kinds, so a flow that
   * lost its response content no longer has a stale content row.
   */
  replaceFlow(flowId: FlowId, rows: readonly Chunk[]): void {
    const kinds: ChunkKind[] = [];
    for (const row of rows) {
      if (row.flowId !== flowId) {
        throw new StoreError(`Chunk for flow ${row.flowId} passed to replaceFlow(${flowId})`);
      }
      kinds.push(row.kind);
    }

    this.write(`replace flow ${flowId}`, () => {
      for (const row of rows) {
        this.upsert.run(row.flowId, row.kind, row.payload);
      }
      this.deleteKinds.run(flowId, JSON.stringify(kinds));
    });
  }

  /**
   * Delete every chunk of the given flows. Returns the number of rows removed.
   */
  remove(flowIds: readonly FlowId[]): number {
    if (flowIds.length === 0) {
      return 0;
    }
    return this.write("remove flows", () => this.deleteFlows.run(JSON.stringify(flowIds)).changes);
  }

  clear(): number {
    return this.write("clear chunks", () => this.db.prepare("DELETE FROM chunk").run().changes);
  }

  /**
   * Read the chunks of the given flows, grouped by flow id in insertion order.
   * Flows with no chunks are absent from the map.
   */
  readChunks(flowIds: readonly FlowId[]): Map<FlowId, StoredChunk[]> {
    const grouped = new Map<FlowId, StoredChunk[]>();
    if (flowIds.length === 0) {
      return grouped;
    }

    const rows = this.read("read chunks", () =>
      this.db
        .prepare<[string], ChunkRow>(
          `SELECT flow_id, kind, payload FROM chunk
           WHERE flow_id IN (SELECT value FROM json_each(?))
           ORDER BY id`
        )
        .all(JSON.stringify(flowIds))
    );

    for (const row of rows) {
      const chunk: StoredChunk = { flowId: row.flow_id, kind: row.kind, payload: row.payload };
      const existing = grouped.get(row.flow_id);
      if (existing) {
        existing.push(chunk);
      } else {
        grouped.set(row.flow_id, [chunk]);
      }
    }
    return grouped;
  }

  countChunks(): number {
    const row = this.read("count chunks", () =>
      this.db.prepare<[], CountRow>("SELECT COUNT(*) AS count FROM chunk").get()
    );
    return row?.count ?? 0;
  }

  private write<T>(action: string, fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      if (err instanceof StoreError) {
        throw err;
      }
      this.logger?.error(`Failed to ${action}`, { error: getErrorMessage(err) });
      throw new StoreError(`Failed to ${action}: ${getErrorMessage(err)}`, { cause: err });
    }
  }

  private read<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreError(`Failed to ${action}: ${getErrorMessage(err)}`, { cause: err });
    }
  }
}
