import * as fs from "node:fs";
import Database from "better-sqlite3";
import type {
  FlowId,
  FlowQuery,
  FlowState,
  FlowSummary,
  HttpFlowState,
} from "../shared/types.js";
import { DecodeError, StoreError, getErrorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import {
  DEFAULT_CONFIG,
  DEFAULT_PAGE_SIZE,
  type JournalMode,
  type SynchronousMode,
} from "../shared/config.js";
import { RegexCache } from "../shared/regex-filter.js";
import { compileFilter, MATCH_ALL, type CompiledPredicate } from "../filter/compiler.js";
import { parseFilter } from "../filter/parser.js";
import { ChunkStore } from "./chunk-store.js";
import { decodeFlow, encodeFlow } from "./codec.js";
import {
  ensureDerivedSchema,
  rebuildDerivedSchema,
  registerSearchFunction,
} from "./derived-views.js";
import { countFlows, queryFlowIds, queryFlowSummaries, type PageOptions } from "./query.js";
import { CHUNK_TABLE, chunkTableSql } from "./schema.js";

export interface FlowStoreOptions {
  /** Database file, or ":memory:" */
  path: string;
  journalMode?: JournalMode;
  synchronous?: SynchronousMode;
  /** Limit used by query() and summaries() when the caller gives none */
  pageSize?: number;
  logger?: Logger;
}

export interface LoadFailure {
  id: FlowId;
  error: DecodeError;
}

export interface LoadResult {
  flows: HttpFlowState[];
  failed: LoadFailure[];
}

export interface CopyResult {
  flows: number;
  chunks: number;
}

const COPY_TARGET_SCHEMA = "copy_target";

interface CountRow {
  count: number;
}

/**
 * Handle on one flow database. Owns the connection; everything is
 * synchronous, so calls on one handle never interleave.
 */
export class FlowStore {
  private readonly chunks: ChunkStore;
  private readonly pageSize: number;
  private closed = false;

  private constructor(
    private readonly db: Database.Database,
    private readonly logger: Logger | undefined,
    pageSize: number
  ) {
    this.pageSize = pageSize;
    this.chunks = new ChunkStore(db, logger);
  }

  /**
   * Open (or create) a flow database. The derived schema is checked and, if
   * its version is stale, rebuilt before this returns.
   */
  static open(options: FlowStoreOptions): FlowStore {
    const logger = options.logger;

    let db: Database.Database;
    try {
      db = new Database(options.path);
    } catch (err) {
      throw new StoreError(`Failed to open ${options.path}: ${getErrorMessage(err)}`, { cause: err });
    }

    try {
      db.pragma(`journal_mode = ${options.journalMode ?? DEFAULT_CONFIG.journalMode}`);
      db.pragma(`synchronous = ${options.synchronous ?? DEFAULT_CONFIG.synchronous}`);
      registerSearchFunction(db, new RegexCache());

      const store = new FlowStore(db, logger, options.pageSize ?? DEFAULT_PAGE_SIZE);
      if (ensureDerivedSchema(db, logger)) {
        logger?.info("Derived schema was stale and has been rebuilt", { path: options.path });
      }
      logger?.debug("Opened flow store", { path: options.path });
      return store;
    } catch (err) {
      db.close();
      if (err instanceof StoreError) {
        throw err;
      }
      throw new StoreError(`Failed to prepare ${options.path}: ${getErrorMessage(err)}`, { cause: err });
    }
  }

  /**
   * Persist the current state of one flow, replacing what was stored for it.
   *
   * @throws UnsupportedFlowTypeError for non-HTTP flows
   * @throws StoreError if the write failed (nothing was written)
   */
  record(flow: FlowState): void {
    const chunks = encodeFlow(flow);
    this.chunks.replaceFlow(flow.id, chunks);
    this.logger?.trace("Recorded flow", { id: flow.id, chunks: chunks.length });
  }

  /**
   * Flow ids matching a filter, in the requested order.
   *
   * @throws ParseError for malformed filter text
   */
  query(query: FlowQuery = {}): FlowId[] {
    const predicate = this.compile(query.filter);
    return this.read("query flows", () => queryFlowIds(this.db, predicate, this.page(query)));
  }

  count(filter?: string): number {
    const predicate = this.compile(filter);
    return this.read("count flows", () => countFlows(this.db, predicate));
  }

  summaries(query: FlowQuery = {}): FlowSummary[] {
    const predicate = this.compile(query.filter);
    return this.read("list flows", () => queryFlowSummaries(this.db, predicate, this.page(query)));
  }

  /**
   * Decode the given flows, in the order asked for. Flows that fail to decode
   * are reported in `failed` and do not stop the rest.
   */
  load(ids: readonly FlowId[]): LoadResult {
    const stored = this.chunks.readChunks(ids);
    const result: LoadResult = { flows: [], failed: [] };

    for (const id of ids) {
      const rows = stored.get(id);
      if (!rows) {
        result.failed.push({ id, error: new DecodeError("No chunks stored", id) });
        continue;
      }

      try {
        result.flows.push(decodeFlow(rows));
      } catch (err) {
        if (!(err instanceof DecodeError)) {
          throw err;
        }
        this.logger?.warn("Skipping flow that failed to decode", { id, error: err.message });
        result.failed.push({ id, error: err });
      }
    }

    return result;
  }

  /**
   * A single flow, or undefined if it is not stored.
   *
   * @throws DecodeError if the flow is stored but cannot be decoded
   */
  get(id: FlowId): HttpFlowState | undefined {
    const rows = this.chunks.readChunks([id]).get(id);
    return rows ? decodeFlow(rows) : undefined;
  }

  /**
   * Copy the chunks of matching flows into a new database file. The target
   * must not already hold a chunk table. Runs in one transaction: the target
   * receives every selected flow or nothing. A target file created by a copy
   * that fails is deleted again.
   */
  copyTo(targetPath: string, filter?: string): CopyResult {
    const predicate = this.compile(filter);
    const existed = fs.existsSync(targetPath);
    let failed = false;

    try {
      this.db.prepare(`ATTACH DATABASE ? AS ${COPY_TARGET_SCHEMA}`).run(targetPath);
    } catch (err) {
      throw new StoreError(`Failed to open ${targetPath}: ${getErrorMessage(err)}`, { cause: err });
    }

    try {
      const copy = this.db.transaction((): CopyResult => {
        const existing = this.db
          .prepare<[string], CountRow>(
            `SELECT COUNT(*) AS count FROM ${COPY_TARGET_SCHEMA}.sqlite_master
             WHERE type = 'table' AND name = ?`
          )
          .get(CHUNK_TABLE);
        if (existing && existing.count > 0) {
          throw new StoreError(`${targetPath} already contains flows`);
        }

        this.db.exec(chunkTableSql(COPY_TARGET_SCHEMA));
        const inserted = this.db
          .prepare(
            `INSERT INTO ${COPY_TARGET_SCHEMA}.chunk (flow_id, kind, payload)
             SELECT flow_id, kind, payload FROM main.chunk
             WHERE flow_id IN (SELECT flow_id FROM flow_view WHERE ${predicate.sql})
             ORDER BY id`
          )
          .run(...predicate.params);

        const flows = this.db
          .prepare<[], CountRow>(`SELECT COUNT(DISTINCT flow_id) AS count FROM ${COPY_TARGET_SCHEMA}.chunk`)
          .get();
        return { flows: flows?.count ?? 0, chunks: inserted.changes };
      });

      const result = copy();
      this.logger?.info("Copied flows", { target: targetPath, ...result });
      return result;
    } catch (err) {
      failed = true;
      if (err instanceof StoreError) {
        throw err;
      }
      throw new StoreError(`Failed to copy flows to ${targetPath}: ${getErrorMessage(err)}`, {
        cause: err,
      });
    } finally {
      this.db.exec(`DETACH DATABASE ${COPY_TARGET_SCHEMA}`);
      if (failed && !existed) {
        fs.rmSync(targetPath, { force: true });
      }
    }
  }

  /**
   * Delete flows by id. Returns the number of chunk rows removed.
   */
  remove(ids: readonly FlowId[]): number {
    return this.chunks.remove(ids);
  }

  clear(): number {
    return this.chunks.clear();
  }

  countChunks(): number {
    return this.chunks.countChunks();
  }

  /**
   * Drop and recreate every derived object regardless of its version.
   */
  rebuildDerivedSchema(): void {
    try {
      rebuildDerivedSchema(this.db, this.logger);
    } catch (err) {
      throw new StoreError(`Failed to rebuild derived schema: ${getErrorMessage(err)}`, { cause: err });
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }

  private compile(filter: string | undefined): CompiledPredicate {
    return filter === undefined || filter.trim() === "" ? MATCH_ALL : compileFilter(parseFilter(filter));
  }

  private page(query: FlowQuery): PageOptions {
    return {
      sort: query.sort,
      order: query.order,
      limit: query.limit ?? this.pageSize,
      offset: query.offset,
    };
  }

  private read<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreError(`Failed to ${action}: ${getErrorMessage(err)}`, { cause: err });
    }
  }
}
