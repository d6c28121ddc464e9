/**
 * Lifecycle of the derived schema: version check, rebuild, and the `search`
 * function the views and compiled filters call.
 */

import type Database from "better-sqlite3";
import type { Logger } from "../shared/logger.js";
import { RegexCache } from "../shared/regex-filter.js";
import { CHUNK_TABLE, DERIVED_SCHEMA_SQL, DERIVED_SCHEMA_VERSION } from "./schema.js";

export interface SchemaObject {
  type: "table" | "view" | "index" | "trigger";
  name: string;
}

interface SchemaObjectRow {
  type: string;
  name: string;
}

function isSchemaObjectType(type: string): type is SchemaObject["type"] {
  return type === "table" || type === "view" || type === "index" || type === "trigger";
}

export function readSchemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}

/**
 * Every schema object except the chunk table (and indexes SQLite creates for
 * its constraints). Triggers and views come first so they can be dropped
 * before the tables they reference.
 */
export function listDerivedObjects(db: Database.Database): SchemaObject[] {
  const rows = db
    .prepare<[string], SchemaObjectRow>(
      `SELECT type, name FROM sqlite_master
       WHERE name NOT LIKE 'sqlite\\_%' ESCAPE '\\'
         AND NOT (type = 'table' AND name = ?)
       ORDER BY CASE type WHEN 'trigger' THEN 0 WHEN 'view' THEN 1 WHEN 'index' THEN 2 ELSE 3 END, name`
    )
    .all(CHUNK_TABLE);

  const objects: SchemaObject[] = [];
  for (const row of rows) {
    if (isSchemaObjectType(row.type)) {
      objects.push({ type: row.type, name: row.name });
    }
  }
  return objects;
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Drop every derived object, recreate the current set and stamp the version,
 * in one transaction. Chunk rows are not touched.
 */
export function rebuildDerivedSchema(db: Database.Database, logger?: Logger): void {
  const previous = readSchemaVersion(db);

  const rebuild = db.transaction(() => {
    const stale = listDerivedObjects(db);
    for (const object of stale) {
      db.exec(`DROP ${object.type.toUpperCase()} IF EXISTS ${quoteIdentifier(object.name)}`);
    }
    db.exec(DERIVED_SCHEMA_SQL);
    db.pragma(`user_version = ${DERIVED_SCHEMA_VERSION}`);
    return stale.length;
  });

  const dropped = rebuild();
  logger?.info("Rebuilt derived schema", {
    from: previous,
    to: DERIVED_SCHEMA_VERSION,
    dropped,
  });
}

/**
 * Rebuild the derived schema if its stamped version is not the current one.
 * Returns whether a rebuild happened.
 */
export function ensureDerivedSchema(db: Database.Database, logger?: Logger): boolean {
  if (readSchemaVersion(db) === DERIVED_SCHEMA_VERSION) {
    return false;
  }
  rebuildDerivedSchema(db, logger);
  return true;
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Reinterpret one-character-per-byte text as UTF-8. Text that is not valid
 * UTF-8 that way (version 1 payloads stored headers as decoded text) is
 * returned as it is.
 */
function latin1ToUtf8(text: string): string {
  if (/[^\x00-\xff]/.test(text)) {
    return text;
  }
  try {
    return utf8Decoder.decode(Buffer.from(text, "latin1"));
  } catch {
    return text;
  }
}

/**
 * Register `search(pattern, text, flags)`, returning 1 when the regex matches
 * anywhere in text. NULL text never matches; BLOB text is read as UTF-8.
 *
 * Also registers `latin1_utf8(text)`: header payloads hold one character per
 * byte, and this turns them back into the UTF-8 text that was on the wire.
 *
 * Must be called on every connection, as SQLite does not persist functions.
 */
export function registerSearchFunction(db: Database.Database, cache: RegexCache = new RegexCache()): void {
  db.function("latin1_utf8", { deterministic: true }, (text: unknown) =>
    typeof text === "string" ? latin1ToUtf8(text) : null
  );

  db.function("search", { deterministic: true }, (pattern: unknown, text: unknown, flags: unknown) => {
    if (typeof pattern !== "string") {
      return 0;
    }

    let subject: string;
    if (typeof text === "string") {
      subject = text;
    } else if (Buffer.isBuffer(text)) {
      subject = text.toString("utf8");
    } else if (typeof text === "number" || typeof text === "bigint") {
      subject = String(text);
    } else {
      return 0;
    }

    const regex = cache.get(pattern, typeof flags === "string" ? flags : "");
    return regex.test(subject) ? 1 : 0;
  });
}
