/**
 * Integration tests for the CLI query path: a project directory with a
 * config file, a store opened the way commands open it, and the formatters
 * over real query results. No CLI processes are spawned.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { makeFlow } from "../helpers/flows.js";
import { openStore, type CommandContext } from "../../src/cli/commands/helpers.js";
import { resolveFlowId } from "../../src/cli/commands/show.js";
import { formatFilterHelp } from "../../src/cli/commands/filters.js";
import { formatFlowDetail } from "../../src/cli/formatters/detail.js";
import { formatFlowTable } from "../../src/cli/formatters/table.js";
import { loadConfig } from "../../src/shared/config.js";
import { Logger } from "../../src/shared/logger.js";
import { getFlowVaultPaths } from "../../src/shared/project.js";
import type { FlowStore } from "../../src/store/flow-store.js";

describe("CLI query integration", () => {
  let tempDir: string;
  let context: CommandContext;
  let store: FlowStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowvault-cli-query-test-"));
    const paths = getFlowVaultPaths(tempDir);
    fs.mkdirSync(paths.flowVaultDir);
    fs.writeFileSync(paths.configFile, JSON.stringify({ pageSize: 2, journalMode: "delete" }));

    const logger = new Logger("cli", paths.logFile, "warn");
    context = {
      projectRoot: tempDir,
      paths,
      config: loadConfig(tempDir),
      logger,
      storeLogger: logger.forComponent("store"),
    };
    store = openStore(context);

    store.record(makeFlow({ id: "aaaa1111", path: "/one" }));
    store.record(makeFlow({ id: "aaaa2222", path: "/two", method: "POST", status: 201, reason: "Created" }));
    store.record(makeFlow({ id: "bbbb3333", path: "/three", status: 500, reason: "Server Error" }));
  });

  afterEach(() => {
    store.close();
    context.storeLogger.close();
    context.logger.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("applies the configured page size and journal mode", () => {
    expect(store.query()).toEqual(["aaaa1111", "aaaa2222"]);
    expect(fs.existsSync(context.paths.databaseFile + "-wal")).toBe(false);
  });

  it("lists a filtered page with the total", () => {
    const filter = "~c 201 | ~c 500";
    const output = formatFlowTable(store.summaries({ filter }), store.count(filter), { colour: false });
    const lines = output.split("\n");

    expect(lines).toHaveLength(5);
    expect(lines[1]).toContain("aaaa2222  POST        201  https://example.com/two");
    expect(lines[2]).toContain("bbbb3333  GET         500  https://example.com/three");
    expect(lines[4]).toBe("  Showing 2 flows");
  });

  it("resolves ids by unique prefix", () => {
    expect(resolveFlowId(store, "bbbb")).toBe("bbbb3333");
    expect(resolveFlowId(store, "aaaa1111")).toBe("aaaa1111");
  });

  it("refuses unknown and ambiguous prefixes", () => {
    expect(() => resolveFlowId(store, "cccc")).toThrow('No flow found matching "cccc"');
    expect(() => resolveFlowId(store, "aaaa")).toThrow('Ambiguous ID "aaaa" matches 2 flows:');
  });

  it("shows a stored flow in detail", () => {
    const flow = store.get(resolveFlowId(store, "bbbb"));
    expect(flow).toBeDefined();
    if (flow) {
      expect(formatFlowDetail(flow, { colour: false }).split("\n")[0]).toBe(
        "  GET https://example.com/three → 500 Server Error (20ms)"
      );
    }
  });

  it("documents every filter code", () => {
    const help = formatFilterHelp(false);
    expect(help).toContain("    ~c <int>");
    expect(help).toContain("~marked");
    expect(help).toContain("~hq <regex>");
  });
});
