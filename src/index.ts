/**
 * Library entry point: the flow store, the filter language and the capture
 * adapters.
 */

export { FlowStore, type CopyResult, type FlowStoreOptions, type LoadFailure, type LoadResult } from "./store/flow-store.js";
export { ChunkStore } from "./store/chunk-store.js";
export { CHUNK_KINDS, DEFAULT_MARKER, decodeFlow, encodeFlow, toChunk, type StoredChunk } from "./store/codec.js";
export { ensureDerivedSchema, rebuildDerivedSchema, registerSearchFunction } from "./store/derived-views.js";
export { DERIVED_SCHEMA_VERSION } from "./store/schema.js";
export { SORT_KEYS } from "./store/query.js";

export { parseFilter } from "./filter/parser.js";
export { compileFilter, MATCH_ALL, type CompiledPredicate, type SqlParam } from "./filter/compiler.js";
export { and, formatFilter, int, not, or, regex, unary, type FilterNode } from "./filter/ast.js";
export { FILTER_FIELDS, listFilterCodes, type FilterCode } from "./filter/fields.js";

export { FlowRecorder, type FlowSink } from "./capture/recorder.js";
export { createCaptureProxy, FlowTracker, type CaptureProxy, type CaptureProxyOptions } from "./capture/proxy.js";

export {
  DecodeError,
  FlowVaultError,
  ParseError,
  StoreError,
  UnsupportedFlowTypeError,
  getErrorMessage,
} from "./shared/errors.js";
export { DEFAULT_CONFIG, loadConfig, type FlowVaultConfig } from "./shared/config.js";
export { Logger, createLogger, type LogLevel } from "./shared/logger.js";
export type * from "./shared/types.js";
