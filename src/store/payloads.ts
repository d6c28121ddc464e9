/**
 * JSON payload schemas for the metadata chunk kinds.
 *
 * Version 2 is written today. Version 1 payloads (no `v` field) were written
 * with UTF-8 text for header and certificate bytes and a boolean `marked`;
 * they are still accepted on read.
 */

import { z } from "zod";

export const PAYLOAD_VERSION = 2;
export const LEGACY_PAYLOAD_VERSION = 1;

const versionSchema = z.number().int().positive().optional();
const addressSchema = z.tuple([z.string(), z.number().int()]).nullable();
const headerPairSchema = z.tuple([z.string(), z.string()]);
const timestampSchema = z.number();

const requestPayloadSchema = z.object({
  method: z.string(),
  scheme: z.string(),
  host: z.string(),
  port: z.number().int(),
  path: z.string(),
  http_version: z.string(),
  headers: z.array(headerPairSchema),
  timestamp_start: timestampSchema,
  timestamp_end: timestampSchema.nullable(),
});

const responsePayloadSchema = z.object({
  status_code: z.number().int(),
  reason: z.string(),
  http_version: z.string(),
  headers: z.array(headerPairSchema),
  timestamp_start: timestampSchema,
  timestamp_end: timestampSchema.nullable(),
});

const errorPayloadSchema = z.object({
  msg: z.string(),
  timestamp: timestampSchema,
});

export const httpFlowPayloadSchema = z.object({
  v: versionSchema,
  id: z.string(),
  type: z.literal("http"),
  timestamp_created: timestampSchema,
  intercepted: z.boolean().default(false),
  is_replay: z.enum(["request", "response"]).nullable().default(null),
  // Version 1 stored a plain boolean
  marked: z.union([z.string(), z.boolean()]).default(""),
  comment: z.string().default(""),
  metadata: z.record(z.unknown()).default({}),
  websocket: z.boolean().default(false),
  error: errorPayloadSchema.nullable().default(null),
  request: requestPayloadSchema,
  response: responsePayloadSchema.nullable(),
});

export const clientConnPayloadSchema = z.object({
  v: versionSchema,
  id: z.string(),
  peername: addressSchema,
  sockname: addressSchema,
  tls_established: z.boolean(),
  sni: z.string().nullable().default(null),
  timestamp_start: timestampSchema,
  timestamp_end: timestampSchema.nullable(),
});

export const serverConnPayloadSchema = z.object({
  v: versionSchema,
  id: z.string(),
  address: addressSchema,
  peername: addressSchema.default(null),
  tls_established: z.boolean(),
  certificate_list: z.array(z.string()).default([]),
  timestamp_start: timestampSchema.nullable(),
  timestamp_end: timestampSchema.nullable(),
});

export type HttpFlowPayload = z.infer<typeof httpFlowPayloadSchema>;
export type ClientConnPayload = z.infer<typeof clientConnPayloadSchema>;
export type ServerConnPayload = z.infer<typeof serverConnPayloadSchema>;

/** Header bytes become one code point per byte, so the text is exactly reversible. */
export type BytesEncoding = "latin1" | "utf8" | "base64";

export interface PayloadEncodings {
  headers: BytesEncoding;
  certificates: BytesEncoding;
}

/**
 * How byte values were turned into JSON strings for a given payload version.
 */
export function encodingsFor(version: number): PayloadEncodings {
  if (version === LEGACY_PAYLOAD_VERSION) {
    return { headers: "utf8", certificates: "utf8" };
  }
  return { headers: "latin1", certificates: "base64" };
}
