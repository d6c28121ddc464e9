/**
 * Error taxonomy shared by the store, the filter language and the CLI.
 */

import type { FlowId } from "./types.js";

export class FlowVaultError extends Error {
  public constructor(message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "FlowVaultError";
  }
}

/**
 * Malformed filter text. Shown to the operator as-is.
 */
export class ParseError extends FlowVaultError {
  /** Character offset into the filter text where parsing failed */
  public readonly position: number;

  public constructor(message: string, position: number) {
    super(message);
    this.name = "ParseError";
    this.position = position;
  }
}

/**
 * Incomplete or corrupt chunk set for one flow.
 */
export class DecodeError extends FlowVaultError {
  public readonly flowId: FlowId | undefined;

  public constructor(message: string, flowId?: FlowId, opts?: { cause?: unknown }) {
    super(flowId === undefined ? message : `${message} (flow ${flowId})`, opts);
    this.name = "DecodeError";
    this.flowId = flowId;
  }
}

/**
 * A write or read against the database failed. Writes are rolled back before
 * this is thrown, so retrying the same batch is safe.
 */
export class StoreError extends FlowVaultError {
  public constructor(message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "StoreError";
  }
}

export class UnsupportedFlowTypeError extends FlowVaultError {
  public readonly flowType: string;

  public constructor(flowType: string) {
    super(`Unsupported flow type "${flowType}"`);
    this.name = "UnsupportedFlowTypeError";
    this.flowType = flowType;
  }
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
