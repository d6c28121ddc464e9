import { UnsupportedFlowTypeError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { FlowSnapshot, FlowState } from "../shared/types.js";

/** Anything that can persist a flow state, normally a `FlowStore`. */
export interface FlowSink {
  record(flow: FlowState): void;
}

export type CaptureEvent = "request" | "response" | "update" | "error";

type Snapshots = FlowSnapshot | readonly FlowSnapshot[];

/**
 * Receives capture-engine events and writes the current state of each flow
 * to the store. Every event replaces the stored flow, so later events simply
 * supersede earlier ones.
 */
export class FlowRecorder {
  private recorded = 0;
  private skipped = 0;

  constructor(
    private readonly sink: FlowSink,
    private readonly logger?: Logger
  ) {}

  /** Request headers (and possibly body) have arrived. */
  request(flows: Snapshots): void {
    this.handle("request", flows);
  }

  /** The response is complete. */
  response(flows: Snapshots): void {
    this.handle("response", flows);
  }

  /** The flow was changed outside the normal lifecycle, e.g. marked or commented. */
  update(flows: Snapshots): void {
    this.handle("update", flows);
  }

  /** The flow failed or was aborted. */
  error(flows: Snapshots): void {
    this.handle("error", flows);
  }

  stats(): { recorded: number; skipped: number } {
    return { recorded: this.recorded, skipped: this.skipped };
  }

  private handle(event: CaptureEvent, flows: Snapshots): void {
    const list = "getState" in flows ? [flows] : flows;
    for (const snapshot of list) {
      this.recordOne(event, snapshot);
    }
  }

  private recordOne(event: CaptureEvent, snapshot: FlowSnapshot): void {
    const state = snapshot.getState();
    try {
      this.sink.record(state);
      this.recorded++;
      this.logger?.trace("Recorded flow", { event, id: state.id });
    } catch (err) {
      if (err instanceof UnsupportedFlowTypeError) {
        this.skipped++;
        this.logger?.warn("Skipping flow", { event, id: state.id, type: err.flowType });
        return;
      }
      throw err;
    }
  }
}
