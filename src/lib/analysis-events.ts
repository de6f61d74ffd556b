import { EventEmitter } from "events";
import type { IngestJob } from "@/analysis/types";

export type DetectionRunStatus = "running" | "done" | "failed";

export type AnalysisEvent =
  | { type: "ingest"; job: IngestJob }
  | {
      type: "detection";
      uploadId: string;
      status: DetectionRunStatus;
      findingIds: string[];
      error?: string;
    };

export type AnalysisListener = (event: AnalysisEvent) => void;

/**
 * In-process event bus for ingest and detection progress, keyed by upload id.
 * Callers subscribe to stream status instead of polling the store.
 */
export class AnalysisEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  emit(uploadId: string, event: AnalysisEvent): void {
    this.emitter.emit(uploadId, event);
  }

  subscribe(uploadId: string, listener: AnalysisListener): void {
    this.emitter.on(uploadId, listener);
  }

  unsubscribe(uploadId: string, listener: AnalysisListener): void {
    this.emitter.off(uploadId, listener);
  }
}
