import type {
  EventDraft,
  Finding,
  FindingDraft,
  IngestJob,
  IngestStatus,
  NormalizedEvent,
  RollupBucket,
  UploadFeatures,
} from "@/analysis/types";
import { InvalidTransitionError } from "@/lib/errors";

export interface FindingInput extends FindingDraft {
  fingerprint: string;
}

/**
 * Transactional record store consumed by the core.
 *
 * Events and findings are append-only. Job counters and rollups are only
 * changed through the methods below, each of which is atomic.
 */
export interface RecordStore {
  /** Create a queued job. Throws JobConflictError while another job for the upload is non-terminal. */
  createJob(uploadId: string): Promise<IngestJob>;
  getJob(jobId: string): Promise<IngestJob | null>;
  latestJobForUpload(uploadId: string): Promise<IngestJob | null>;
  /** Throws InvalidTransitionError for anything but queued→running→done|failed. */
  transitionJob(jobId: string, to: IngestStatus, error?: string): Promise<IngestJob>;

  /**
   * Append a batch of events and add to both job counters in one transaction.
   * Returns the job as committed.
   */
  appendEventBatch(jobId: string, events: EventDraft[], badLines: number): Promise<IngestJob>;
  /** Events of an upload in insertion order */
  listEvents(uploadId: string): Promise<NormalizedEvent[]>;
  getEventsByIds(ids: string[]): Promise<NormalizedEvent[]>;

  /** Set (never add) every bucket total and drop keys absent from `buckets`. */
  replaceRollups(uploadId: string, buckets: RollupBucket[]): Promise<void>;
  listRollups(uploadId: string): Promise<RollupBucket[]>;

  appendFindings(uploadId: string, findings: FindingInput[]): Promise<Finding[]>;
  /** Findings of an upload in creation order */
  listFindings(uploadId: string): Promise<Finding[]>;

  upsertFeatures(features: UploadFeatures): Promise<void>;
  getFeatures(uploadId: string): Promise<UploadFeatures | null>;

  close(): Promise<void>;
}

const ALLOWED_TRANSITIONS: Record<IngestStatus, readonly IngestStatus[]> = {
  queued: ["running", "failed"],
  running: ["done", "failed"],
  done: [],
  failed: [],
};

export function isTerminal(status: IngestStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export function assertTransition(job: IngestJob, to: IngestStatus): void {
  if (!ALLOWED_TRANSITIONS[job.status].includes(to)) {
    throw new InvalidTransitionError(job.id, job.status, to);
  }
}

export function rollupKeyOf(bucket: RollupBucket): string {
  return [
    bucket.bucket,
    bucket.userEmail,
    bucket.clientIp,
    bucket.destHost,
    bucket.action,
    bucket.threatCategory,
  ].join("\u0000");
}
