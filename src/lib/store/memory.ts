import { randomUUID } from "crypto";
import type {
  EventDraft,
  Finding,
  IngestJob,
  IngestStatus,
  NormalizedEvent,
  RollupBucket,
  UploadFeatures,
} from "@/analysis/types";
import { JobConflictError, NotFoundError } from "@/lib/errors";
import {
  assertTransition,
  isTerminal,
  rollupKeyOf,
  type FindingInput,
  type RecordStore,
} from "./types";

function copyEvent(event: NormalizedEvent): NormalizedEvent {
  return { ...event, eventTime: event.eventTime ? new Date(event.eventTime) : null };
}

function copyFinding(finding: Finding): Finding {
  return {
    ...finding,
    evidence: structuredClone(finding.evidence),
    createdAt: new Date(finding.createdAt),
  };
}

/**
 * In-process store. Every method body runs synchronously before its first
 * await point, so each call is atomic with respect to other callers.
 * Used by tests and when no DATABASE_URL is configured.
 */
export class MemoryStore implements RecordStore {
  private jobs = new Map<string, IngestJob>();
  private events = new Map<string, NormalizedEvent[]>();
  private eventsById = new Map<string, NormalizedEvent>();
  private rollups = new Map<string, Map<string, RollupBucket>>();
  private findings = new Map<string, Finding[]>();
  private features = new Map<string, UploadFeatures>();
  private findingSequence = 0;

  async createJob(uploadId: string): Promise<IngestJob> {
    const active = [...this.jobs.values()].find(
      (job) => job.uploadId === uploadId && !isTerminal(job.status),
    );
    if (active) throw new JobConflictError(uploadId, active.id);

    const now = new Date();
    const job: IngestJob = {
      id: randomUUID(),
      uploadId,
      status: "queued",
      insertedEvents: 0,
      badLines: 0,
      error: null,
      createdAt: now,
      updatedAt: now,
    };
    this.jobs.set(job.id, job);
    return { ...job };
  }

  async getJob(jobId: string): Promise<IngestJob | null> {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  async latestJobForUpload(uploadId: string): Promise<IngestJob | null> {
    let latest: IngestJob | null = null;
    // Map preserves insertion order, so the last match is the newest
    for (const job of this.jobs.values()) {
      if (job.uploadId === uploadId) latest = job;
    }
    return latest ? { ...latest } : null;
  }

  async transitionJob(jobId: string, to: IngestStatus, error?: string): Promise<IngestJob> {
    const job = this.requireJob(jobId);
    assertTransition(job, to);
    job.status = to;
    job.error = to === "failed" ? (error ?? "Ingestion failed") : null;
    job.updatedAt = new Date();
    return { ...job };
  }

  async appendEventBatch(jobId: string, drafts: EventDraft[], badLines: number): Promise<IngestJob> {
    const job = this.requireJob(jobId);
    const list = this.events.get(job.uploadId) ?? [];
    for (const draft of drafts) {
      const event: NormalizedEvent = { ...draft, id: randomUUID(), uploadId: job.uploadId };
      list.push(event);
      this.eventsById.set(event.id, event);
    }
    this.events.set(job.uploadId, list);
    job.insertedEvents += drafts.length;
    job.badLines += badLines;
    job.updatedAt = new Date();
    return { ...job };
  }

  async listEvents(uploadId: string): Promise<NormalizedEvent[]> {
    return (this.events.get(uploadId) ?? []).map(copyEvent);
  }

  async getEventsByIds(ids: string[]): Promise<NormalizedEvent[]> {
    const found: NormalizedEvent[] = [];
    for (const id of ids) {
      const event = this.eventsById.get(id);
      if (event) found.push(copyEvent(event));
    }
    return found;
  }

  async replaceRollups(uploadId: string, buckets: RollupBucket[]): Promise<void> {
    const next = new Map<string, RollupBucket>();
    for (const bucket of buckets) {
      next.set(rollupKeyOf(bucket), { ...bucket, uploadId });
    }
    this.rollups.set(uploadId, next);
  }

  async listRollups(uploadId: string): Promise<RollupBucket[]> {
    return [...(this.rollups.get(uploadId)?.values() ?? [])];
  }

  async appendFindings(uploadId: string, inputs: FindingInput[]): Promise<Finding[]> {
    const list = this.findings.get(uploadId) ?? [];
    const created = inputs.map((input): Finding => ({
      ...input,
      evidence: structuredClone(input.evidence),
      id: randomUUID(),
      uploadId,
      sequence: ++this.findingSequence,
      createdAt: new Date(),
    }));
    list.push(...created);
    this.findings.set(uploadId, list);
    return created.map(copyFinding);
  }

  async listFindings(uploadId: string): Promise<Finding[]> {
    return (this.findings.get(uploadId) ?? []).map(copyFinding);
  }

  async upsertFeatures(features: UploadFeatures): Promise<void> {
    this.features.set(features.uploadId, features);
  }

  async getFeatures(uploadId: string): Promise<UploadFeatures | null> {
    return this.features.get(uploadId) ?? null;
  }

  async close(): Promise<void> {}

  private requireJob(jobId: string): IngestJob {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundError(`Ingest job ${jobId} not found`);
    return job;
  }
}
