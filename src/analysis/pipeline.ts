import type { Readable } from "stream";
import { AnalysisEventBus } from "@/lib/analysis-events";
import type { Settings } from "@/lib/config";
import { IngestNotReadyError, NotFoundError, describeError } from "@/lib/errors";
import { createBlobSource, type BlobSource } from "@/lib/storage";
import { MemoryStore } from "@/lib/store/memory";
import { PgStore } from "@/lib/store/pg";
import type { RecordStore } from "@/lib/store/types";
import { IngestController, toStatusView } from "./ingest/controller";
import { createReasoningCollaborator, type ReasoningCollaborator } from "./llm";
import { ReportAssembler } from "./report/assembler";
import { runRuleEngine, sortFindings } from "./rule-engine";
import type { Finding, IngestStatusView, SocReport, UploadFeatures } from "./types";

/**
 * Core facade: ingestion, detection and report generation for uploads.
 *
 * CONCURRENCY:
 *   - Ingestion: every submitted upload gets its own background task; the
 *     caller receives the job id immediately and polls or waits for status.
 *   - Detection: accepted only once the upload's latest ingest job is done,
 *     then evaluated in the background. Results are published on the bus.
 *   - Narrative: report requests go through the assembler's single slot with
 *     a bounded timeout, off the ingestion and detection paths.
 *
 * Fire-and-forget tasks never reject unobserved: ingestion failures are
 * recorded on the job, detection failures are logged and published.
 */
export interface SocCoreDeps {
  store: RecordStore;
  collaborator: ReasoningCollaborator;
  settings: Settings;
  blobs?: BlobSource;
  bus?: AnalysisEventBus;
}

export interface DetectionAccepted {
  upload_id: string;
  status: "accepted";
}

export class SocCore {
  readonly bus: AnalysisEventBus;
  private readonly store: RecordStore;
  private readonly settings: Settings;
  private readonly blobs: BlobSource | null;
  private readonly ingest: IngestController;
  private readonly reports: ReportAssembler;
  /** Latest detection run per upload, for waitForDetection */
  private readonly detections = new Map<string, Promise<string[]>>();

  constructor(deps: SocCoreDeps) {
    this.store = deps.store;
    this.settings = deps.settings;
    this.blobs = deps.blobs ?? null;
    this.bus = deps.bus ?? new AnalysisEventBus();
    this.ingest = new IngestController(this.store, this.bus, {
      batchSize: deps.settings.ingest.batchSize,
    });
    this.reports = new ReportAssembler(this.store, deps.collaborator, {
      timeoutMs: deps.settings.llm.timeoutMs,
      sampleEvents: deps.settings.llm.sampleEvents,
    });
  }

  /** Start ingesting `input` for an upload. Resolves with the job id. */
  submitIngest(uploadId: string, input: Readable): Promise<string> {
    return this.ingest.submit(uploadId, input);
  }

  /** Open the upload's blob from the configured source and ingest it. */
  async ingestFromStorage(uploadId: string, key: string): Promise<string> {
    if (!this.blobs) throw new NotFoundError("No blob source is configured");
    const input = await this.blobs.open(key);
    return this.ingest.submit(uploadId, input);
  }

  getIngestStatus(jobId: string): Promise<IngestStatusView> {
    return this.ingest.getStatus(jobId);
  }

  /** Resolve with the job's status once it is done or failed. */
  async waitForIngest(jobId: string): Promise<IngestStatusView> {
    return toStatusView(await this.ingest.waitFor(jobId));
  }

  /**
   * Accept a detection run for an upload whose latest ingest job is done.
   * Rejects with IngestNotReadyError otherwise; nothing is queued.
   */
  async runDetection(uploadId: string): Promise<DetectionAccepted> {
    const job = await this.store.latestJobForUpload(uploadId);
    if (!job || job.status !== "done") {
      throw new IngestNotReadyError(uploadId, job?.status ?? null);
    }

    this.bus.emit(uploadId, { type: "detection", uploadId, status: "running", findingIds: [] });
    const run = this.detect(uploadId);
    this.detections.set(uploadId, run);

    // Fire-and-forget; waitForDetection observes the same promise
    run.catch((err: unknown) => {
      console.error(`[Detect] Upload ${uploadId} detection failed:`, describeError(err));
    });

    return { upload_id: uploadId, status: "accepted" };
  }

  /** Resolve with the finding ids created by the upload's latest detection run. */
  waitForDetection(uploadId: string): Promise<string[]> {
    const run = this.detections.get(uploadId);
    if (!run) return Promise.reject(new NotFoundError(`No detection run for upload ${uploadId}`));
    return run;
  }

  /** Findings by severity, then confidence, then creation order. */
  async listFindings(uploadId: string): Promise<Finding[]> {
    return sortFindings(await this.store.listFindings(uploadId));
  }

  /** Rejects with NoFindingsError when the upload has none. */
  generateReport(uploadId: string): Promise<SocReport> {
    return this.reports.generate(uploadId);
  }

  getFeatures(uploadId: string): Promise<UploadFeatures | null> {
    return this.store.getFeatures(uploadId);
  }

  close(): Promise<void> {
    return this.store.close();
  }

  private async detect(uploadId: string): Promise<string[]> {
    try {
      const created = await runRuleEngine(this.store, uploadId, this.settings.detection);
      const findingIds = created.map((f) => f.id);
      this.bus.emit(uploadId, { type: "detection", uploadId, status: "done", findingIds });
      return findingIds;
    } catch (err) {
      this.bus.emit(uploadId, {
        type: "detection",
        uploadId,
        status: "failed",
        findingIds: [],
        error: describeError(err),
      });
      throw err;
    }
  }
}

/**
 * Wire a core from settings: Postgres when DATABASE_URL is set, otherwise an
 * in-process store; the LLM provider whose key is configured.
 */
export function createSocCore(settings: Settings): SocCore {
  const store = settings.databaseUrl ? new PgStore(settings.databaseUrl) : new MemoryStore();
  console.log(`[Store] Using ${settings.databaseUrl ? "Postgres" : "in-memory"} record store`);
  return new SocCore({
    store,
    settings,
    collaborator: createReasoningCollaborator(settings.llm),
    blobs: createBlobSource(settings),
  });
}
