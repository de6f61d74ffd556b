import type { Readable } from "stream";
import { createInterface } from "readline";
import type { EventDraft, IngestJob, IngestStatusView } from "@/analysis/types";
import type { AnalysisEvent, AnalysisEventBus } from "@/lib/analysis-events";
import { IngestFatalError, NotFoundError, describeError } from "@/lib/errors";
import { isTerminal, type RecordStore } from "@/lib/store/types";
import { recomputeFeatures } from "@/analysis/features";
import { recomputeRollups } from "@/analysis/rollup";
import { normalizeLine } from "./normalizer";

export interface IngestControllerOptions {
  /** Lines per store transaction */
  batchSize: number;
}

/** First error a stream emitted, recorded from the moment it was handed to us. */
interface StreamWatch {
  error?: unknown;
}

function watchStream(input: Readable): StreamWatch {
  const watch: StreamWatch = {};
  input.on("error", (err: unknown) => {
    watch.error ??= err;
  });
  return watch;
}

function streamFailure(error: unknown): IngestFatalError {
  return new IngestFatalError(`Upload stream failed: ${describeError(error)}`, { cause: error });
}

/**
 * Yield lines from a byte stream. A stream error ends iteration with an
 * IngestFatalError instead of leaving the reader waiting forever.
 */
async function* readLines(input: Readable, watch: StreamWatch): AsyncGenerator<string> {
  if (watch.error !== undefined) throw streamFailure(watch.error);
  if (input.destroyed) throw streamFailure("stream was closed before it was read");

  const rl = createInterface({ input, crlfDelay: Infinity });
  const onError = () => rl.close();
  input.on("error", onError);

  try {
    for await (const line of rl) {
      yield line;
    }
  } catch (err) {
    watch.error ??= err;
  } finally {
    input.off("error", onError);
  }

  if (watch.error !== undefined) throw streamFailure(watch.error);
}

export function toStatusView(job: IngestJob): IngestStatusView {
  return {
    job_id: job.id,
    upload_id: job.uploadId,
    status: job.status,
    inserted_events: job.insertedEvents,
    bad_lines: job.badLines,
    ...(job.error ? { error: job.error } : {}),
  };
}

/**
 * Runs one background worker per submitted upload.
 *
 * The worker normalizes each line and commits events in batches; every
 * batch commit also adds to the job's counters, so `inserted_events +
 * bad_lines` always equals the lines committed so far. Once the input is
 * exhausted the upload's rollups and features are rebuilt and the job
 * becomes `done`.
 */
export class IngestController {
  constructor(
    private readonly store: RecordStore,
    private readonly bus: AnalysisEventBus,
    private readonly options: IngestControllerOptions,
  ) {}

  /**
   * Create a queued job and start parsing in the background.
   * Resolves with the job id without waiting for the input to be read.
   */
  async submit(uploadId: string, input: Readable): Promise<string> {
    // Listen before the first await so an early stream error lands on the job
    const watch = watchStream(input);
    let job: IngestJob;
    try {
      job = await this.store.createJob(uploadId);
    } catch (err) {
      input.destroy();
      throw err;
    }
    this.publish(job);
    console.log(`[Ingest] Queued job ${job.id} for upload ${uploadId}`);

    // Fire-and-forget; run() records its own failures on the job
    this.run(job, input, watch).catch((err: unknown) => {
      console.error(`[Ingest] Job ${job.id} could not be finalized:`, describeError(err));
    });

    return job.id;
  }

  async getStatus(jobId: string): Promise<IngestStatusView> {
    const job = await this.store.getJob(jobId);
    if (!job) throw new NotFoundError(`Ingest job ${jobId} not found`);
    return toStatusView(job);
  }

  /** Resolve with the job once it reaches `done` or `failed`. */
  async waitFor(jobId: string): Promise<IngestJob> {
    const job = await this.store.getJob(jobId);
    if (!job) throw new NotFoundError(`Ingest job ${jobId} not found`);
    if (isTerminal(job.status)) return job;

    return new Promise<IngestJob>((resolve, reject) => {
      const finish = (result: IngestJob) => {
        this.bus.unsubscribe(job.uploadId, listener);
        resolve(result);
      };
      const listener = (event: AnalysisEvent) => {
        if (event.type === "ingest" && event.job.id === jobId && isTerminal(event.job.status)) {
          finish(event.job);
        }
      };
      this.bus.subscribe(job.uploadId, listener);

      // The job may have finished between the first read and subscribing
      this.store.getJob(jobId).then(
        (latest) => {
          if (latest && isTerminal(latest.status)) finish(latest);
        },
        (err: unknown) => {
          this.bus.unsubscribe(job.uploadId, listener);
          reject(err);
        },
      );
    });
  }

  private async run(job: IngestJob, input: Readable, watch: StreamWatch): Promise<void> {
    const started = Date.now();
    try {
      this.publish(await this.store.transitionJob(job.id, "running"));

      let batch: EventDraft[] = [];
      let badLines = 0;
      let lineNumber = 0;

      const flush = async () => {
        if (batch.length === 0 && badLines === 0) return;
        const committed = await this.store.appendEventBatch(job.id, batch, badLines);
        batch = [];
        badLines = 0;
        this.publish(committed);
      };

      for await (const line of readLines(input, watch)) {
        lineNumber++;
        if (!line.trim()) continue;

        const result = normalizeLine(line, lineNumber);
        if (result.ok) {
          batch.push(result.event);
        } else {
          badLines++;
        }

        if (batch.length + badLines >= this.options.batchSize) await flush();
      }
      await flush();

      await recomputeRollups(this.store, job.uploadId);
      await recomputeFeatures(this.store, job.uploadId);

      const done = await this.store.transitionJob(job.id, "done");
      this.publish(done);
      console.log(
        `[Ingest] Job ${job.id} done in ${Date.now() - started}ms: ` +
          `${done.insertedEvents} events, ${done.badLines} bad lines`,
      );
    } catch (err) {
      const fatal =
        err instanceof IngestFatalError
          ? err
          : new IngestFatalError(describeError(err), { cause: err });
      console.error(`[Ingest] Job ${job.id} failed:`, fatal.message);
      this.publish(await this.store.transitionJob(job.id, "failed", fatal.message));
    }
  }

  private publish(job: IngestJob): void {
    this.bus.emit(job.uploadId, { type: "ingest", job });
  }
}
