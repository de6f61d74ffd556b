import { randomUUID } from "crypto";
import { Pool, type PoolClient } from "pg";
import type {
  EventDraft,
  Evidence,
  Finding,
  IngestJob,
  IngestStatus,
  LogDialect,
  NormalizedEvent,
  PatternName,
  RollupBucket,
  Severity,
  UploadFeatures,
} from "@/analysis/types";
import { JobConflictError, NotFoundError } from "@/lib/errors";
import { assertTransition, type FindingInput, type RecordStore } from "./types";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ingest_jobs (
    id TEXT PRIMARY KEY,
    upload_id TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('queued', 'running', 'done', 'failed')),
    inserted_events INTEGER NOT NULL DEFAULT 0,
    bad_lines INTEGER NOT NULL DEFAULT 0,
    error TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE UNIQUE INDEX IF NOT EXISTS ingest_jobs_one_active
    ON ingest_jobs (upload_id) WHERE status IN ('queued', 'running');
  CREATE INDEX IF NOT EXISTS ingest_jobs_upload ON ingest_jobs (upload_id, created_at);

  CREATE TABLE IF NOT EXISTS events (
    seq BIGSERIAL PRIMARY KEY,
    id TEXT NOT NULL UNIQUE,
    upload_id TEXT NOT NULL,
    line_number INTEGER NOT NULL,
    dialect TEXT NOT NULL,
    event_time TIMESTAMPTZ,
    event_id TEXT,
    vendor TEXT,
    action TEXT,
    reason TEXT,
    severity TEXT,
    status INTEGER,
    user_email TEXT,
    department TEXT,
    location TEXT,
    client_ip TEXT,
    server_ip TEXT,
    dest_host TEXT,
    url TEXT,
    request_method TEXT,
    url_category TEXT,
    threat_category TEXT,
    threat_name TEXT,
    risk_score INTEGER,
    request_size BIGINT,
    response_size BIGINT,
    transaction_size BIGINT,
    raw TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS events_upload ON events (upload_id, seq);

  CREATE TABLE IF NOT EXISTS rollups (
    upload_id TEXT NOT NULL,
    bucket TEXT NOT NULL,
    user_email TEXT NOT NULL,
    client_ip TEXT NOT NULL,
    dest_host TEXT NOT NULL,
    action TEXT NOT NULL,
    threat_category TEXT NOT NULL,
    total INTEGER NOT NULL,
    computed_at TIMESTAMPTZ NOT NULL,
    PRIMARY KEY (upload_id, bucket, user_email, client_ip, dest_host, action, threat_category)
  );

  CREATE TABLE IF NOT EXISTS findings (
    sequence BIGSERIAL PRIMARY KEY,
    id TEXT NOT NULL UNIQUE,
    upload_id TEXT NOT NULL,
    pattern_name TEXT NOT NULL,
    severity TEXT NOT NULL CHECK (severity IN ('critical', 'high', 'medium', 'low')),
    confidence DOUBLE PRECISION NOT NULL,
    title TEXT NOT NULL,
    summary TEXT NOT NULL,
    evidence JSONB NOT NULL,
    fingerprint TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE INDEX IF NOT EXISTS findings_upload ON findings (upload_id, sequence);

  CREATE TABLE IF NOT EXISTS upload_features (
    upload_id TEXT PRIMARY KEY,
    payload JSONB NOT NULL,
    computed_at TIMESTAMPTZ NOT NULL
  );
`;

const EVENT_COLUMNS = [
  "id", "upload_id", "line_number", "dialect", "event_time", "event_id", "vendor",
  "action", "reason", "severity", "status", "user_email", "department", "location",
  "client_ip", "server_ip", "dest_host", "url", "request_method", "url_category",
  "threat_category", "threat_name", "risk_score", "request_size", "response_size",
  "transaction_size", "raw",
] as const;

const ROLLUP_COLUMNS = [
  "upload_id", "bucket", "user_email", "client_ip", "dest_host", "action",
  "threat_category", "total", "computed_at",
] as const;

/** Rows per multi-VALUES insert; keeps parameter counts under 65535. */
const INSERT_CHUNK = 1000;

// Row shapes are type aliases: pg's QueryResultRow constraint needs an index signature
type JobRow = {
  id: string;
  upload_id: string;
  status: IngestStatus;
  inserted_events: number;
  bad_lines: number;
  error: string | null;
  created_at: Date;
  updated_at: Date;
};

type EventRow = {
  id: string;
  upload_id: string;
  line_number: number;
  dialect: LogDialect;
  event_time: Date | null;
  event_id: string | null;
  vendor: string | null;
  action: string | null;
  reason: string | null;
  severity: string | null;
  status: number | null;
  user_email: string | null;
  department: string | null;
  location: string | null;
  client_ip: string | null;
  server_ip: string | null;
  dest_host: string | null;
  url: string | null;
  request_method: string | null;
  url_category: string | null;
  threat_category: string | null;
  threat_name: string | null;
  risk_score: number | null;
  // BIGINT columns arrive as strings
  request_size: string | null;
  response_size: string | null;
  transaction_size: string | null;
  raw: string;
};

type RollupRow = {
  upload_id: string;
  bucket: string;
  user_email: string;
  client_ip: string;
  dest_host: string;
  action: string;
  threat_category: string;
  total: number;
};

type FindingRow = {
  sequence: string;
  id: string;
  upload_id: string;
  pattern_name: PatternName;
  severity: Severity;
  confidence: number;
  title: string;
  summary: string;
  evidence: Evidence;
  fingerprint: string;
  created_at: Date;
};

type FeaturesRow = {
  upload_id: string;
  payload: Omit<UploadFeatures, "uploadId" | "computedAt">;
  computed_at: Date;
};

function toJob(row: JobRow): IngestJob {
  return {
    id: row.id,
    uploadId: row.upload_id,
    status: row.status,
    insertedEvents: row.inserted_events,
    badLines: row.bad_lines,
    error: row.error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toBigint(value: string | null): number | null {
  return value === null ? null : Number(value);
}

function toEvent(row: EventRow): NormalizedEvent {
  return {
    id: row.id,
    uploadId: row.upload_id,
    lineNumber: row.line_number,
    dialect: row.dialect,
    eventTime: row.event_time,
    eventId: row.event_id,
    vendor: row.vendor,
    action: row.action,
    reason: row.reason,
    severity: row.severity,
    status: row.status,
    userEmail: row.user_email,
    department: row.department,
    location: row.location,
    clientIp: row.client_ip,
    serverIp: row.server_ip,
    destHost: row.dest_host,
    url: row.url,
    requestMethod: row.request_method,
    urlCategory: row.url_category,
    threatCategory: row.threat_category,
    threatName: row.threat_name,
    riskScore: row.risk_score,
    requestSize: toBigint(row.request_size),
    responseSize: toBigint(row.response_size),
    transactionSize: toBigint(row.transaction_size),
    raw: row.raw,
  };
}

function eventValues(id: string, uploadId: string, e: EventDraft): unknown[] {
  return [
    id, uploadId, e.lineNumber, e.dialect, e.eventTime, e.eventId, e.vendor,
    e.action, e.reason, e.severity, e.status, e.userEmail, e.department, e.location,
    e.clientIp, e.serverIp, e.destHost, e.url, e.requestMethod, e.urlCategory,
    e.threatCategory, e.threatName, e.riskScore, e.requestSize, e.responseSize,
    e.transactionSize, e.raw,
  ];
}

function toFinding(row: FindingRow): Finding {
  return {
    id: row.id,
    uploadId: row.upload_id,
    patternName: row.pattern_name,
    severity: row.severity,
    confidence: row.confidence,
    title: row.title,
    summary: row.summary,
    evidence: row.evidence,
    fingerprint: row.fingerprint,
    sequence: Number(row.sequence),
    createdAt: row.created_at,
  };
}

/** `($1, $2, ...), ($n+1, ...)` for a multi-row insert. */
function placeholders(rows: number, columns: number): string {
  const groups: string[] = [];
  for (let r = 0; r < rows; r++) {
    const cells: string[] = [];
    for (let c = 1; c <= columns; c++) cells.push(`$${r * columns + c}`);
    groups.push(`(${cells.join(", ")})`);
  }
  return groups.join(", ");
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "23505";
}

/**
 * Postgres-backed store on a `pg` connection pool. The schema is created on
 * first use.
 */
export class PgStore implements RecordStore {
  private readonly pool: Pool;
  private schemaReady: Promise<void> | null = null;

  constructor(connectionString: string) {
    this.pool = new Pool({ connectionString });
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.pool.query(SCHEMA).then(() => {
        console.log("[Store] Postgres schema ready");
      });
      // Allow a retry on the next call after a failed bootstrap
      this.schemaReady.catch(() => {
        this.schemaReady = null;
      });
    }
    return this.schemaReady;
  }

  private async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    await this.ensureSchema();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        console.error("[Store] Rollback failed:", rollbackErr);
      });
      throw err;
    } finally {
      client.release();
    }
  }

  async createJob(uploadId: string): Promise<IngestJob> {
    await this.ensureSchema();
    try {
      const { rows } = await this.pool.query<JobRow>(
        `INSERT INTO ingest_jobs (id, upload_id, status) VALUES ($1, $2, 'queued') RETURNING *`,
        [randomUUID(), uploadId],
      );
      return toJob(rows[0]);
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      const { rows } = await this.pool.query<JobRow>(
        `SELECT * FROM ingest_jobs WHERE upload_id = $1 AND status IN ('queued', 'running')`,
        [uploadId],
      );
      throw new JobConflictError(uploadId, rows[0]?.id ?? "unknown");
    }
  }

  async getJob(jobId: string): Promise<IngestJob | null> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<JobRow>(`SELECT * FROM ingest_jobs WHERE id = $1`, [
      jobId,
    ]);
    return rows.length > 0 ? toJob(rows[0]) : null;
  }

  async latestJobForUpload(uploadId: string): Promise<IngestJob | null> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<JobRow>(
      `SELECT * FROM ingest_jobs WHERE upload_id = $1 ORDER BY created_at DESC LIMIT 1`,
      [uploadId],
    );
    return rows.length > 0 ? toJob(rows[0]) : null;
  }

  async transitionJob(jobId: string, to: IngestStatus, error?: string): Promise<IngestJob> {
    return this.transaction(async (client) => {
      const { rows } = await client.query<JobRow>(
        `SELECT * FROM ingest_jobs WHERE id = $1 FOR UPDATE`,
        [jobId],
      );
      if (rows.length === 0) throw new NotFoundError(`Ingest job ${jobId} not found`);
      assertTransition(toJob(rows[0]), to);

      const updated = await client.query<JobRow>(
        `UPDATE ingest_jobs SET status = $2, error = $3, updated_at = NOW()
         WHERE id = $1 RETURNING *`,
        [jobId, to, to === "failed" ? (error ?? "Ingestion failed") : null],
      );
      return toJob(updated.rows[0]);
    });
  }

  async appendEventBatch(jobId: string, events: EventDraft[], badLines: number): Promise<IngestJob> {
    return this.transaction(async (client) => {
      const { rows } = await client.query<JobRow>(
        `UPDATE ingest_jobs
         SET inserted_events = inserted_events + $2, bad_lines = bad_lines + $3, updated_at = NOW()
         WHERE id = $1 RETURNING *`,
        [jobId, events.length, badLines],
      );
      if (rows.length === 0) throw new NotFoundError(`Ingest job ${jobId} not found`);
      const job = toJob(rows[0]);

      for (let i = 0; i < events.length; i += INSERT_CHUNK) {
        const chunk = events.slice(i, i + INSERT_CHUNK);
        await client.query(
          `INSERT INTO events (${EVENT_COLUMNS.join(", ")})
           VALUES ${placeholders(chunk.length, EVENT_COLUMNS.length)}`,
          chunk.flatMap((event) => eventValues(randomUUID(), job.uploadId, event)),
        );
      }
      return job;
    });
  }

  async listEvents(uploadId: string): Promise<NormalizedEvent[]> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<EventRow>(
      `SELECT * FROM events WHERE upload_id = $1 ORDER BY seq`,
      [uploadId],
    );
    return rows.map(toEvent);
  }

  async getEventsByIds(ids: string[]): Promise<NormalizedEvent[]> {
    if (ids.length === 0) return [];
    await this.ensureSchema();
    const { rows } = await this.pool.query<EventRow>(
      `SELECT * FROM events WHERE id = ANY($1::text[]) ORDER BY seq`,
      [ids],
    );
    return rows.map(toEvent);
  }

  async replaceRollups(uploadId: string, buckets: RollupBucket[]): Promise<void> {
    await this.transaction(async (client) => {
      // Serializes concurrent recomputations of the same upload
      await client.query(`SELECT pg_advisory_xact_lock(hashtext($1))`, [uploadId]);
      const { rows } = await client.query<{ now: Date }>(`SELECT NOW() AS now`);
      const stamp = rows[0].now;

      for (let i = 0; i < buckets.length; i += INSERT_CHUNK) {
        const chunk = buckets.slice(i, i + INSERT_CHUNK);
        await client.query(
          `INSERT INTO rollups (${ROLLUP_COLUMNS.join(", ")})
           VALUES ${placeholders(chunk.length, ROLLUP_COLUMNS.length)}
           ON CONFLICT (upload_id, bucket, user_email, client_ip, dest_host, action, threat_category)
           DO UPDATE SET total = EXCLUDED.total, computed_at = EXCLUDED.computed_at`,
          chunk.flatMap((b) => [
            uploadId, b.bucket, b.userEmail, b.clientIp, b.destHost, b.action,
            b.threatCategory, b.total, stamp,
          ]),
        );
      }

      await client.query(`DELETE FROM rollups WHERE upload_id = $1 AND computed_at <> $2`, [
        uploadId,
        stamp,
      ]);
    });
  }

  async listRollups(uploadId: string): Promise<RollupBucket[]> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<RollupRow>(
      `SELECT * FROM rollups WHERE upload_id = $1
       ORDER BY bucket, user_email, client_ip, dest_host, action, threat_category`,
      [uploadId],
    );
    return rows.map((row) => ({
      uploadId: row.upload_id,
      bucket: row.bucket,
      userEmail: row.user_email,
      clientIp: row.client_ip,
      destHost: row.dest_host,
      action: row.action,
      threatCategory: row.threat_category,
      total: row.total,
    }));
  }

  async appendFindings(uploadId: string, inputs: FindingInput[]): Promise<Finding[]> {
    return this.transaction(async (client) => {
      const created: Finding[] = [];
      // One row per statement so `sequence` follows input order
      for (const f of inputs) {
        const { rows } = await client.query<FindingRow>(
          `INSERT INTO findings
             (id, upload_id, pattern_name, severity, confidence, title, summary, evidence, fingerprint)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9) RETURNING *`,
          [
            randomUUID(), uploadId, f.patternName, f.severity, f.confidence, f.title,
            f.summary, JSON.stringify(f.evidence), f.fingerprint,
          ],
        );
        created.push(toFinding(rows[0]));
      }
      return created;
    });
  }

  async listFindings(uploadId: string): Promise<Finding[]> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<FindingRow>(
      `SELECT * FROM findings WHERE upload_id = $1 ORDER BY sequence`,
      [uploadId],
    );
    return rows.map(toFinding);
  }

  async upsertFeatures(features: UploadFeatures): Promise<void> {
    await this.ensureSchema();
    const { uploadId, computedAt, ...payload } = features;
    await this.pool.query(
      `INSERT INTO upload_features (upload_id, payload, computed_at) VALUES ($1, $2, $3)
       ON CONFLICT (upload_id) DO UPDATE SET payload = EXCLUDED.payload, computed_at = EXCLUDED.computed_at`,
      [uploadId, JSON.stringify(payload), computedAt],
    );
  }

  async getFeatures(uploadId: string): Promise<UploadFeatures | null> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<FeaturesRow>(
      `SELECT * FROM upload_features WHERE upload_id = $1`,
      [uploadId],
    );
    if (rows.length === 0) return null;
    return { ...rows[0].payload, uploadId: rows[0].upload_id, computedAt: rows[0].computed_at };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
