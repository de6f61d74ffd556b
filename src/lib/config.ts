import { z } from "zod/v4";
import type { S3Config } from "./storage-s3";

const intEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const hourEnv = (fallback: number) => z.coerce.number().int().min(0).max(24).default(fallback);

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  UPLOAD_DIR: z.string().min(1).default("uploads"),

  S3_ENDPOINT: z.string().optional(),
  S3_REGION: z.string().optional(),
  S3_BUCKET: z.string().optional(),
  S3_ACCESS_KEY: z.string().optional(),
  S3_SECRET_KEY: z.string().optional(),
  S3_PATH_PREFIX: z.string().optional(),
  S3_FORCE_PATH_STYLE: z.enum(["true", "false"]).optional(),

  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  NARRATIVE_TIMEOUT_MS: intEnv(45_000),
  NARRATIVE_SAMPLE_EVENTS: intEnv(25),

  INGEST_BATCH_SIZE: intEnv(500),

  BURST_THRESHOLD: intEnv(50),
  WORK_HOURS_START: hourEnv(7),
  WORK_HOURS_END: hourEnv(19),
  OFF_HOURS_MIN_SAMPLE: intEnv(20),
  OFF_HOURS_MIN_EVENTS: intEnv(3),
  OFF_HOURS_MAX_RATIO: z.coerce.number().min(0).max(1).default(0.5),
  MANY_DEST_THRESHOLD: intEnv(25),
  MANY_DEST_WINDOW_MINUTES: intEnv(10),
  SPIKE_BASE_THRESHOLD: intEnv(20),
  SPIKE_MIN_COUNT: intEnv(3),
});

export interface DetectionSettings {
  burstThreshold: number;
  offHours: {
    /** Inclusive start of the normal working window, UTC hour */
    startHour: number;
    /** Exclusive end of the normal working window, UTC hour */
    endHour: number;
    minSample: number;
    minEvents: number;
    maxRatio: number;
  };
  manyDestinations: { threshold: number; windowMinutes: number };
  categorySpike: { baseThreshold: number; minCount: number };
  repeatedBlocked: { minHits: number };
  topBlockedHost: { minHits: number };
  multiCategory: { minCategories: number; minHits: number; criticalHits: number };
  beaconing: { minMinutes: number; minHits: number };
  phishChain: { windowMinutes: number; minPhish: number; minPayload: number };
}

export interface Settings {
  databaseUrl: string | null;
  uploadDir: string;
  s3: S3Config | null;
  llm: {
    anthropicApiKey: string | null;
    openaiApiKey: string | null;
    timeoutMs: number;
    sampleEvents: number;
  };
  ingest: { batchSize: number };
  detection: DetectionSettings;
}

/**
 * Parse environment variables into typed settings.
 * Throws a zod error naming the offending variable when a value is malformed.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const e = envSchema.parse(env);

  const s3: S3Config | null =
    e.S3_ENDPOINT && e.S3_REGION && e.S3_BUCKET && e.S3_ACCESS_KEY && e.S3_SECRET_KEY
      ? {
          endpoint: e.S3_ENDPOINT,
          region: e.S3_REGION,
          bucket: e.S3_BUCKET,
          accessKeyId: e.S3_ACCESS_KEY,
          secretAccessKey: e.S3_SECRET_KEY,
          pathPrefix: e.S3_PATH_PREFIX || undefined,
          forcePathStyle: e.S3_FORCE_PATH_STYLE === "true",
        }
      : null;

  return {
    databaseUrl: e.DATABASE_URL ?? null,
    uploadDir: e.UPLOAD_DIR,
    s3,
    llm: {
      anthropicApiKey: e.ANTHROPIC_API_KEY ?? null,
      openaiApiKey: e.OPENAI_API_KEY ?? null,
      timeoutMs: e.NARRATIVE_TIMEOUT_MS,
      sampleEvents: e.NARRATIVE_SAMPLE_EVENTS,
    },
    ingest: { batchSize: e.INGEST_BATCH_SIZE },
    detection: {
      burstThreshold: e.BURST_THRESHOLD,
      offHours: {
        startHour: e.WORK_HOURS_START,
        endHour: e.WORK_HOURS_END,
        minSample: e.OFF_HOURS_MIN_SAMPLE,
        minEvents: e.OFF_HOURS_MIN_EVENTS,
        maxRatio: e.OFF_HOURS_MAX_RATIO,
      },
      manyDestinations: {
        threshold: e.MANY_DEST_THRESHOLD,
        windowMinutes: e.MANY_DEST_WINDOW_MINUTES,
      },
      categorySpike: {
        baseThreshold: e.SPIKE_BASE_THRESHOLD,
        minCount: e.SPIKE_MIN_COUNT,
      },
      repeatedBlocked: { minHits: 25 },
      topBlockedHost: { minHits: 15 },
      multiCategory: { minCategories: 3, minHits: 12, criticalHits: 40 },
      beaconing: { minMinutes: 4, minHits: 8 },
      phishChain: { windowMinutes: 30, minPhish: 2, minPayload: 2 },
    },
  };
}

/** Settings with every default applied, independent of the process environment. */
export function defaultSettings(): Settings {
  return loadSettings({});
}
