export { SocCore, createSocCore, type SocCoreDeps, type DetectionAccepted } from "./analysis/pipeline";
export { IngestController, toStatusView } from "./analysis/ingest/controller";
export { normalizeLine, detectDialect } from "./analysis/ingest/normalizer";
export { buildRollups } from "./analysis/rollup";
export { computeFeatures } from "./analysis/features";
export { DETECTION_RULES, evaluateRules, runRuleEngine, sortFindings } from "./analysis/rule-engine";
export { ReportAssembler } from "./analysis/report/assembler";
export { synthesizeIncidents } from "./analysis/report/incidents";
export { socReportSchema, validateNarrative } from "./analysis/report/schema";
export {
  LLMReasoningCollaborator,
  createReasoningCollaborator,
  type NarrativeRequest,
  type ReasoningCollaborator,
  type SampledEvent,
} from "./analysis/llm";
export { createLLMClient, type LLMClient } from "./analysis/llm/client";
export { AnalysisEventBus, type AnalysisEvent } from "./lib/analysis-events";
export { loadSettings, defaultSettings, type Settings, type DetectionSettings } from "./lib/config";
export * from "./lib/errors";
export { createBlobSource, LocalBlobSource, type BlobSource } from "./lib/storage";
export { S3BlobSource, type S3Config } from "./lib/storage-s3";
export { MemoryStore } from "./lib/store/memory";
export { PgStore } from "./lib/store/pg";
export type { RecordStore, FindingInput } from "./lib/store/types";
export type * from "./analysis/types";
