import type { DetectionSettings } from "@/lib/config";
import type { SECURITY_OUTCOMES } from "@/lib/constants";

export type Severity = "critical" | "high" | "medium" | "low";

export type IngestStatus = "queued" | "running" | "done" | "failed";

export type LogDialect = "json" | "kv";

export type PatternName =
  | "BURST_FROM_SINGLE_IP"
  | "OFF_HOURS_ACCESS"
  | "USER_MANY_DESTINATIONS"
  | "THREAT_CATEGORY_SPIKE"
  | "REPEATED_BLOCKED_THREAT_CATEGORY"
  | "TOP_BLOCKED_DEST_HOST"
  | "ENDPOINT_COMPROMISE_MULTI_CATEGORY"
  | "C2_BEACONING_SUSPECTED"
  | "PHISH_TO_PAYLOAD_CHAIN_SUSPECTED";

export type SecurityOutcome = (typeof SECURITY_OUTCOMES)[number];

export interface IngestJob {
  id: string;
  uploadId: string;
  status: IngestStatus;
  insertedEvents: number;
  badLines: number;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Wire shape returned by `getIngestStatus`. */
export interface IngestStatusView {
  job_id: string;
  upload_id: string;
  status: IngestStatus;
  inserted_events: number;
  bad_lines: number;
  error?: string;
}

/** Typed fields extracted from one raw line, before the store assigns identity. */
export interface EventFields {
  eventTime: Date | null;
  eventId: string | null;
  vendor: string | null;

  action: string | null;
  reason: string | null;
  severity: string | null;
  status: number | null;

  userEmail: string | null;
  department: string | null;
  location: string | null;

  clientIp: string | null;
  serverIp: string | null;
  destHost: string | null;
  url: string | null;
  requestMethod: string | null;

  urlCategory: string | null;
  threatCategory: string | null;
  threatName: string | null;
  riskScore: number | null;

  requestSize: number | null;
  responseSize: number | null;
  transactionSize: number | null;
}

export interface EventDraft extends EventFields {
  lineNumber: number;
  dialect: LogDialect;
  /** The original line, verbatim */
  raw: string;
}

export interface NormalizedEvent extends EventDraft {
  id: string;
  uploadId: string;
}

export interface RollupKey {
  bucket: string;
  userEmail: string;
  clientIp: string;
  destHost: string;
  action: string;
  threatCategory: string;
}

export interface RollupBucket extends RollupKey {
  uploadId: string;
  total: number;
}

export type Evidence = Record<string, unknown>;

export interface FindingDraft {
  patternName: PatternName;
  severity: Severity;
  confidence: number;
  title: string;
  summary: string;
  evidence: Evidence;
}

export interface Finding extends FindingDraft {
  id: string;
  uploadId: string;
  fingerprint: string;
  /** Store-wide creation order, used as the stable tie breaker */
  sequence: number;
  createdAt: Date;
}

export interface CountEntry {
  value: string;
  count: number;
}

export interface UploadFeatures {
  uploadId: string;
  totalEvents: number;
  timeRange: { start: string | null; end: string | null };
  actions: { blocked: number; allowed: number };
  topUsers: CountEntry[];
  topClientIps: CountEntry[];
  topDestHosts: CountEntry[];
  topThreatCategories: CountEntry[];
  computedAt: Date;
}

export interface AffectedEntities {
  user_emails: string[];
  client_ips: string[];
  dest_hosts: string[];
  threat_categories: string[];
}

export interface Incident {
  title: string;
  severity: Severity;
  confidence: number;
  confirmed: boolean;
  security_outcomes: SecurityOutcome[];
  affected_entities: AffectedEntities;
  evidence_finding_ids: string[];
  evidence_event_ids: string[];
  why: string[];
  recommended_actions: string[];
}

export interface TimelineItem {
  ts_start: string;
  ts_end: string;
  label: string;
  evidence_finding_ids: string[];
  evidence_event_ids: string[];
}

export interface IocSets {
  domains: string[];
  urls: string[];
  ips: string[];
  users: string[];
}

export interface SocReport {
  summary: string;
  timeline: TimelineItem[];
  incidents: Incident[];
  iocs: IocSets;
  gaps: string[];
}

export interface DetectionScope {
  readonly uploadId: string;
  readonly events: readonly NormalizedEvent[];
  readonly rollups: readonly RollupBucket[];
  readonly settings: DetectionSettings;
}

/** A named, independently evaluable detection rule. */
export interface DetectionRule {
  readonly name: PatternName;
  evaluate(scope: DetectionScope): FindingDraft[];
}
