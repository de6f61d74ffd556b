import type { Severity } from "@/analysis/types";

/** Stands in for an absent dimension so rollup keys stay total. */
export const UNSET = "<unset>";

export const SEVERITY_ORDER = ["critical", "high", "medium", "low"] as const;

/** Numeric rank for severity sorting (higher = more severe) */
export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

export const ONE_MINUTE_MS = 60_000;

/** Upper bound on event ids a single finding's evidence carries. */
export const MAX_EVIDENCE_EVENT_IDS = 25;

/** Entries kept in each top-N list of the upload features. */
export const FEATURES_TOP_N = 20;

/** Incident outcome labels, most specific first. */
export const SECURITY_OUTCOMES = [
  "SUSPECTED_ENDPOINT_COMPROMISE_MULTI_STAGE",
  "C2_BEACONING_SUSPECTED",
  "PHISH_TO_PAYLOAD_CHAIN_SUSPECTED",
  "DATA_EXFILTRATION_ATTEMPT_SUSPECTED",
  "CREDENTIAL_HARVESTING_SUSPECTED",
  "RANSOMWARE_STAGING_SUSPECTED",
  "CRYPTOMINING_ACTIVITY_SUSPECTED",
  "INSUFFICIENT_EVIDENCE",
] as const;
