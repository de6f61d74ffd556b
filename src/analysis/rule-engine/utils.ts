import { createHash } from "crypto";
import type { Evidence, NormalizedEvent, PatternName, RollupBucket } from "@/analysis/types";
import { MAX_EVIDENCE_EVENT_IDS, UNSET } from "@/lib/constants";
import { minuteBucket } from "@/analysis/rollup";

/** JSON with object keys sorted, so equal evidence always serializes equally. */
function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * Compute a deterministic fingerprint for a finding.
 * SHA-256 of (pattern + evidence), truncated to 16 hex chars. Re-running
 * detection over unchanged data reproduces the same fingerprints.
 */
export function computeFingerprint(patternName: PatternName, evidence: Evidence): string {
  const input = `${patternName}:${stableStringify(evidence)}`;
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

export function isBlocked(action: string | null): boolean {
  return action !== null && action.toLowerCase() === "blocked";
}

/** Rollup dimension back to a nullable evidence value. */
export function fromDim(value: string): string | null {
  return value === UNSET ? null : value;
}

/** Event field as a rollup dimension. */
export function toDim(value: string | null): string {
  return value ?? UNSET;
}

export function eventBucket(event: NormalizedEvent): string {
  return event.eventTime ? minuteBucket(event.eventTime) : UNSET;
}

/** Sorted distinct non-null values. */
export function distinct(values: Iterable<string | null>, limit = MAX_EVIDENCE_EVENT_IDS): string[] {
  const set = new Set<string>();
  for (const value of values) {
    if (value !== null && value !== UNSET) set.add(value);
  }
  return [...set].sort().slice(0, limit);
}

export function evidenceEventIds(events: readonly NormalizedEvent[]): string[] {
  return events.slice(0, MAX_EVIDENCE_EVENT_IDS).map((e) => e.id);
}

/** Earliest and latest timestamp among `events`, as ISO strings. */
export function timeSpan(events: readonly NormalizedEvent[]): {
  first_seen: string | null;
  last_seen: string | null;
} {
  let first: Date | null = null;
  let last: Date | null = null;
  for (const event of events) {
    if (!event.eventTime) continue;
    if (!first || event.eventTime < first) first = event.eventTime;
    if (!last || event.eventTime > last) last = event.eventTime;
  }
  return { first_seen: first?.toISOString() ?? null, last_seen: last?.toISOString() ?? null };
}

export interface RollupGroup<K> {
  key: K;
  buckets: RollupBucket[];
  total: number;
}

/**
 * Group rollup rows by a derived key. Rows for which `keyOf` returns null are
 * skipped. Groups come back ordered by total desc, then key string.
 */
export function groupRollups<K>(
  rollups: readonly RollupBucket[],
  keyOf: (bucket: RollupBucket) => K | null,
): RollupGroup<K>[] {
  const groups = new Map<string, RollupGroup<K>>();
  for (const bucket of rollups) {
    const key = keyOf(bucket);
    if (key === null) continue;
    const id = JSON.stringify(key);
    const group = groups.get(id) ?? { key, buckets: [], total: 0 };
    group.buckets.push(bucket);
    group.total += bucket.total;
    groups.set(id, group);
  }
  return [...groups.entries()]
    .sort(([a, ga], [b, gb]) => gb.total - ga.total || (a < b ? -1 : a > b ? 1 : 0))
    .map(([, group]) => group);
}

/** Stable string ordering helper for sorts. */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
