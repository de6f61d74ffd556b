import type { CountEntry, NormalizedEvent, UploadFeatures } from "@/analysis/types";
import { FEATURES_TOP_N } from "@/lib/constants";
import type { RecordStore } from "@/lib/store/types";

/** Most frequent non-null values, count desc then value asc. */
export function topCounts(values: Iterable<string | null>, limit = FEATURES_TOP_N): CountEntry[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count || (a.value < b.value ? -1 : a.value > b.value ? 1 : 0))
    .slice(0, limit);
}

/**
 * Per-upload summary statistics, computed once ingestion finishes.
 * Detection does not read these; they feed the report prompt and callers.
 */
export function computeFeatures(
  uploadId: string,
  events: readonly NormalizedEvent[],
  now: Date = new Date(),
): UploadFeatures {
  let start: Date | null = null;
  let end: Date | null = null;
  let blocked = 0;
  let allowed = 0;

  for (const event of events) {
    if (event.eventTime) {
      if (!start || event.eventTime < start) start = event.eventTime;
      if (!end || event.eventTime > end) end = event.eventTime;
    }
    if (event.action === "Blocked") blocked++;
    else if (event.action === "Allowed") allowed++;
  }

  return {
    uploadId,
    totalEvents: events.length,
    timeRange: { start: start?.toISOString() ?? null, end: end?.toISOString() ?? null },
    actions: { blocked, allowed },
    topUsers: topCounts(events.map((e) => e.userEmail)),
    topClientIps: topCounts(events.map((e) => e.clientIp)),
    topDestHosts: topCounts(events.map((e) => e.destHost)),
    topThreatCategories: topCounts(events.map((e) => e.threatCategory)),
    computedAt: now,
  };
}

export async function recomputeFeatures(store: RecordStore, uploadId: string): Promise<UploadFeatures> {
  const features = computeFeatures(uploadId, await store.listEvents(uploadId));
  await store.upsertFeatures(features);
  return features;
}
