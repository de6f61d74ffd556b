import type { NormalizedEvent, RollupBucket, RollupKey } from "@/analysis/types";
import { ONE_MINUTE_MS, UNSET } from "@/lib/constants";
import { rollupKeyOf, type RecordStore } from "@/lib/store/types";

/** ISO string of the minute containing `date`, e.g. 2024-03-01T12:05:00.000Z */
export function minuteBucket(date: Date): string {
  return new Date(Math.floor(date.getTime() / ONE_MINUTE_MS) * ONE_MINUTE_MS).toISOString();
}

export function rollupKeyForEvent(event: NormalizedEvent): RollupKey {
  return {
    bucket: event.eventTime ? minuteBucket(event.eventTime) : UNSET,
    userEmail: event.userEmail ?? UNSET,
    clientIp: event.clientIp ?? UNSET,
    destHost: event.destHost ?? UNSET,
    action: event.action ?? UNSET,
    threatCategory: event.threatCategory ?? UNSET,
  };
}

/**
 * Count events per (minute, user, client IP, dest host, action, threat category).
 * Pure and deterministic: the same events always give the same buckets in the
 * same order.
 */
export function buildRollups(uploadId: string, events: readonly NormalizedEvent[]): RollupBucket[] {
  const buckets = new Map<string, RollupBucket>();
  for (const event of events) {
    const key = rollupKeyForEvent(event);
    const candidate: RollupBucket = { uploadId, ...key, total: 0 };
    const id = rollupKeyOf(candidate);
    const bucket = buckets.get(id) ?? candidate;
    bucket.total++;
    buckets.set(id, bucket);
  }
  return [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, bucket]) => bucket);
}

/** Rebuild an upload's rollups from its stored events and replace them in the store. */
export async function recomputeRollups(store: RecordStore, uploadId: string): Promise<RollupBucket[]> {
  const events = await store.listEvents(uploadId);
  const buckets = buildRollups(uploadId, events);
  await store.replaceRollups(uploadId, buckets);
  return buckets;
}
