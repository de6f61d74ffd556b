import type { NormalizedEvent, TimelineItem } from "@/analysis/types";
import { compareStrings } from "@/analysis/rule-engine/utils";
import { evidenceString } from "./evidence";
import type { IncidentCluster } from "./incidents";

/** Evidence keys holding an ISO timestamp. */
const TIME_FIELDS = ["first_seen", "last_seen", "bucket", "first_phish", "first_payload"] as const;

function incidentTimes(
  cluster: IncidentCluster,
  eventsById: ReadonlyMap<string, NormalizedEvent>,
): number[] {
  const times: number[] = [];
  for (const id of cluster.incident.evidence_event_ids) {
    const time = eventsById.get(id)?.eventTime;
    if (time) times.push(time.getTime());
  }
  for (const finding of cluster.findings) {
    for (const field of TIME_FIELDS) {
      const value = evidenceString(finding.evidence, field);
      const parsed = value === null ? Number.NaN : Date.parse(value);
      if (!Number.isNaN(parsed)) times.push(parsed);
    }
  }
  return times;
}

/**
 * One timeline item per incident, spanning the earliest to latest timestamp
 * among its linked events and evidence. Incidents with no usable timestamp are
 * left out. Items are ordered by start, then end, then label.
 */
export function buildTimeline(
  clusters: readonly IncidentCluster[],
  eventsById: ReadonlyMap<string, NormalizedEvent>,
): TimelineItem[] {
  const items: TimelineItem[] = [];
  for (const cluster of clusters) {
    const times = incidentTimes(cluster, eventsById);
    if (times.length === 0) continue;

    const { incident } = cluster;
    items.push({
      ts_start: new Date(Math.min(...times)).toISOString(),
      ts_end: new Date(Math.max(...times)).toISOString(),
      label: `[${incident.severity}] ${incident.title}`,
      evidence_finding_ids: incident.evidence_finding_ids,
      evidence_event_ids: incident.evidence_event_ids,
    });
  }

  return items.sort(
    (a, b) =>
      compareStrings(a.ts_start, b.ts_start) ||
      compareStrings(a.ts_end, b.ts_end) ||
      compareStrings(a.label, b.label),
  );
}
