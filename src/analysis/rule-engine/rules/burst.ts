import type { DetectionRule, Evidence, FindingDraft, Severity } from "@/analysis/types";
import { UNSET } from "@/lib/constants";
import { calcConfidence } from "../confidence";
import { distinct, eventBucket, evidenceEventIds, groupRollups, timeSpan } from "../utils";

/** Severity escalates to critical at this multiple of the threshold */
const CRITICAL_MULTIPLE = 3;

/**
 * Flags a (client IP, minute) pair whose rollup total exceeds the burst
 * threshold. Bursts usually mean automation: a scanner, a beacon, or a
 * runaway process.
 */
export const burstFromSingleIp: DetectionRule = {
  name: "BURST_FROM_SINGLE_IP",

  evaluate({ events, rollups, settings }) {
    const threshold = settings.burstThreshold;
    const groups = groupRollups(rollups, (b) =>
      b.clientIp === UNSET || b.bucket === UNSET ? null : { bucket: b.bucket, clientIp: b.clientIp },
    );

    const findings: FindingDraft[] = [];
    for (const { key, buckets, total } of groups) {
      if (total <= threshold) continue;

      const matched = events.filter(
        (e) => e.clientIp === key.clientIp && eventBucket(e) === key.bucket,
      );
      const severity: Severity = total >= threshold * CRITICAL_MULTIPLE ? "critical" : "high";
      const evidence: Evidence = {
        bucket: key.bucket,
        client_ip: key.clientIp,
        count: total,
        threshold,
        user_emails: distinct(buckets.map((b) => b.userEmail)),
        dest_hosts: distinct(buckets.map((b) => b.destHost)),
        ...timeSpan(matched),
        event_ids: evidenceEventIds(matched),
      };

      findings.push({
        patternName: "BURST_FROM_SINGLE_IP",
        severity,
        confidence: calcConfidence(severity, evidence, [
          { weight: 0.3, value: total, threshold, capMultiple: 5 },
        ]),
        title: `Burst from ${key.clientIp}`,
        summary:
          `${key.clientIp} generated ${total} events in one minute (${key.bucket}), ` +
          `above the threshold of ${threshold}. This often indicates automation ` +
          `(scan/beacon) or a runaway process.`,
        evidence,
      });
    }
    return findings;
  },
};
