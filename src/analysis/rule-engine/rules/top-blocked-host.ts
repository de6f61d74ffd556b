import type { DetectionRule, Evidence, FindingDraft } from "@/analysis/types";
import { UNSET } from "@/lib/constants";
import { calcConfidence } from "../confidence";
import { distinct, evidenceEventIds, groupRollups, isBlocked, timeSpan } from "../utils";

const MAX_FINDINGS = 20;

/** Flags destination hosts that concentrate blocked traffic. */
export const topBlockedDestHost: DetectionRule = {
  name: "TOP_BLOCKED_DEST_HOST",

  evaluate({ events, rollups, settings }) {
    const { minHits } = settings.topBlockedHost;
    const groups = groupRollups(rollups, (b) =>
      isBlocked(b.action) && b.destHost !== UNSET ? { destHost: b.destHost } : null,
    ).filter((g) => g.total >= minHits);

    const findings: FindingDraft[] = [];
    for (const { key, buckets, total } of groups.slice(0, MAX_FINDINGS)) {
      const matched = events.filter((e) => isBlocked(e.action) && e.destHost === key.destHost);
      const evidence: Evidence = {
        dest_host: key.destHost,
        blocked_hits: total,
        user_emails: distinct(buckets.map((b) => b.userEmail)),
        client_ips: distinct(buckets.map((b) => b.clientIp)),
        threat_categories: distinct(buckets.map((b) => b.threatCategory)),
        ...timeSpan(matched),
        event_ids: evidenceEventIds(matched),
      };

      findings.push({
        patternName: "TOP_BLOCKED_DEST_HOST",
        severity: "medium",
        confidence: calcConfidence("medium", evidence, [
          { weight: 0.22, value: total, threshold: minHits, capMultiple: 6 },
        ]),
        title: `Blocked traffic concentrated to ${key.destHost}`,
        summary:
          `${key.destHost} accounts for ${total} blocked events. Worth pivoting into ` +
          `the users and IPs involved and their timeline.`,
        evidence,
      });
    }
    return findings;
  },
};
