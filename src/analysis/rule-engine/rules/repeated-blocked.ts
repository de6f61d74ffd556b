import type { DetectionRule, Evidence, FindingDraft } from "@/analysis/types";
import { UNSET } from "@/lib/constants";
import { calcConfidence } from "../confidence";
import {
  evidenceEventIds,
  fromDim,
  groupRollups,
  isBlocked,
  timeSpan,
  toDim,
} from "../utils";

const MAX_FINDINGS = 25;

/**
 * Flags a (user, client IP, threat category) that keeps getting blocked.
 * Consistent with an infected host retrying, or repeated malicious browsing.
 */
export const repeatedBlockedThreatCategory: DetectionRule = {
  name: "REPEATED_BLOCKED_THREAT_CATEGORY",

  evaluate({ events, rollups, settings }) {
    const { minHits } = settings.repeatedBlocked;
    const groups = groupRollups(rollups, (b) =>
      isBlocked(b.action) && b.threatCategory !== UNSET
        ? { userEmail: b.userEmail, clientIp: b.clientIp, threatCategory: b.threatCategory }
        : null,
    ).filter((g) => g.total >= minHits);

    const findings: FindingDraft[] = [];
    for (const { key, total } of groups.slice(0, MAX_FINDINGS)) {
      const matched = events.filter(
        (e) =>
          isBlocked(e.action) &&
          e.threatCategory === key.threatCategory &&
          toDim(e.userEmail) === key.userEmail &&
          toDim(e.clientIp) === key.clientIp,
      );
      const user = fromDim(key.userEmail);
      const ip = fromDim(key.clientIp);
      const evidence: Evidence = {
        user_email: user,
        client_ip: ip,
        threat_category: key.threatCategory,
        blocked_hits: total,
        ...timeSpan(matched),
        event_ids: evidenceEventIds(matched),
      };

      findings.push({
        patternName: "REPEATED_BLOCKED_THREAT_CATEGORY",
        severity: "high",
        confidence: calcConfidence("high", evidence, [
          { weight: 0.28, value: total, threshold: minHits, capMultiple: 6 },
        ]),
        title: `Repeated blocked ${key.threatCategory}`,
        summary:
          `${user ?? "<unknown user>"} / ${ip ?? "<unknown ip>"} triggered ${total} blocked ` +
          `events in threat category '${key.threatCategory}'. This is consistent with ` +
          `infection/beaconing or repeated malicious browsing.`,
        evidence,
      });
    }
    return findings;
  },
};
