import type { DetectionRule, Evidence, FindingDraft } from "@/analysis/types";
import { UNSET } from "@/lib/constants";
import { calcConfidence } from "../confidence";
import {
  distinct,
  evidenceEventIds,
  fromDim,
  groupRollups,
  isBlocked,
  timeSpan,
  toDim,
} from "../utils";

const C2_CATEGORY = /^(botnet|command|c2)/i;
const MAX_FINDINGS = 15;

/**
 * Flags repeated blocked callbacks to one host in botnet/C2 categories,
 * spread over several distinct minutes. No periodicity analysis; the label
 * is "suspected".
 */
export const c2BeaconingSuspected: DetectionRule = {
  name: "C2_BEACONING_SUSPECTED",

  evaluate({ events, rollups, settings }) {
    const { minMinutes, minHits } = settings.beaconing;
    const groups = groupRollups(rollups, (b) =>
      isBlocked(b.action) && b.destHost !== UNSET && C2_CATEGORY.test(b.threatCategory)
        ? { userEmail: b.userEmail, clientIp: b.clientIp, destHost: b.destHost }
        : null,
    );

    const findings: FindingDraft[] = [];
    for (const { key, buckets, total } of groups) {
      if (findings.length >= MAX_FINDINGS) break;
      const activeMinutes = distinct(
        buckets.map((b) => b.bucket),
        Number.POSITIVE_INFINITY,
      ).length;
      if (activeMinutes < minMinutes || total < minHits) continue;

      const matched = events.filter(
        (e) =>
          isBlocked(e.action) &&
          e.destHost === key.destHost &&
          e.threatCategory !== null &&
          C2_CATEGORY.test(e.threatCategory) &&
          toDim(e.userEmail) === key.userEmail &&
          toDim(e.clientIp) === key.clientIp,
      );
      const user = fromDim(key.userEmail);
      const ip = fromDim(key.clientIp);
      const evidence: Evidence = {
        security_outcome: "C2_BEACONING_SUSPECTED",
        user_email: user,
        client_ip: ip,
        dest_host: key.destHost,
        threat_categories: distinct(buckets.map((b) => b.threatCategory)),
        active_minutes: activeMinutes,
        blocked_hits: total,
        ...timeSpan(matched),
        event_ids: evidenceEventIds(matched),
        mitre: ["TA0011", "T1071"],
      };

      findings.push({
        patternName: "C2_BEACONING_SUSPECTED",
        severity: "high",
        confidence: calcConfidence(
          "high",
          evidence,
          [
            { weight: 0.18, value: activeMinutes, threshold: minMinutes, capMultiple: 5 },
            { weight: 0.18, value: total, threshold: minHits, capMultiple: 8 },
          ],
          // the category filter is already specific
          0.04,
        ),
        title: "C2 beaconing suspected (repeated blocked callbacks)",
        summary:
          `${user ?? "<unknown user>"} / ${ip ?? "<unknown ip>"} repeatedly attempted to reach ` +
          `${key.destHost} across ${activeMinutes} distinct minutes (${total} total blocked ` +
          `hits). Repeated callback attempts are consistent with beaconing behavior.`,
        evidence,
      });
    }
    return findings;
  },
};
