import type { DetectionRule, Evidence, FindingDraft, Severity } from "@/analysis/types";
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

const MAX_FINDINGS = 10;

/**
 * Flags one user/host blocked across several threat categories. Breadth of
 * categories points at automated malicious activity rather than browsing.
 */
export const endpointCompromiseMultiCategory: DetectionRule = {
  name: "ENDPOINT_COMPROMISE_MULTI_CATEGORY",

  evaluate({ events, rollups, settings }) {
    const { minCategories, minHits, criticalHits } = settings.multiCategory;
    const groups = groupRollups(rollups, (b) =>
      isBlocked(b.action) && b.threatCategory !== UNSET
        ? { userEmail: b.userEmail, clientIp: b.clientIp }
        : null,
    );

    const findings: FindingDraft[] = [];
    for (const { key, buckets, total } of groups) {
      if (findings.length >= MAX_FINDINGS) break;
      const categories = distinct(buckets.map((b) => b.threatCategory));
      if (categories.length < minCategories || total < minHits) continue;

      const matched = events.filter(
        (e) =>
          isBlocked(e.action) &&
          e.threatCategory !== null &&
          toDim(e.userEmail) === key.userEmail &&
          toDim(e.clientIp) === key.clientIp,
      );
      const user = fromDim(key.userEmail);
      const ip = fromDim(key.clientIp);
      const severity: Severity = total >= criticalHits ? "critical" : "high";
      const evidence: Evidence = {
        security_outcome: "SUSPECTED_ENDPOINT_COMPROMISE_MULTI_STAGE",
        user_email: user,
        client_ip: ip,
        threat_categories: categories,
        distinct_threat_categories: categories.length,
        blocked_hits: total,
        ...timeSpan(matched),
        event_ids: evidenceEventIds(matched),
        mitre: ["TA0001", "TA0011"],
      };

      findings.push({
        patternName: "ENDPOINT_COMPROMISE_MULTI_CATEGORY",
        severity,
        confidence: calcConfidence(severity, evidence, [
          { weight: 0.2, value: categories.length, threshold: minCategories, capMultiple: 4 },
          { weight: 0.22, value: total, threshold: minHits, capMultiple: 6 },
        ]),
        title: "Suspected endpoint compromise (multi-stage) from one host/user",
        summary:
          `${user ?? "<unknown user>"} / ${ip ?? "<unknown ip>"} generated blocked activity ` +
          `across ${categories.length} threat categories (${total} total blocked hits). ` +
          `This breadth suggests automated malicious activity rather than casual browsing.`,
        evidence,
      });
    }
    return findings;
  },
};
