import type {
  DetectionRule,
  Evidence,
  FindingDraft,
  NormalizedEvent,
  Severity,
} from "@/analysis/types";
import { calcConfidence } from "../confidence";
import { compareStrings, distinct, evidenceEventIds, timeSpan } from "../utils";

/**
 * Categories rare enough in normal traffic that a handful of hits matters.
 * Their threshold is scaled down by HIGH_RISK_WEIGHT.
 */
export const HIGH_RISK_CATEGORIES: ReadonlySet<string> = new Set([
  "Botnet Callback",
  "Command and Control",
  "Cryptomining",
  "Data Leakage",
  "DNS Tunneling",
  "Malware",
  "Phishing",
  "Ransomware",
]);

const HIGH_RISK_WEIGHT = 0.25;
const CRITICAL_MULTIPLE = 4;

export function spikeThreshold(category: string, baseThreshold: number, minCount: number): number {
  const weight = HIGH_RISK_CATEGORIES.has(category) ? HIGH_RISK_WEIGHT : 1;
  return Math.max(minCount, Math.ceil(baseThreshold * weight));
}

/**
 * Flags a threat category whose occurrence count for the upload exceeds a
 * rarity-adjusted threshold.
 */
export const threatCategorySpike: DetectionRule = {
  name: "THREAT_CATEGORY_SPIKE",

  evaluate({ events, settings }) {
    const { baseThreshold, minCount } = settings.categorySpike;

    const byCategory = new Map<string, NormalizedEvent[]>();
    for (const event of events) {
      if (!event.threatCategory) continue;
      const list = byCategory.get(event.threatCategory) ?? [];
      list.push(event);
      byCategory.set(event.threatCategory, list);
    }

    const findings: FindingDraft[] = [];
    for (const category of [...byCategory.keys()].sort(compareStrings)) {
      const matched = byCategory.get(category) ?? [];
      const threshold = spikeThreshold(category, baseThreshold, minCount);
      if (matched.length <= threshold) continue;

      const highRisk = HIGH_RISK_CATEGORIES.has(category);
      const severity: Severity = !highRisk
        ? "medium"
        : matched.length >= threshold * CRITICAL_MULTIPLE
          ? "critical"
          : "high";
      const evidence: Evidence = {
        threat_category: category,
        count: matched.length,
        threshold,
        high_risk: highRisk,
        user_emails: distinct(matched.map((e) => e.userEmail)),
        client_ips: distinct(matched.map((e) => e.clientIp)),
        dest_hosts: distinct(matched.map((e) => e.destHost)),
        ...timeSpan(matched),
        event_ids: evidenceEventIds(matched),
      };

      findings.push({
        patternName: "THREAT_CATEGORY_SPIKE",
        severity,
        confidence: calcConfidence(severity, evidence, [
          { weight: 0.25, value: matched.length, threshold, capMultiple: 5 },
        ]),
        title: `Spike in ${category} activity`,
        summary:
          `${matched.length} events were classified as ${category}, above the ` +
          `${highRisk ? "high-risk " : ""}threshold of ${threshold} for this upload.`,
        evidence,
      });
    }
    return findings;
  },
};
