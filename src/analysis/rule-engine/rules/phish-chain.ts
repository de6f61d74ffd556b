import type { DetectionRule, Evidence, FindingDraft, RollupBucket } from "@/analysis/types";
import { ONE_MINUTE_MS, UNSET } from "@/lib/constants";
import { calcConfidence, clamp } from "../confidence";
import {
  evidenceEventIds,
  eventBucket,
  fromDim,
  groupRollups,
  isBlocked,
  timeSpan,
  toDim,
} from "../utils";

const PHISH_CATEGORY = /^phishing/i;
const PAYLOAD_CATEGORY = /^(malware|ransomware|botnet|cryptomining|data transfer|data leakage)/i;
const MAX_FINDINGS = 10;

function earliest(buckets: readonly RollupBucket[]): string | null {
  let first: string | null = null;
  for (const b of buckets) {
    if (first === null || b.bucket < first) first = b.bucket;
  }
  return first;
}

function sum(buckets: readonly RollupBucket[]): number {
  return buckets.reduce((n, b) => n + b.total, 0);
}

/**
 * Flags a user/host with blocked phishing hits followed, within the window,
 * by blocked payload categories (malware, ransomware, botnet, cryptomining,
 * data transfer/leakage).
 */
export const phishToPayloadChain: DetectionRule = {
  name: "PHISH_TO_PAYLOAD_CHAIN_SUSPECTED",

  evaluate({ events, rollups, settings }) {
    const { windowMinutes, minPhish, minPayload } = settings.phishChain;
    const windowMs = windowMinutes * ONE_MINUTE_MS;

    const groups = groupRollups(rollups, (b) =>
      isBlocked(b.action) &&
      b.bucket !== UNSET &&
      (PHISH_CATEGORY.test(b.threatCategory) || PAYLOAD_CATEGORY.test(b.threatCategory))
        ? { userEmail: b.userEmail, clientIp: b.clientIp }
        : null,
    );

    const findings: FindingDraft[] = [];
    for (const { key, buckets } of groups) {
      if (findings.length >= MAX_FINDINGS) break;

      const phish = buckets.filter((b) => PHISH_CATEGORY.test(b.threatCategory));
      const firstPhish = earliest(phish);
      if (firstPhish === null || sum(phish) < minPhish) continue;

      const chainEnd = Date.parse(firstPhish) + windowMs;
      const payload = buckets.filter(
        (b) =>
          PAYLOAD_CATEGORY.test(b.threatCategory) &&
          b.bucket >= firstPhish &&
          Date.parse(b.bucket) <= chainEnd,
      );
      const firstPayload = earliest(payload);
      const phishHits = sum(phish);
      const payloadHits = sum(payload);
      if (firstPayload === null || payloadHits < minPayload) continue;

      const chainBuckets = new Set([...phish, ...payload].map((b) => b.bucket));
      const matched = events.filter(
        (e) =>
          isBlocked(e.action) &&
          e.threatCategory !== null &&
          (PHISH_CATEGORY.test(e.threatCategory) || PAYLOAD_CATEGORY.test(e.threatCategory)) &&
          chainBuckets.has(eventBucket(e)) &&
          toDim(e.userEmail) === key.userEmail &&
          toDim(e.clientIp) === key.clientIp,
      );
      const user = fromDim(key.userEmail);
      const ip = fromDim(key.clientIp);
      const deltaSeconds = (Date.parse(firstPayload) - Date.parse(firstPhish)) / 1000;
      const evidence: Evidence = {
        security_outcome: "PHISH_TO_PAYLOAD_CHAIN_SUSPECTED",
        user_email: user,
        client_ip: ip,
        first_phish: firstPhish,
        first_payload: firstPayload,
        delta_seconds: deltaSeconds,
        phish_hits: phishHits,
        payload_hits: payloadHits,
        window_minutes: windowMinutes,
        ...timeSpan(matched),
        event_ids: evidenceEventIds(matched),
        mitre: ["TA0001", "TA0002", "TA0011"],
      };

      // A tighter chain earns up to 0.10 extra
      const tightness = clamp(1 - deltaSeconds / (windowMinutes * 60));
      findings.push({
        patternName: "PHISH_TO_PAYLOAD_CHAIN_SUSPECTED",
        severity: "high",
        confidence: calcConfidence(
          "high",
          evidence,
          [
            { weight: 0.14, value: phishHits, threshold: minPhish, capMultiple: 8 },
            { weight: 0.16, value: payloadHits, threshold: minPayload, capMultiple: 10 },
          ],
          0.1 * tightness,
        ),
        title: "Phish → payload chain suspected",
        summary:
          `${user ?? "<unknown user>"} / ${ip ?? "<unknown ip>"} shows blocked phishing ` +
          `activity followed by blocked malware/ransomware/botnet/exfil-related categories ` +
          `within ${windowMinutes} minutes. This sequence is consistent with a phish leading ` +
          `to follow-on compromise attempts.`,
        evidence,
      });
    }
    return findings;
  },
};
