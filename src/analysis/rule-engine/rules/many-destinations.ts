import type {
  DetectionRule,
  Evidence,
  FindingDraft,
  NormalizedEvent,
  Severity,
} from "@/analysis/types";
import { ONE_MINUTE_MS } from "@/lib/constants";
import { calcConfidence } from "../confidence";
import { compareStrings, distinct, evidenceEventIds, timeSpan } from "../utils";

interface WindowPeak {
  distinctHosts: number;
  events: NormalizedEvent[];
}

/**
 * Two-pointer sweep over time-ordered events, tracking the window of at most
 * `windowMs` with the most distinct destination hosts.
 */
function peakWindow(sorted: readonly NormalizedEvent[], windowMs: number): WindowPeak {
  const hostCounts = new Map<string, number>();
  let best: WindowPeak = { distinctHosts: 0, events: [] };
  let left = 0;

  for (let right = 0; right < sorted.length; right++) {
    const host = sorted[right].destHost ?? "";
    hostCounts.set(host, (hostCounts.get(host) ?? 0) + 1);

    const rightTime = sorted[right].eventTime?.getTime() ?? 0;
    while ((sorted[left].eventTime?.getTime() ?? 0) < rightTime - windowMs) {
      const leftHost = sorted[left].destHost ?? "";
      const remaining = (hostCounts.get(leftHost) ?? 1) - 1;
      if (remaining === 0) hostCounts.delete(leftHost);
      else hostCounts.set(leftHost, remaining);
      left++;
    }

    if (hostCounts.size > best.distinctHosts) {
      best = { distinctHosts: hostCounts.size, events: sorted.slice(left, right + 1) };
    }
  }
  return best;
}

/**
 * Flags a user whose distinct destination hosts inside a sliding window
 * exceed the threshold. Typical of scanning or staging for exfiltration.
 */
export const userManyDestinations: DetectionRule = {
  name: "USER_MANY_DESTINATIONS",

  evaluate({ events, settings }) {
    const { threshold, windowMinutes } = settings.manyDestinations;
    const windowMs = windowMinutes * ONE_MINUTE_MS;

    const byUser = new Map<string, NormalizedEvent[]>();
    for (const event of events) {
      if (!event.userEmail || !event.destHost || !event.eventTime) continue;
      const list = byUser.get(event.userEmail) ?? [];
      list.push(event);
      byUser.set(event.userEmail, list);
    }

    const findings: FindingDraft[] = [];
    for (const user of [...byUser.keys()].sort(compareStrings)) {
      const sorted = [...(byUser.get(user) ?? [])].sort(
        (a, b) => (a.eventTime?.getTime() ?? 0) - (b.eventTime?.getTime() ?? 0),
      );
      const peak = peakWindow(sorted, windowMs);
      if (peak.distinctHosts <= threshold) continue;

      const severity: Severity = peak.distinctHosts >= threshold * 2 ? "high" : "medium";
      const evidence: Evidence = {
        user_email: user,
        distinct_dest_hosts: peak.distinctHosts,
        threshold,
        window_minutes: windowMinutes,
        dest_hosts: distinct(peak.events.map((e) => e.destHost)),
        client_ips: distinct(peak.events.map((e) => e.clientIp)),
        ...timeSpan(peak.events),
        event_ids: evidenceEventIds(peak.events),
      };

      findings.push({
        patternName: "USER_MANY_DESTINATIONS",
        severity,
        confidence: calcConfidence(severity, evidence, [
          { weight: 0.25, value: peak.distinctHosts, threshold, capMultiple: 4 },
        ]),
        title: `${user} contacted ${peak.distinctHosts} destinations in ${windowMinutes} minutes`,
        summary:
          `${user} reached ${peak.distinctHosts} distinct destination hosts within a ` +
          `${windowMinutes}-minute window (threshold ${threshold}). This fan-out is ` +
          `consistent with scanning or staging for exfiltration.`,
        evidence,
      });
    }
    return findings;
  },
};
