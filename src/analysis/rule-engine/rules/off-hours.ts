import type {
  DetectionRule,
  Evidence,
  FindingDraft,
  NormalizedEvent,
  Severity,
} from "@/analysis/types";
import { calcConfidence } from "../confidence";
import { compareStrings, distinct, evidenceEventIds, isBlocked, timeSpan } from "../utils";

function isWorkingHour(hour: number, start: number, end: number): boolean {
  // A window such as 22–06 wraps past midnight
  return start <= end ? hour >= start && hour < end : hour >= start || hour < end;
}

function pad(hour: number): string {
  return String(hour).padStart(2, "0");
}

/**
 * Flags users whose traffic is mostly within working hours but who also
 * show a handful of off-hours events. Users with fewer timestamped events
 * than the minimum sample are ignored, and so are users who are mostly
 * active off-hours (their normal is the night shift).
 */
export const offHoursAccess: DetectionRule = {
  name: "OFF_HOURS_ACCESS",

  evaluate({ events, settings }) {
    const { startHour, endHour, minSample, minEvents, maxRatio } = settings.offHours;

    const byUser = new Map<string, NormalizedEvent[]>();
    for (const event of events) {
      if (!event.userEmail || !event.eventTime) continue;
      const list = byUser.get(event.userEmail) ?? [];
      list.push(event);
      byUser.set(event.userEmail, list);
    }

    const findings: FindingDraft[] = [];
    for (const user of [...byUser.keys()].sort(compareStrings)) {
      const userEvents = byUser.get(user) ?? [];
      if (userEvents.length < minSample) continue;

      const offHours = userEvents.filter(
        (e) => e.eventTime !== null && !isWorkingHour(e.eventTime.getUTCHours(), startHour, endHour),
      );
      const ratio = offHours.length / userEvents.length;
      if (offHours.length < minEvents || ratio > maxRatio) continue;

      const risky = offHours.some((e) => isBlocked(e.action) || e.threatCategory !== null);
      const severity: Severity = risky ? "high" : "medium";
      const evidence: Evidence = {
        user_email: user,
        total_events: userEvents.length,
        off_hours_events: offHours.length,
        off_hours_ratio: Math.round(ratio * 1000) / 1000,
        working_hours: `${pad(startHour)}:00-${pad(endHour)}:00 UTC`,
        client_ips: distinct(offHours.map((e) => e.clientIp)),
        dest_hosts: distinct(offHours.map((e) => e.destHost)),
        ...timeSpan(offHours),
        event_ids: evidenceEventIds(offHours),
      };

      findings.push({
        patternName: "OFF_HOURS_ACCESS",
        severity,
        confidence: calcConfidence(severity, evidence, [
          { weight: 0.2, value: offHours.length, threshold: minEvents, capMultiple: 6 },
        ]),
        title: `Off-hours activity by ${user}`,
        summary:
          `${user} generated ${offHours.length} of ${userEvents.length} events outside ` +
          `working hours (${evidence.working_hours})` +
          (risky ? ", including blocked or threat-categorized traffic." : "."),
        evidence,
      });
    }
    return findings;
  },
};
