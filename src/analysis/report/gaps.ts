import type { Finding, NormalizedEvent } from "@/analysis/types";
import { linkedEventIds } from "./evidence";

export const DEGRADED_NARRATIVE_GAP =
  "Narrative text was generated from templates because the reasoning service was unavailable or returned an invalid response.";

const DNS_HINT = /\bdns\b/i;

export interface GapInput {
  events: readonly NormalizedEvent[];
  findings: readonly Finding[];
  badLines: number;
}

function hasDnsTelemetry(events: readonly NormalizedEvent[]): boolean {
  return events.some(
    (e) =>
      (e.urlCategory !== null && DNS_HINT.test(e.urlCategory)) ||
      (e.vendor !== null && DNS_HINT.test(e.vendor)) ||
      (e.url !== null && e.url.toLowerCase().startsWith("dns:")),
  );
}

/** Heuristic notes on what the upload cannot show. */
export function detectGaps({ events, findings, badLines }: GapInput): string[] {
  const gaps: string[] = [];

  if (!hasDnsTelemetry(events)) {
    gaps.push("No DNS telemetry in this upload; name resolutions behind the proxied requests cannot be confirmed.");
  }
  if (!events.some((e) => e.serverIp !== null)) {
    gaps.push("No server-side telemetry (destination server addresses) is present; only proxy-side views are available.");
  }

  const untimed = events.filter((e) => e.eventTime === null).length;
  if (untimed > 0) {
    gaps.push(`${untimed} of ${events.length} events have no parseable timestamp and are missing from time-based detections.`);
  }
  if (badLines > 0) {
    gaps.push(`${badLines} input lines could not be parsed and were skipped.`);
  }

  const anonymous = events.filter((e) => e.userEmail === null).length;
  if (events.length > 0 && anonymous === events.length) {
    gaps.push("No user identity is present in any event; activity can only be attributed to client IPs.");
  } else if (anonymous > 0) {
    gaps.push(`${anonymous} of ${events.length} events carry no user identity.`);
  }

  const known = new Set(events.map((e) => e.id));
  const unlinked = findings.filter((f) => !linkedEventIds(f.evidence).some((id) => known.has(id)));
  if (unlinked.length > 0) {
    gaps.push(`${unlinked.length} findings link to no stored events and rest on aggregate counts only.`);
  }

  return gaps;
}
