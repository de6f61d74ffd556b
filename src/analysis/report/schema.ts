import { z } from "zod/v4";
import { SECURITY_OUTCOMES, SEVERITY_ORDER } from "@/lib/constants";
import { ValidationError } from "@/lib/errors";

const ids = z.array(z.string());
const strings = z.array(z.string());

export const timelineItemSchema = z.object({
  ts_start: z.string(),
  ts_end: z.string(),
  label: z.string(),
  evidence_finding_ids: ids,
  evidence_event_ids: ids,
});

export const incidentSchema = z.object({
  title: z.string().trim().min(1),
  severity: z.enum(SEVERITY_ORDER),
  confidence: z.number().min(0).max(1),
  confirmed: z.boolean(),
  security_outcomes: z.array(z.enum(SECURITY_OUTCOMES)),
  affected_entities: z.object({
    user_emails: strings.default([]),
    client_ips: strings.default([]),
    dest_hosts: strings.default([]),
    threat_categories: strings.default([]),
  }),
  evidence_finding_ids: ids.min(1),
  evidence_event_ids: ids,
  why: strings,
  recommended_actions: strings,
});

export const socReportSchema = z.object({
  summary: z.string().trim().min(1),
  timeline: z.array(timelineItemSchema),
  incidents: z.array(incidentSchema),
  iocs: z.object({ domains: strings, urls: strings, ips: strings, users: strings }),
  gaps: strings,
});

export type NarrativeReport = z.infer<typeof socReportSchema>;

/**
 * Validate a collaborator response against the report shape. Every finding id
 * it cites must be one of `knownFindingIds`.
 */
export function validateNarrative(
  raw: unknown,
  knownFindingIds: ReadonlySet<string>,
): NarrativeReport {
  const result = socReportSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError("Narrative response does not match the report schema", result.error.issues);
  }

  const cited = [
    ...result.data.incidents.flatMap((i) => i.evidence_finding_ids),
    ...result.data.timeline.flatMap((t) => t.evidence_finding_ids),
  ];
  const unknown = [...new Set(cited.filter((id) => !knownFindingIds.has(id)))];
  if (unknown.length > 0) {
    throw new ValidationError(`Narrative cites unknown finding ids: ${unknown.join(", ")}`);
  }
  return result.data;
}
