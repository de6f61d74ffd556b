import type { AffectedEntities, Finding, Incident } from "@/analysis/types";
import playbooks from "./playbooks.json";

const MAX_WHY = 7;
const MAX_ACTIONS = 12;
const ENTITIES_PER_KIND = 3;

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function uniq(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/** "Why" bullets straight from the findings' own summaries. */
export function templateWhy(findings: readonly Finding[]): string[] {
  return uniq(findings.map((f) => f.summary)).slice(0, MAX_WHY);
}

/** Playbook actions for every pattern in the group, in finding order. */
export function templateActions(findings: readonly Finding[]): string[] {
  const actions = uniq(findings.flatMap((f) => playbooks.patterns[f.patternName]));
  return (actions.length > 0 ? actions : playbooks.default).slice(0, MAX_ACTIONS);
}

export function describeEntities(entities: AffectedEntities): string {
  const parts: Array<[string, string[]]> = [
    ["users", entities.user_emails],
    ["client IPs", entities.client_ips],
    ["hosts", entities.dest_hosts],
  ];
  return parts
    .filter(([, values]) => values.length > 0)
    .map(([label, values]) => {
      const shown = values.slice(0, ENTITIES_PER_KIND).join(", ");
      const more = values.length - ENTITIES_PER_KIND;
      return `${label} ${shown}${more > 0 ? ` (+${more} more)` : ""}`;
    })
    .join("; ");
}

export interface SummaryContext {
  uploadId: string;
  totalEvents: number;
  findingCount: number;
}

/** Executive summary built only from counts and the top incident. */
export function templateSummary(incidents: readonly Incident[], context: SummaryContext): string {
  const sentences = [
    `Upload ${context.uploadId}: ${plural(context.findingCount, "finding")} over ` +
      `${plural(context.totalEvents, "event")} grouped into ${plural(incidents.length, "incident")}.`,
  ];

  const top = incidents[0];
  if (top) {
    sentences.push(
      `Highest priority: ${top.title} (${top.severity}, confidence ${top.confidence.toFixed(2)}).`,
    );
    const entities = describeEntities(top.affected_entities);
    if (entities) sentences.push(`Affected ${entities}.`);
  }

  const confirmed = incidents.filter((i) => i.confirmed).length;
  sentences.push(
    `${confirmed} of ${plural(incidents.length, "incident")} corroborated by multiple ` +
      `patterns or high-confidence evidence.`,
  );
  return sentences.join(" ");
}
