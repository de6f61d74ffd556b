import type {
  AffectedEntities,
  Finding,
  Incident,
  PatternName,
  SecurityOutcome,
} from "@/analysis/types";
import { SECURITY_OUTCOMES, SEVERITY_RANK } from "@/lib/constants";
import { sortFindings } from "@/analysis/rule-engine";
import { CATEGORY_FIELD, ENTITY_FIELDS, entityValues, evidenceString, linkedEventIds } from "./evidence";
import { templateActions, templateWhy } from "./fallback";

/** Incident confidence never drops more than this below its strongest finding. */
export const CONFIDENCE_MARGIN = 0.15;
const PATTERN_BONUS = 0.02;
const CONFIRMED_CONFIDENCE = 0.9;

const PATTERN_OUTCOMES: Partial<Record<PatternName, SecurityOutcome>> = {
  ENDPOINT_COMPROMISE_MULTI_CATEGORY: "SUSPECTED_ENDPOINT_COMPROMISE_MULTI_STAGE",
  C2_BEACONING_SUSPECTED: "C2_BEACONING_SUSPECTED",
  PHISH_TO_PAYLOAD_CHAIN_SUSPECTED: "PHISH_TO_PAYLOAD_CHAIN_SUSPECTED",
};

const CATEGORY_OUTCOMES: ReadonlyArray<[RegExp, SecurityOutcome]> = [
  [/data (loss|leakage|transfer)|exfil/i, "DATA_EXFILTRATION_ATTEMPT_SUSPECTED"],
  [/phish/i, "CREDENTIAL_HARVESTING_SUSPECTED"],
  [/ransomware/i, "RANSOMWARE_STAGING_SUSPECTED"],
  [/crypto ?min/i, "CRYPTOMINING_ACTIVITY_SUSPECTED"],
];

export interface IncidentCluster {
  incident: Incident;
  /** Member findings in presentation order */
  findings: Finding[];
}

function isOutcome(value: string): value is SecurityOutcome {
  return SECURITY_OUTCOMES.some((o) => o === value);
}

/**
 * Drop findings whose fingerprint was already produced by an earlier run,
 * keeping the first-created copy.
 */
export function dedupeFindings(findings: readonly Finding[]): Finding[] {
  const byFingerprint = new Map<string, Finding>();
  for (const finding of [...findings].sort((a, b) => a.sequence - b.sequence)) {
    if (!byFingerprint.has(finding.fingerprint)) byFingerprint.set(finding.fingerprint, finding);
  }
  return [...byFingerprint.values()];
}

/** Prefixed entity keys (`user:…`, `ip:…`, `host:…`, `category:…`) named by a finding. */
export function entityKeys(finding: Finding): string[] {
  return ENTITY_FIELDS.flatMap((field) =>
    entityValues(finding.evidence, field).map((value) => `${field.prefix}:${value}`),
  );
}

/**
 * Partition findings into groups that share at least one entity key,
 * transitively. A finding with no overlap forms its own group.
 */
export function groupFindings(findings: readonly Finding[]): Finding[][] {
  const parent = findings.map((_, i) => i);
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  const owner = new Map<string, number>();
  findings.forEach((finding, i) => {
    for (const key of entityKeys(finding)) {
      const other = owner.get(key);
      if (other === undefined) {
        owner.set(key, i);
      } else {
        parent[find(i)] = find(other);
      }
    }
  });

  const groups = new Map<number, Finding[]>();
  findings.forEach((finding, i) => {
    const root = find(i);
    const group = groups.get(root) ?? [];
    group.push(finding);
    groups.set(root, group);
  });
  return [...groups.values()];
}

/**
 * Weighted mean of member confidences (weight = severity rank² × confidence),
 * floored at the strongest member minus the margin, plus a small bonus per
 * additional distinct pattern. Capped at 1.
 */
export function combineConfidence(findings: readonly Finding[]): number {
  if (findings.length === 0) return 0;

  let weighted = 0;
  let totalWeight = 0;
  let max = 0;
  for (const f of findings) {
    const weight = SEVERITY_RANK[f.severity] ** 2 * f.confidence;
    weighted += weight * f.confidence;
    totalWeight += weight;
    max = Math.max(max, f.confidence);
  }

  const mean = totalWeight > 0 ? weighted / totalWeight : 0;
  const patterns = new Set(findings.map((f) => f.patternName)).size;
  const combined = Math.max(mean, max - CONFIDENCE_MARGIN) + PATTERN_BONUS * (patterns - 1);
  return Math.round(Math.min(1, combined) * 1000) / 1000;
}

export function outcomesFor(findings: readonly Finding[]): SecurityOutcome[] {
  const found = new Set<SecurityOutcome>();
  for (const f of findings) {
    const declared = evidenceString(f.evidence, "security_outcome");
    if (declared && isOutcome(declared)) found.add(declared);

    const byPattern = PATTERN_OUTCOMES[f.patternName];
    if (byPattern) found.add(byPattern);

    for (const category of entityValues(f.evidence, CATEGORY_FIELD)) {
      for (const [pattern, outcome] of CATEGORY_OUTCOMES) {
        if (pattern.test(category)) found.add(outcome);
      }
    }
  }
  found.delete("INSUFFICIENT_EVIDENCE");
  const ordered = SECURITY_OUTCOMES.filter((o) => found.has(o));
  return ordered.length > 0 ? ordered : ["INSUFFICIENT_EVIDENCE"];
}

function affectedEntities(findings: readonly Finding[]): AffectedEntities {
  const [users, ips, hosts, categories] = ENTITY_FIELDS.map((field) =>
    [...new Set(findings.flatMap((f) => entityValues(f.evidence, field)))].sort(),
  );
  return { user_emails: users, client_ips: ips, dest_hosts: hosts, threat_categories: categories };
}

function buildIncident(members: Finding[]): Incident {
  const [top] = members;
  const patterns = new Set(members.map((f) => f.patternName)).size;
  const maxConfidence = Math.max(...members.map((f) => f.confidence));
  const related = patterns - 1;

  return {
    title:
      related > 0
        ? `${top.title} (+${related} related ${related === 1 ? "pattern" : "patterns"})`
        : top.title,
    severity: top.severity,
    confidence: combineConfidence(members),
    confirmed: patterns >= 2 || maxConfidence >= CONFIRMED_CONFIDENCE,
    security_outcomes: outcomesFor(members),
    affected_entities: affectedEntities(members),
    evidence_finding_ids: members.map((f) => f.id),
    evidence_event_ids: [...new Set(members.flatMap((f) => linkedEventIds(f.evidence)))],
    why: templateWhy(members),
    recommended_actions: templateActions(members),
  };
}

/**
 * Collapse re-run duplicates, group the rest by shared entities and build one
 * incident per group. Narrative fields carry templated text until a
 * collaborator replaces them.
 *
 * Incidents are ordered by severity, then confidence, then the creation order
 * of their earliest finding.
 */
export function synthesizeIncidents(findings: readonly Finding[]): IncidentCluster[] {
  const clusters = groupFindings(dedupeFindings(findings)).map((group) => {
    const members = sortFindings(group);
    return {
      incident: buildIncident(members),
      findings: members,
      firstSequence: Math.min(...members.map((f) => f.sequence)),
    };
  });

  clusters.sort(
    (a, b) =>
      SEVERITY_RANK[b.incident.severity] - SEVERITY_RANK[a.incident.severity] ||
      b.incident.confidence - a.incident.confidence ||
      a.firstSequence - b.firstSequence,
  );
  return clusters.map(({ incident, findings: members }) => ({ incident, findings: members }));
}
