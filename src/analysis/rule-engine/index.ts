import type { DetectionRule, DetectionScope, Finding } from "@/analysis/types";
import type { DetectionSettings } from "@/lib/config";
import { SEVERITY_RANK } from "@/lib/constants";
import { RuleEvaluationError } from "@/lib/errors";
import type { FindingInput, RecordStore } from "@/lib/store/types";
import { burstFromSingleIp } from "./rules/burst";
import { offHoursAccess } from "./rules/off-hours";
import { userManyDestinations } from "./rules/many-destinations";
import { threatCategorySpike } from "./rules/category-spike";
import { repeatedBlockedThreatCategory } from "./rules/repeated-blocked";
import { topBlockedDestHost } from "./rules/top-blocked-host";
import { endpointCompromiseMultiCategory } from "./rules/multi-category";
import { c2BeaconingSuspected } from "./rules/c2-beaconing";
import { phishToPayloadChain } from "./rules/phish-chain";
import { computeFingerprint } from "./utils";

/**
 * All detection rules, in evaluation order. Built once at load.
 */
export const DETECTION_RULES: readonly DetectionRule[] = Object.freeze([
  burstFromSingleIp,
  offHoursAccess,
  userManyDestinations,
  threatCategorySpike,
  repeatedBlockedThreatCategory,
  topBlockedDestHost,
  endpointCompromiseMultiCategory,
  c2BeaconingSuspected,
  phishToPayloadChain,
]);

export interface RuleRunResult {
  findings: FindingInput[];
  failures: RuleEvaluationError[];
}

/**
 * Evaluate every rule against one upload's scope.
 * A throwing rule is logged and skipped; the others still run.
 */
export function evaluateRules(
  scope: DetectionScope,
  rules: readonly DetectionRule[] = DETECTION_RULES,
): RuleRunResult {
  const findings: FindingInput[] = [];
  const failures: RuleEvaluationError[] = [];

  for (const rule of rules) {
    try {
      for (const draft of rule.evaluate(scope)) {
        findings.push({ ...draft, fingerprint: computeFingerprint(draft.patternName, draft.evidence) });
      }
    } catch (error) {
      const failure = new RuleEvaluationError(rule.name, error);
      console.error(`[Detect] ${failure.message}`);
      failures.push(failure);
    }
  }

  return { findings, failures };
}

/**
 * Presentation order: severity rank, then confidence desc, then creation order.
 */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(
    (a, b) =>
      SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
      b.confidence - a.confidence ||
      a.sequence - b.sequence,
  );
}

/**
 * Evaluate all rules over an upload's stored events and rollups and append
 * the resulting findings. Returns the created findings in creation order.
 */
export async function runRuleEngine(
  store: RecordStore,
  uploadId: string,
  settings: DetectionSettings,
  rules: readonly DetectionRule[] = DETECTION_RULES,
): Promise<Finding[]> {
  const started = Date.now();
  const [events, rollups] = await Promise.all([
    store.listEvents(uploadId),
    store.listRollups(uploadId),
  ]);

  const { findings, failures } = evaluateRules({ uploadId, events, rollups, settings }, rules);
  const created = findings.length > 0 ? await store.appendFindings(uploadId, findings) : [];

  console.log(
    `[Detect] Upload ${uploadId}: ${created.length} findings from ${rules.length - failures.length}/` +
      `${rules.length} rules over ${events.length} events in ${Date.now() - started}ms`,
  );
  return created;
}
