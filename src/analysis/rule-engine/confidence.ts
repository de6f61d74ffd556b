import type { Evidence, Severity } from "@/analysis/types";

/** Starting confidence per severity before evidence strength is added */
export const SEVERITY_PRIOR: Record<Severity, number> = {
  critical: 0.72,
  high: 0.62,
  medium: 0.5,
  low: 0.38,
};

/** Single-valued entity fields that each add a small boost when present */
const ENTITY_FIELDS = ["user_email", "client_ip", "dest_host", "threat_category"] as const;
const ENTITY_BOOST = 0.03;

export interface StrengthTerm {
  weight: number;
  value: number;
  threshold: number;
  /** Multiple of the threshold at which the term saturates */
  capMultiple: number;
}

export function clamp(x: number, lo = 0, hi = 1): number {
  return Math.max(lo, Math.min(hi, x));
}

/** How far `value` sits above `threshold`, scaled to 0..1 at `capMultiple × threshold`. */
export function ratioScore(value: number, threshold: number, capMultiple = 3): number {
  if (threshold <= 0) return 0;
  return clamp((value - threshold) / (threshold * Math.max(capMultiple - 1, 1e-9)));
}

/**
 * Confidence from a severity prior, entity completeness and pattern strength.
 * Result is rounded to three decimals and kept within [0.10, 0.99].
 */
export function calcConfidence(
  severity: Severity,
  evidence: Evidence,
  terms: readonly StrengthTerm[],
  bonus = 0,
): number {
  let confidence = SEVERITY_PRIOR[severity] + bonus;

  for (const field of ENTITY_FIELDS) {
    const value = evidence[field];
    if (typeof value === "string" && value !== "") confidence += ENTITY_BOOST;
  }
  for (const term of terms) {
    confidence += term.weight * ratioScore(term.value, term.threshold, term.capMultiple);
  }

  return Math.round(clamp(confidence, 0.1, 0.99) * 1000) / 1000;
}
