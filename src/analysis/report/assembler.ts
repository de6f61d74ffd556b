import type { Finding, Incident, NormalizedEvent, SocReport, UploadFeatures } from "@/analysis/types";
import type { NarrativeRequest, ReasoningCollaborator, SampledEvent } from "@/analysis/llm";
import { redact } from "@/analysis/llm/redact";
import { computeFeatures } from "@/analysis/features";
import { sortFindings } from "@/analysis/rule-engine";
import { CollaboratorError, NoFindingsError, ValidationError, describeError } from "@/lib/errors";
import type { RecordStore } from "@/lib/store/types";
import { templateSummary } from "./fallback";
import { DEGRADED_NARRATIVE_GAP, detectGaps } from "./gaps";
import { dedupeFindings, synthesizeIncidents, type IncidentCluster } from "./incidents";
import { extractIocs } from "./iocs";
import { validateNarrative, type NarrativeReport } from "./schema";
import { buildTimeline } from "./timeline";

export interface ReportAssemblerOptions {
  /** Upper bound on one narrative request, including the model's own retries */
  timeoutMs: number;
  /** Raw events sent along with the findings */
  sampleEvents: number;
}

/** Settle with `work`, or reject once `signal` fires, whichever comes first. */
function withDeadline<T>(work: Promise<T>, signal: AbortSignal, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () =>
      reject(new CollaboratorError("timeout", `Narrative request exceeded ${timeoutMs}ms`));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function toSampledEvent(event: NormalizedEvent): SampledEvent {
  return {
    id: event.id,
    event_time: event.eventTime?.toISOString() ?? null,
    user_email: event.userEmail,
    client_ip: event.clientIp,
    dest_host: event.destHost,
    url: event.url,
    action: event.action,
    threat_category: event.threatCategory,
    threat_name: event.threatName,
    raw: redact(event.raw),
  };
}

/** Events linked by the incidents, in incident order; the upload head when none are linked. */
export function sampleEvents(
  clusters: readonly IncidentCluster[],
  events: readonly NormalizedEvent[],
  limit: number,
): SampledEvent[] {
  const byId = new Map(events.map((e) => [e.id, e]));
  const linked = new Set(clusters.flatMap((c) => c.incident.evidence_event_ids));
  const picked = [...linked].flatMap((id) => byId.get(id) ?? []);
  return (picked.length > 0 ? picked : events).slice(0, limit).map(toSampledEvent);
}

function overlap(a: readonly string[], b: readonly string[]): number {
  const set = new Set(a);
  return b.filter((id) => set.has(id)).length;
}

/**
 * Take the collaborator's summary, extra gaps and, for each incident, the
 * narrative fields of the proposed incident sharing the most finding ids.
 * Structure (timeline, IOCs, scores, entities) stays deterministic.
 */
export function mergeNarrative(base: SocReport, narrative: NarrativeReport): SocReport {
  const incidents = base.incidents.map((incident): Incident => {
    let best: NarrativeReport["incidents"][number] | null = null;
    let bestOverlap = 0;
    for (const proposed of narrative.incidents) {
      const shared = overlap(incident.evidence_finding_ids, proposed.evidence_finding_ids);
      if (shared > bestOverlap) {
        best = proposed;
        bestOverlap = shared;
      }
    }
    if (!best) return incident;

    return {
      ...incident,
      title: best.title.trim(),
      why: best.why.length > 0 ? best.why : incident.why,
      recommended_actions:
        best.recommended_actions.length > 0 ? best.recommended_actions : incident.recommended_actions,
      security_outcomes:
        best.security_outcomes.length > 0
          ? [...new Set(best.security_outcomes)]
          : incident.security_outcomes,
    };
  });

  const extraGaps = narrative.gaps.filter((gap) => gap.trim() !== "" && !base.gaps.includes(gap));
  return {
    ...base,
    summary: narrative.summary.trim(),
    incidents,
    gaps: [...base.gaps, ...extraGaps],
  };
}

/**
 * Builds SOC reports. Everything structural is derived from stored findings
 * and events; the reasoning collaborator only rewrites narrative text, and
 * any collaborator failure leaves the templated text in place plus a gap
 * note.
 *
 * Narrative requests are serialized through a single slot so a slow model
 * cannot fan out; each request is bounded by `timeoutMs`.
 */
export class ReportAssembler {
  private slotTaken = false;
  private readonly slotQueue: (() => void)[] = [];

  constructor(
    private readonly store: RecordStore,
    private readonly collaborator: ReasoningCollaborator,
    private readonly options: ReportAssemblerOptions,
  ) {}

  async generate(uploadId: string): Promise<SocReport> {
    const started = Date.now();
    const stored = await this.store.listFindings(uploadId);
    if (stored.length === 0) throw new NoFindingsError(uploadId);

    const [events, storedFeatures, job] = await Promise.all([
      this.store.listEvents(uploadId),
      this.store.getFeatures(uploadId),
      this.store.latestJobForUpload(uploadId),
    ]);
    const findings = sortFindings(dedupeFindings(stored));
    const eventsById = new Map(events.map((e) => [e.id, e]));
    const clusters = synthesizeIncidents(findings);
    const incidents = clusters.map((c) => c.incident);

    const report: SocReport = {
      summary: templateSummary(incidents, {
        uploadId,
        totalEvents: events.length,
        findingCount: findings.length,
      }),
      timeline: buildTimeline(clusters, eventsById),
      incidents,
      iocs: extractIocs(clusters, eventsById),
      gaps: detectGaps({ events, findings, badLines: job?.badLines ?? 0 }),
    };

    const features = storedFeatures ?? computeFeatures(uploadId, events, new Date());
    const request = this.buildRequest(features, job?.badLines ?? 0, findings, clusters, events);

    try {
      const narrative = await this.requestNarrative(request, new Set(findings.map((f) => f.id)));
      console.log(
        `[Report] Upload ${uploadId}: ${incidents.length} incidents with drafted narrative in ${Date.now() - started}ms`,
      );
      return mergeNarrative(report, narrative);
    } catch (error) {
      if (!(error instanceof CollaboratorError || error instanceof ValidationError)) throw error;
      console.warn(`[Report] Upload ${uploadId}: narrative unavailable, using templates:`, error.message);
      return { ...report, gaps: [...report.gaps, DEGRADED_NARRATIVE_GAP] };
    }
  }

  private buildRequest(
    features: UploadFeatures,
    badLines: number,
    findings: readonly Finding[],
    clusters: readonly IncidentCluster[],
    events: readonly NormalizedEvent[],
  ): NarrativeRequest {
    return {
      upload: {
        upload_id: features.uploadId,
        total_events: features.totalEvents,
        bad_lines: badLines,
        time_range: features.timeRange,
        actions: features.actions,
        top_threat_categories: features.topThreatCategories,
      },
      findings: findings.map((f) => ({
        id: f.id,
        pattern_name: f.patternName,
        severity: f.severity,
        confidence: f.confidence,
        title: f.title,
        summary: f.summary,
        evidence: f.evidence,
      })),
      incidents: clusters.map((c) => c.incident),
      sampled_events: sampleEvents(clusters, events, this.options.sampleEvents),
    };
  }

  private async requestNarrative(
    request: NarrativeRequest,
    knownFindingIds: ReadonlySet<string>,
  ): Promise<NarrativeReport> {
    await this.acquireSlot();
    const signal = AbortSignal.timeout(this.options.timeoutMs);
    try {
      const raw = await withDeadline(
        this.collaborator.draftNarrative(request, signal),
        signal,
        this.options.timeoutMs,
      );
      return validateNarrative(raw, knownFindingIds);
    } catch (error) {
      if (error instanceof CollaboratorError || error instanceof ValidationError) throw error;
      throw new CollaboratorError("failed", describeError(error), { cause: error });
    } finally {
      this.releaseSlot();
    }
  }

  private acquireSlot(): Promise<void> {
    if (!this.slotTaken) {
      this.slotTaken = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.slotQueue.push(resolve));
  }

  private releaseSlot(): void {
    const next = this.slotQueue.shift();
    if (next) {
      next(); // hand the slot to the next waiter
    } else {
      this.slotTaken = false;
    }
  }
}
