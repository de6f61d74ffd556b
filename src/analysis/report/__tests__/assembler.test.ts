import { describe, it, expect, vi } from "vitest";
import { ReportAssembler } from "../assembler";
import { DEGRADED_NARRATIVE_GAP } from "../gaps";
import type { NarrativeRequest, ReasoningCollaborator } from "@/analysis/llm";
import { MemoryStore } from "@/lib/store/memory";
import { CollaboratorError, NoFindingsError } from "@/lib/errors";
import { makeDraft } from "@/analysis/__tests__/helpers";
import { recomputeFeatures } from "@/analysis/features";

const OPTIONS = { timeoutMs: 50, sampleEvents: 10 };

/** Store with one ingested upload and two findings about the same client IP. */
async function seededStore() {
  const store = new MemoryStore();
  const job = await store.createJob("upload-1");
  await store.transitionJob(job.id, "running");
  await store.appendEventBatch(
    job.id,
    [
      makeDraft({
        eventTime: new Date("2024-03-01T12:01:00Z"),
        clientIp: "10.0.0.5",
        userEmail: "alice@corp.test",
        destHost: "c2.bad.test",
        action: "Blocked",
        threatCategory: "Botnet",
        raw: "user=alice@corp.test src=10.0.0.5 host=c2.bad.test token=abc123",
      }),
      makeDraft({
        eventTime: new Date("2024-03-01T12:04:00Z"),
        clientIp: "10.0.0.5",
        destHost: "c2.bad.test",
        action: "Blocked",
        threatCategory: "Botnet",
      }),
    ],
    1,
  );
  await store.transitionJob(job.id, "done");
  await recomputeFeatures(store, "upload-1");

  const eventIds = (await store.listEvents("upload-1")).map((e) => e.id);
  const findings = await store.appendFindings("upload-1", [
    {
      patternName: "C2_BEACONING_SUSPECTED",
      severity: "high",
      confidence: 0.8,
      title: "C2 beaconing suspected",
      summary: "10.0.0.5 repeatedly called c2.bad.test.",
      evidence: { client_ip: "10.0.0.5", dest_host: "c2.bad.test", event_ids: eventIds },
      fingerprint: "fp-c2",
    },
    {
      patternName: "BURST_FROM_SINGLE_IP",
      severity: "medium",
      confidence: 0.6,
      title: "Burst from single IP",
      summary: "10.0.0.5 sent a burst of requests.",
      evidence: { client_ip: "10.0.0.5", event_ids: [eventIds[0]] },
      fingerprint: "fp-burst",
    },
  ]);
  return { store, findingIds: findings.map((f) => f.id) };
}

function collaborator(draft: ReasoningCollaborator["draftNarrative"]): ReasoningCollaborator {
  return { draftNarrative: vi.fn(draft) };
}

describe("ReportAssembler", () => {
  it("rejects an upload without findings", async () => {
    const store = new MemoryStore();
    const assembler = new ReportAssembler(store, collaborator(async () => ({})), OPTIONS);

    await expect(assembler.generate("upload-1")).rejects.toBeInstanceOf(NoFindingsError);
  });

  it("falls back to templates when the collaborator hangs past the timeout", async () => {
    const { store } = await seededStore();
    const hung = collaborator(() => new Promise<unknown>(() => {}));
    const assembler = new ReportAssembler(store, hung, OPTIONS);

    const report = await assembler.generate("upload-1");

    expect(report.summary).toMatch(/^Upload upload-1: 2 findings over 2 events grouped into 1 incident\./);
    expect(report.gaps.at(-1)).toBe(DEGRADED_NARRATIVE_GAP);
    expect(report.incidents[0].why).toEqual([
      "10.0.0.5 repeatedly called c2.bad.test.",
      "10.0.0.5 sent a burst of requests.",
    ]);
  });

  it("falls back when the collaborator is unavailable", async () => {
    const { store } = await seededStore();
    const unavailable = collaborator(async () => {
      throw new CollaboratorError("unavailable", "No LLM provider is configured");
    });

    const report = await new ReportAssembler(store, unavailable, OPTIONS).generate("upload-1");
    expect(report.gaps).toContain(DEGRADED_NARRATIVE_GAP);
    expect(report.summary).not.toBe("");
  });

  it("falls back when the response does not match the report schema", async () => {
    const { store } = await seededStore();
    const malformed = collaborator(async () => ({ summary: "", incidents: "none" }));

    const report = await new ReportAssembler(store, malformed, OPTIONS).generate("upload-1");
    expect(report.gaps.at(-1)).toBe(DEGRADED_NARRATIVE_GAP);
    expect(report.incidents).toHaveLength(1);
  });

  it("treats an unexpected collaborator exception as a degraded narrative", async () => {
    const { store } = await seededStore();
    const broken = collaborator(async () => {
      throw new TypeError("cannot read properties of undefined");
    });

    const report = await new ReportAssembler(store, broken, OPTIONS).generate("upload-1");
    expect(report.gaps.at(-1)).toBe(DEGRADED_NARRATIVE_GAP);
  });

  it("merges a valid narrative while keeping structure deterministic", async () => {
    const { store, findingIds } = await seededStore();
    const drafting = collaborator(async (request: NarrativeRequest) => ({
      summary: "  Host 10.0.0.5 is beaconing to c2.bad.test.  ",
      timeline: [],
      incidents: [
        {
          title: "Beaconing from 10.0.0.5",
          severity: "critical",
          confidence: 0.99,
          confirmed: true,
          security_outcomes: ["C2_BEACONING_SUSPECTED", "C2_BEACONING_SUSPECTED"],
          affected_entities: {},
          evidence_finding_ids: [request.findings[0].id],
          evidence_event_ids: [],
          why: ["Callbacks every few minutes"],
          recommended_actions: [],
        },
      ],
      iocs: { domains: ["invented.test"], urls: [], ips: [], users: [] },
      gaps: ["No EDR telemetry was provided."],
    }));

    const report = await new ReportAssembler(store, drafting, OPTIONS).generate("upload-1");
    const [incident] = report.incidents;

    expect(report.summary).toBe("Host 10.0.0.5 is beaconing to c2.bad.test.");
    expect(incident.title).toBe("Beaconing from 10.0.0.5");
    expect(incident.why).toEqual(["Callbacks every few minutes"]);
    expect(incident.security_outcomes).toEqual(["C2_BEACONING_SUSPECTED"]);
    expect(incident.severity).toBe("high");
    expect(incident.evidence_finding_ids).toEqual(findingIds);
    expect(incident.recommended_actions[0]).toBe(
      "Isolate the endpoint and capture volatile memory if possible",
    );
    expect(report.iocs.domains).toEqual(["c2.bad.test"]);
    expect(report.gaps.at(-1)).toBe("No EDR telemetry was provided.");
    expect(report.gaps).not.toContain(DEGRADED_NARRATIVE_GAP);
  });

  it("sends redacted sampled events and upload metadata", async () => {
    const { store } = await seededStore();
    const draft = vi.fn(async (_request: NarrativeRequest) => ({}));
    await new ReportAssembler(store, { draftNarrative: draft }, OPTIONS).generate("upload-1");

    const [request] = draft.mock.calls[0];
    expect(request.upload).toMatchObject({ upload_id: "upload-1", total_events: 2, bad_lines: 1 });
    expect(request.findings.map((f) => f.pattern_name)).toEqual([
      "C2_BEACONING_SUSPECTED",
      "BURST_FROM_SINGLE_IP",
    ]);
    expect(request.sampled_events).toHaveLength(2);
    expect(request.sampled_events[0].raw).toBe(
      "user=alice@corp.test src=10.0.0.5 host=c2.bad.test token=[REDACTED]",
    );
  });

  it("runs one narrative request at a time", async () => {
    const { store } = await seededStore();
    let inFlight = 0;
    let maxInFlight = 0;
    const slow = collaborator(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return {};
    });
    const assembler = new ReportAssembler(store, slow, OPTIONS);

    await Promise.all([assembler.generate("upload-1"), assembler.generate("upload-1")]);
    expect(maxInFlight).toBe(1);
  });
});
