import { describe, it, expect, vi } from "vitest";
import { Readable } from "stream";
import { SocCore } from "../pipeline";
import { createReasoningCollaborator } from "../llm";
import { DEGRADED_NARRATIVE_GAP } from "../report/gaps";
import { defaultSettings, type Settings } from "@/lib/config";
import { MemoryStore } from "@/lib/store/memory";
import type { BlobSource } from "@/lib/storage";
import {
  IngestNotReadyError,
  JobConflictError,
  NoFindingsError,
  NotFoundError,
} from "@/lib/errors";
import type { AnalysisEvent } from "@/lib/analysis-events";
import { streamOf } from "./helpers";

// ── Helpers ──────────────────────────────────────────────
function settings(): Settings {
  const base = defaultSettings();
  return { ...base, ingest: { batchSize: 25 } };
}

/** 60 requests from one client inside a single minute, plus one corrupt line. */
function burstLines(): string[] {
  const lines = Array.from({ length: 60 }, (_, i) => {
    const second = String(i).padStart(2, "0");
    return (
      `time=2024-03-01T12:00:${second}Z src=10.0.0.9 host=site${i % 5}.test ` +
      `action=Allowed user=carol@corp.test`
    );
  });
  lines.splice(30, 0, "{broken");
  return lines;
}

function setup(blobs?: BlobSource) {
  const config = settings();
  const core = new SocCore({
    store: new MemoryStore(),
    settings: config,
    collaborator: createReasoningCollaborator(config.llm),
    blobs,
  });
  return core;
}

// ── Tests ────────────────────────────────────────────────
describe("SocCore", () => {
  it("rejects detection for an upload that was never ingested", async () => {
    const core = setup();

    await expect(core.runDetection("upload-9")).rejects.toThrow(
      "Upload upload-9 has not been ingested",
    );
  });

  it("ingests, detects and reports end to end", async () => {
    const core = setup();
    const events: AnalysisEvent[] = [];
    core.bus.subscribe("upload-9", (event) => events.push(event));

    const jobId = await core.submitIngest("upload-9", streamOf(burstLines()));
    const status = await core.waitForIngest(jobId);

    expect(status).toEqual({
      job_id: jobId,
      upload_id: "upload-9",
      status: "done",
      inserted_events: 60,
      bad_lines: 1,
    });
    expect(await core.getIngestStatus(jobId)).toEqual(status);
    expect((await core.getFeatures("upload-9"))?.totalEvents).toBe(60);
    await expect(core.generateReport("upload-9")).rejects.toBeInstanceOf(NoFindingsError);

    await expect(core.runDetection("upload-9")).resolves.toEqual({
      upload_id: "upload-9",
      status: "accepted",
    });
    const findingIds = await core.waitForDetection("upload-9");

    const findings = await core.listFindings("upload-9");
    expect(findings.map((f) => f.id)).toEqual(findingIds);
    expect(findings.map((f) => f.patternName)).toEqual(["BURST_FROM_SINGLE_IP"]);
    expect(events.filter((e) => e.type === "detection").map((e) => e.status)).toEqual([
      "running",
      "done",
    ]);

    const report = await core.generateReport("upload-9");
    expect(report.summary).toMatch(
      /^Upload upload-9: 1 finding over 60 events grouped into 1 incident\./,
    );
    expect(report.gaps).toContain("1 input lines could not be parsed and were skipped.");
    expect(report.gaps.at(-1)).toBe(DEGRADED_NARRATIVE_GAP);
    expect(report.iocs).toEqual({
      domains: ["site0.test", "site1.test", "site2.test", "site3.test", "site4.test"],
      urls: [],
      ips: ["10.0.0.9"],
      users: ["carol@corp.test"],
    });
  });

  it("appends on re-run but reports duplicates once", async () => {
    const core = setup();
    const jobId = await core.submitIngest("upload-9", streamOf(burstLines()));
    await core.waitForIngest(jobId);

    await core.runDetection("upload-9");
    const first = await core.waitForDetection("upload-9");
    await core.runDetection("upload-9");
    const second = await core.waitForDetection("upload-9");

    expect(second).not.toEqual(first);
    expect(await core.listFindings("upload-9")).toHaveLength(2);

    const report = await core.generateReport("upload-9");
    expect(report.incidents).toHaveLength(1);
    expect(report.incidents[0].evidence_finding_ids).toEqual(first);
  });

  it("rejects detection while the latest ingest job has failed", async () => {
    const core = setup();
    const input = new Readable({ read() {} });
    const jobId = await core.submitIngest("upload-9", input);
    setImmediate(() => input.destroy(new Error("disk gone")));

    expect((await core.waitForIngest(jobId)).status).toBe("failed");
    const error = await core.runDetection("upload-9").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(IngestNotReadyError);
    expect(error).toMatchObject({ status: "failed" });
  });

  it("rejects detection while ingestion is still running", async () => {
    const core = setup();
    const input = new Readable({ read() {} });
    const jobId = await core.submitIngest("upload-9", input);

    const error = await core.runDetection("upload-9").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(IngestNotReadyError);
    expect(error).toMatchObject({ status: "running" });

    input.push(burstLines().join("\n") + "\n");
    input.push(null);
    expect((await core.waitForIngest(jobId)).status).toBe("done");
    await expect(core.runDetection("upload-9")).resolves.toMatchObject({ status: "accepted" });
    await core.waitForDetection("upload-9");
  });

  it("ingests from the configured blob source", async () => {
    const open = vi.fn(async () => streamOf(burstLines()));
    const core = setup({ open });

    const jobId = await core.ingestFromStorage("upload-9", "uploads/upload-9.log");

    expect(open).toHaveBeenCalledWith("uploads/upload-9.log");
    expect((await core.waitForIngest(jobId)).inserted_events).toBe(60);
  });

  it("closes the opened blob when the upload already has an active job", async () => {
    const opened = new Readable({ read() {} });
    const core = setup({ open: async () => opened });
    const active = new Readable({ read() {} });
    const jobId = await core.submitIngest("upload-9", active);

    await expect(core.ingestFromStorage("upload-9", "uploads/upload-9.log")).rejects.toBeInstanceOf(
      JobConflictError,
    );
    expect(opened.destroyed).toBe(true);

    active.push(null);
    await core.waitForIngest(jobId);
  });

  it("has no detection result for an upload it never ran", async () => {
    await expect(setup().waitForDetection("upload-9")).rejects.toBeInstanceOf(NotFoundError);
  });
});
