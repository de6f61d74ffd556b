import { describe, it, expect, vi } from "vitest";
import { LLMReasoningCollaborator, createReasoningCollaborator, type NarrativeRequest } from "../index";
import type { LLMClient } from "../client";
import { CollaboratorError, ValidationError } from "@/lib/errors";

// ── Helpers ──────────────────────────────────────────────
const request: NarrativeRequest = {
  upload: {
    upload_id: "upload-1",
    total_events: 10,
    bad_lines: 0,
    time_range: { start: null, end: null },
    actions: { blocked: 4, allowed: 6 },
    top_threat_categories: [],
  },
  findings: [],
  incidents: [],
  sampled_events: [],
};

function fakeClient(analyze: LLMClient["analyze"], available = true): LLMClient {
  return {
    analyze: vi.fn(analyze),
    isAvailable: () => available,
    providerName: () => "Fake",
  };
}

// ── Tests ────────────────────────────────────────────────
describe("LLMReasoningCollaborator", () => {
  it("reports unavailable when no provider is configured", async () => {
    const collaborator = createReasoningCollaborator({
      anthropicApiKey: null,
      openaiApiKey: null,
      timeoutMs: 1000,
      sampleEvents: 5,
    });

    await expect(
      collaborator.draftNarrative(request, new AbortController().signal),
    ).rejects.toMatchObject({ reason: "unavailable" });
  });

  it("parses a fenced JSON response", async () => {
    const client = fakeClient(async () => 'Here you go:\n```json\n{"summary": "ok"}\n```');
    const collaborator = new LLMReasoningCollaborator(client);

    await expect(
      collaborator.draftNarrative(request, new AbortController().signal),
    ).resolves.toEqual({ summary: "ok" });
    expect(client.analyze).toHaveBeenCalledWith(
      expect.stringContaining("SOC investigator"),
      expect.stringContaining("Produce a SOC report for upload upload-1."),
      expect.any(AbortSignal),
    );
  });

  it("classifies a failure after abort as a timeout", async () => {
    const controller = new AbortController();
    const client = fakeClient(async () => {
      controller.abort();
      throw new Error("Request was aborted.");
    });

    const error = await new LLMReasoningCollaborator(client)
      .draftNarrative(request, controller.signal)
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error).toMatchObject({ reason: "timeout" });
  });

  it("classifies other client errors as failed", async () => {
    const client = fakeClient(async () => {
      throw new Error("socket hang up");
    });

    await expect(
      new LLMReasoningCollaborator(client).draftNarrative(request, new AbortController().signal),
    ).rejects.toMatchObject({ reason: "failed", message: "Narrative request failed: socket hang up" });
  });

  it("rejects a non-JSON answer with a ValidationError", async () => {
    const client = fakeClient(async () => "I could not find anything.");

    await expect(
      new LLMReasoningCollaborator(client).draftNarrative(request, new AbortController().signal),
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
