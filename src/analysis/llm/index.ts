/**
 * Reasoning collaborator.
 *
 * Drafts the narrative parts of a SOC report (summary, per-incident why and
 * recommended actions) from structured findings. The report assembler owns
 * the timeout and validation; this layer only talks to the model and
 * classifies failures.
 *
 * When no API key is configured the collaborator reports itself unavailable
 * and the assembler falls back to templated text.
 */
import type { CountEntry, Evidence, Incident, PatternName, Severity } from "@/analysis/types";
import type { Settings } from "@/lib/config";
import { CollaboratorError, describeError } from "@/lib/errors";
import { createLLMClient, type LLMClient } from "./client";
import { parseLLMResponse } from "./parser";
import { SYSTEM_PROMPT, buildNarrativePrompt } from "./prompt";

export interface SampledEvent {
  id: string;
  event_time: string | null;
  user_email: string | null;
  client_ip: string | null;
  dest_host: string | null;
  url: string | null;
  action: string | null;
  threat_category: string | null;
  threat_name: string | null;
  /** Raw line with credentials masked */
  raw: string;
}

export interface NarrativeRequest {
  upload: {
    upload_id: string;
    total_events: number;
    bad_lines: number;
    time_range: { start: string | null; end: string | null };
    actions: { blocked: number; allowed: number };
    top_threat_categories: CountEntry[];
  };
  findings: Array<{
    id: string;
    pattern_name: PatternName;
    severity: Severity;
    confidence: number;
    title: string;
    summary: string;
    evidence: Evidence;
  }>;
  incidents: Incident[];
  sampled_events: SampledEvent[];
}

export interface ReasoningCollaborator {
  /**
   * Resolve with the parsed, not yet validated, response. Rejects with
   * CollaboratorError when the service cannot answer, or ValidationError
   * when the answer is not JSON.
   */
  draftNarrative(request: NarrativeRequest, signal: AbortSignal): Promise<unknown>;
}

export class LLMReasoningCollaborator implements ReasoningCollaborator {
  constructor(private readonly client: LLMClient) {}

  async draftNarrative(request: NarrativeRequest, signal: AbortSignal): Promise<unknown> {
    if (!this.client.isAvailable()) {
      throw new CollaboratorError("unavailable", "No LLM provider is configured");
    }

    console.log(
      `[LLM] Drafting narrative with ${this.client.providerName()} for upload ${request.upload.upload_id}`,
    );

    let raw: string;
    try {
      raw = await this.client.analyze(SYSTEM_PROMPT, buildNarrativePrompt(request), signal);
    } catch (error) {
      if (signal.aborted) {
        throw new CollaboratorError("timeout", "Narrative request timed out", { cause: error });
      }
      throw new CollaboratorError("failed", `Narrative request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    return parseLLMResponse(raw);
  }
}

export function createReasoningCollaborator(llm: Settings["llm"]): ReasoningCollaborator {
  return new LLMReasoningCollaborator(createLLMClient(llm));
}
