import { Readable } from "stream";
import type { EventDraft, Finding, FindingDraft, NormalizedEvent } from "@/analysis/types";

let nextEvent = 0;
let nextFinding = 0;

export function makeDraft(overrides: Partial<EventDraft> = {}): EventDraft {
  return {
    lineNumber: 1,
    dialect: "kv",
    raw: "",
    eventTime: null,
    eventId: null,
    vendor: null,
    action: null,
    reason: null,
    severity: null,
    status: null,
    userEmail: null,
    department: null,
    location: null,
    clientIp: null,
    serverIp: null,
    destHost: null,
    url: null,
    requestMethod: null,
    urlCategory: null,
    threatCategory: null,
    threatName: null,
    riskScore: null,
    requestSize: null,
    responseSize: null,
    transactionSize: null,
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<NormalizedEvent> = {}): NormalizedEvent {
  nextEvent++;
  return {
    ...makeDraft({ lineNumber: nextEvent }),
    id: `evt-${nextEvent}`,
    uploadId: "upload-1",
    ...overrides,
  };
}

export function makeFinding(overrides: Partial<Finding> & Partial<FindingDraft> = {}): Finding {
  nextFinding++;
  return {
    id: `finding-${nextFinding}`,
    uploadId: "upload-1",
    patternName: "BURST_FROM_SINGLE_IP",
    severity: "high",
    confidence: 0.7,
    title: "Finding",
    summary: "Summary",
    evidence: {},
    fingerprint: `fp-${nextFinding}`,
    sequence: nextFinding,
    createdAt: new Date("2024-03-01T12:00:00Z"),
    ...overrides,
  };
}

/** `count` consecutive timestamps, `stepMs` apart, starting at `startIso`. */
export function timesFrom(startIso: string, count: number, stepMs: number): Date[] {
  const start = Date.parse(startIso);
  return Array.from({ length: count }, (_, i) => new Date(start + i * stepMs));
}

export function streamOf(lines: string[]): Readable {
  return Readable.from([lines.join("\n") + "\n"]);
}
