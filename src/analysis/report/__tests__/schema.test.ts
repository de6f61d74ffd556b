import { describe, it, expect } from "vitest";
import { validateNarrative } from "../schema";
import { ValidationError } from "@/lib/errors";

function narrative(overrides: Record<string, unknown> = {}) {
  return {
    summary: "Endpoint 10.0.0.5 shows beaconing.",
    timeline: [],
    incidents: [
      {
        title: "Beaconing from 10.0.0.5",
        severity: "high",
        confidence: 0.8,
        confirmed: true,
        security_outcomes: ["C2_BEACONING_SUSPECTED"],
        affected_entities: { client_ips: ["10.0.0.5"] },
        evidence_finding_ids: ["f-1"],
        evidence_event_ids: [],
        why: ["Repeated blocked callbacks"],
        recommended_actions: ["Isolate the host"],
      },
    ],
    iocs: { domains: [], urls: [], ips: ["10.0.0.5"], users: [] },
    gaps: [],
    ...overrides,
  };
}

describe("validateNarrative", () => {
  const known = new Set(["f-1", "f-2"]);

  it("accepts a well-formed response and fills missing entity lists", () => {
    const result = validateNarrative(narrative(), known);
    expect(result.incidents[0].affected_entities).toEqual({
      user_emails: [],
      client_ips: ["10.0.0.5"],
      dest_hosts: [],
      threat_categories: [],
    });
  });

  it("rejects a response missing the summary with the zod issues attached", () => {
    const { summary: _omitted, ...rest } = narrative();
    try {
      validateNarrative(rest, known);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues.map((i) => i.path.join("."))).toContain("summary");
      }
    }
  });

  it("rejects unknown labels and out-of-range confidence", () => {
    const bad = narrative({
      incidents: [{ ...narrative().incidents[0], security_outcomes: ["PWNED"], confidence: 1.4 }],
    });
    expect(() => validateNarrative(bad, known)).toThrow(ValidationError);
  });

  it("rejects finding ids it was never given", () => {
    const invented = narrative({
      timeline: [
        {
          ts_start: "2024-03-01T12:00:00Z",
          ts_end: "2024-03-01T12:05:00Z",
          label: "Beaconing",
          evidence_finding_ids: ["f-9"],
          evidence_event_ids: [],
        },
      ],
    });
    expect(() => validateNarrative(invented, known)).toThrow(
      "Narrative cites unknown finding ids: f-9",
    );
  });
});
