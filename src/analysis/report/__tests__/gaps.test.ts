import { describe, it, expect } from "vitest";
import { detectGaps } from "../gaps";
import { makeEvent, makeFinding } from "@/analysis/__tests__/helpers";

describe("detectGaps", () => {
  it("notes every missing kind of telemetry", () => {
    const events = [
      makeEvent({ id: "e1", eventTime: new Date("2024-03-01T12:00:00Z"), userEmail: "a@corp.test" }),
      makeEvent({ id: "e2" }),
    ];
    const findings = [makeFinding({ evidence: { event_ids: ["gone"] } })];

    expect(detectGaps({ events, findings, badLines: 2 })).toEqual([
      "No DNS telemetry in this upload; name resolutions behind the proxied requests cannot be confirmed.",
      "No server-side telemetry (destination server addresses) is present; only proxy-side views are available.",
      "1 of 2 events have no parseable timestamp and are missing from time-based detections.",
      "2 input lines could not be parsed and were skipped.",
      "1 of 2 events carry no user identity.",
      "1 findings link to no stored events and rest on aggregate counts only.",
    ]);
  });

  it("reports the absence of any user identity once", () => {
    const events = [
      makeEvent({ eventTime: new Date(), serverIp: "203.0.113.1", urlCategory: "DNS Tunneling" }),
    ];
    expect(detectGaps({ events, findings: [], badLines: 0 })).toEqual([
      "No user identity is present in any event; activity can only be attributed to client IPs.",
    ]);
  });

  it("returns nothing for complete telemetry", () => {
    const events = [
      makeEvent({
        id: "dns-1",
        eventTime: new Date("2024-03-01T12:00:00Z"),
        userEmail: "a@corp.test",
        serverIp: "203.0.113.1",
        urlCategory: "DNS",
      }),
    ];
    const findings = [makeFinding({ evidence: { event_ids: ["dns-1"] } })];
    expect(detectGaps({ events, findings, badLines: 0 })).toEqual([]);
  });
});
