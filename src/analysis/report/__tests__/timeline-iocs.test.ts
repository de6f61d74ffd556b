import { describe, it, expect } from "vitest";
import { synthesizeIncidents } from "../incidents";
import { buildTimeline } from "../timeline";
import { extractIocs } from "../iocs";
import { makeEvent, makeFinding } from "@/analysis/__tests__/helpers";
import type { NormalizedEvent } from "@/analysis/types";

const beaconA = makeEvent({
  id: "evt-a",
  eventTime: new Date("2024-03-01T12:05:00Z"),
  userEmail: "alice@corp.test",
  clientIp: "10.0.0.5",
  serverIp: "203.0.113.9",
  destHost: "c2.bad.test",
  url: "http://c2.bad.test/beacon",
});
const beaconB = makeEvent({
  id: "evt-b",
  eventTime: new Date("2024-03-01T12:01:00Z"),
  userEmail: "alice@corp.test",
  clientIp: "10.0.0.5",
  serverIp: "203.0.113.9",
  destHost: "c2.bad.test",
  url: "http://c2.bad.test/beacon",
});
const eventsById = new Map<string, NormalizedEvent>([
  [beaconA.id, beaconA],
  [beaconB.id, beaconB],
]);

const c2 = makeFinding({
  id: "f-c2",
  sequence: 1,
  patternName: "C2_BEACONING_SUSPECTED",
  severity: "high",
  confidence: 0.8,
  title: "C2 beaconing suspected",
  evidence: {
    client_ip: "10.0.0.5",
    dest_host: "c2.bad.test",
    first_seen: "2024-03-01T12:00:00.000Z",
    last_seen: "2024-03-01T12:06:00.000Z",
    event_ids: ["evt-b", "evt-a"],
  },
});
const burst = makeFinding({
  id: "f-burst",
  sequence: 2,
  severity: "high",
  confidence: 0.7,
  title: "Burst from single IP",
  evidence: { client_ip: "10.0.0.5", event_ids: ["evt-a"] },
});
const night = makeFinding({
  id: "f-off",
  sequence: 3,
  patternName: "OFF_HOURS_ACCESS",
  severity: "medium",
  confidence: 0.6,
  title: "Off-hours access",
  evidence: { user_email: "bob@corp.test", bucket: "2024-03-01T02:00:00.000Z" },
});
const untimed = makeFinding({
  id: "f-none",
  sequence: 4,
  patternName: "THREAT_CATEGORY_SPIKE",
  severity: "low",
  confidence: 0.4,
  title: "Spike",
  evidence: { threat_category: "Adware" },
});

describe("buildTimeline", () => {
  it("spans each incident's timestamps and orders items chronologically", () => {
    const clusters = synthesizeIncidents([c2, burst, night, untimed]);
    const timeline = buildTimeline(clusters, eventsById);

    expect(timeline).toEqual([
      {
        ts_start: "2024-03-01T02:00:00.000Z",
        ts_end: "2024-03-01T02:00:00.000Z",
        label: "[medium] Off-hours access",
        evidence_finding_ids: ["f-off"],
        evidence_event_ids: [],
      },
      {
        ts_start: "2024-03-01T12:00:00.000Z",
        ts_end: "2024-03-01T12:06:00.000Z",
        label: "[high] C2 beaconing suspected (+1 related pattern)",
        evidence_finding_ids: ["f-c2", "f-burst"],
        evidence_event_ids: ["evt-b", "evt-a"],
      },
    ]);
  });
});

describe("extractIocs", () => {
  it("deduplicates indicators across overlapping findings and events", () => {
    const clusters = synthesizeIncidents([c2, burst, night]);
    const iocs = extractIocs(clusters, eventsById);

    expect(iocs).toEqual({
      domains: ["c2.bad.test"],
      urls: ["http://c2.bad.test/beacon"],
      ips: ["10.0.0.5", "203.0.113.9"],
      users: ["alice@corp.test", "bob@corp.test"],
    });
  });

  it("produces no duplicate entries in any set", () => {
    const iocs = extractIocs(synthesizeIncidents([c2, burst, night, untimed]), eventsById);
    for (const values of Object.values(iocs)) {
      expect(new Set(values).size).toBe(values.length);
    }
  });
});
