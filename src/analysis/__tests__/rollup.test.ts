import { describe, it, expect } from "vitest";
import { buildRollups, minuteBucket, recomputeRollups } from "../rollup";
import { MemoryStore } from "@/lib/store/memory";
import { UNSET } from "@/lib/constants";
import { makeDraft, makeEvent } from "./helpers";

describe("minuteBucket", () => {
  it("truncates to the start of the minute in UTC", () => {
    expect(minuteBucket(new Date("2024-03-01T12:05:59.999Z"))).toBe("2024-03-01T12:05:00.000Z");
  });
});

describe("buildRollups", () => {
  const shared = {
    userEmail: "alice@example.com",
    clientIp: "10.0.0.1",
    destHost: "a.example.com",
    action: "Blocked",
  };

  it("groups by minute and dimensions, using UNSET for absent values", () => {
    const events = [
      makeEvent({ ...shared, eventTime: new Date("2024-03-01T12:00:10Z") }),
      makeEvent({ ...shared, eventTime: new Date("2024-03-01T12:00:50Z") }),
      makeEvent({}),
    ];

    const buckets = buildRollups("upload-1", events);

    expect(buckets).toEqual([
      {
        uploadId: "upload-1",
        bucket: "2024-03-01T12:00:00.000Z",
        ...shared,
        threatCategory: UNSET,
        total: 2,
      },
      {
        uploadId: "upload-1",
        bucket: UNSET,
        userEmail: UNSET,
        clientIp: UNSET,
        destHost: UNSET,
        action: UNSET,
        threatCategory: UNSET,
        total: 1,
      },
    ]);
  });

  it("separates minutes", () => {
    const events = [
      makeEvent({ ...shared, eventTime: new Date("2024-03-01T12:00:59Z") }),
      makeEvent({ ...shared, eventTime: new Date("2024-03-01T12:01:00Z") }),
    ];
    expect(buildRollups("upload-1", events).map((b) => b.total)).toEqual([1, 1]);
  });
});

describe("recomputeRollups", () => {
  it("is idempotent", async () => {
    const store = new MemoryStore();
    const job = await store.createJob("upload-1");
    await store.appendEventBatch(
      job.id,
      [
        makeDraft({ clientIp: "10.0.0.1", eventTime: new Date("2024-03-01T12:00:10Z") }),
        makeDraft({ clientIp: "10.0.0.1", eventTime: new Date("2024-03-01T12:00:20Z") }),
        makeDraft({ clientIp: "10.0.0.2", eventTime: new Date("2024-03-01T12:00:30Z") }),
      ],
      0,
    );

    await recomputeRollups(store, "upload-1");
    const first = await store.listRollups("upload-1");
    await recomputeRollups(store, "upload-1");
    const second = await store.listRollups("upload-1");

    expect(second).toEqual(first);
    expect(second.map((b) => [b.clientIp, b.total])).toEqual([
      ["10.0.0.1", 2],
      ["10.0.0.2", 1],
    ]);
  });
});
