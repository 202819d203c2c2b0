import { describe, it, expect } from "vitest";
import { MigrationCheckpoint } from "../../src/domain/services/MigrationCheckpoint";
import type { DeferredReference } from "../../src/domain/models/PendingRelation";
import { MemoryCheckpointStore } from "../fakes";

const bodyRef: DeferredReference = {
  repository: "acme/site",
  issueNumber: 10,
  text: "see #2",
  tokens: [{ token: "#2", sourceId: 2 }],
};

const commentRef: DeferredReference = {
  ...bodyRef,
  commentId: 101,
  text: "also #3",
  tokens: [{ token: "#3", sourceId: 3 }],
};

describe("MigrationCheckpoint", () => {
  it("writes every step of an issue through to the store", async () => {
    const store = new MemoryCheckpointStore();
    const checkpoint = new MigrationCheckpoint(store);
    await checkpoint.load();

    await checkpoint.begin(1);
    await checkpoint.bodyCaptured(1, bodyRef);
    await checkpoint.labelsApplied(1);
    await checkpoint.journalPosted(1, 7, commentRef);

    expect(store.writes).toBe(4);
    expect(store.stored).toEqual({
      inFlight: {
        "1": { bodyCaptured: true, labelsApplied: true, postedJournals: [7] },
      },
      deferred: [bodyRef, commentRef],
    });

    await checkpoint.finish(1);
    expect(store.stored?.inFlight).toEqual({});
    expect(store.stored?.deferred).toHaveLength(2);
  });

  it("picks up what a previous run left behind", async () => {
    const store = new MemoryCheckpointStore({
      inFlight: {
        "4": { bodyCaptured: true, labelsApplied: false, postedJournals: [] },
      },
      deferred: [bodyRef],
    });
    const checkpoint = new MigrationCheckpoint(store);

    expect(await checkpoint.load()).toBe(1);
    expect(checkpoint.progress(4)).toEqual({
      bodyCaptured: true,
      labelsApplied: false,
      postedJournals: [],
    });
    expect(checkpoint.progress(5)).toBeUndefined();
    expect(checkpoint.deferred()).toEqual([bodyRef]);
  });

  it("drops references once they are consumed", async () => {
    const store = new MemoryCheckpointStore();
    const checkpoint = new MigrationCheckpoint(store);
    await checkpoint.load();
    await checkpoint.begin(1);
    await checkpoint.bodyCaptured(1, bodyRef);
    await checkpoint.journalPosted(1, 7, commentRef);

    const [first] = checkpoint.deferred();
    await checkpoint.consume(first);

    expect(checkpoint.deferred()).toEqual([commentRef]);
    expect(store.stored?.deferred).toEqual([commentRef]);
  });

  it("refuses progress for an issue that was never started", async () => {
    const checkpoint = new MigrationCheckpoint(new MemoryCheckpointStore());
    await checkpoint.load();
    await expect(checkpoint.labelsApplied(3)).rejects.toThrow(
      "Redmine #3 was never started"
    );
  });
});
