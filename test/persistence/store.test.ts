import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RunStore } from "../../src/persistence/store.js";
import type { RunSnapshot } from "../../src/supervisor/types.js";

function snapshot(runId: string, startedAt: number, overrides: Partial<RunSnapshot["state"]> = {}): RunSnapshot {
  return {
    version: 1,
    state: {
      runId,
      goal: `goal of ${runId}`,
      iteration: 1,
      maxIterations: 5,
      phase: "executing",
      verdict: null,
      history: [],
      corrections: [],
      startedAt,
      ...overrides,
    },
    graph: null,
    budget: {
      sessionLimit: 100_000,
      dailyLimit: 500_000,
      sessionUsed: 250,
      dailyUsed: 250,
      day: "2026-03-01",
      batchTotal: 0,
      shares: {},
    },
  };
}

describe("RunStore", () => {
  let store: RunStore;

  beforeEach(() => {
    store = new RunStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips a snapshot", () => {
    const snap = snapshot("run-1", 1_000);
    store.save(snap);
    expect(store.get("run-1")).toEqual(snap);
  });

  it("returns undefined for an unknown run", () => {
    expect(store.get("missing")).toBeUndefined();
  });

  it("replaces the snapshot on every save", () => {
    store.save(snapshot("run-1", 1_000));
    store.save(snapshot("run-1", 1_000, { phase: "done", iteration: 2, verdict: "success", finishedAt: 5_000 }));

    expect(store.get("run-1")?.state.phase).toBe("done");
    expect(store.list()).toHaveLength(1);
    expect(store.list()[0]).toMatchObject({ runId: "run-1", phase: "done", iteration: 2, verdict: "success", finishedAt: 5_000 });
  });

  it("lists the newest runs first, up to the limit", () => {
    store.save(snapshot("old", 1_000));
    store.save(snapshot("new", 3_000));
    store.save(snapshot("mid", 2_000));

    expect(store.list().map((r) => r.runId)).toEqual(["new", "mid", "old"]);
    expect(store.list(1).map((r) => r.runId)).toEqual(["new"]);
    expect(store.list()[0].finishedAt).toBeUndefined();
  });

  it("deletes one run or every run older than a cutoff", () => {
    store.save(snapshot("a", 1_000));
    store.save(snapshot("b", 2_000));
    store.save(snapshot("c", 3_000));

    expect(store.delete("a")).toBe(true);
    expect(store.delete("a")).toBe(false);
    expect(store.deleteOlderThan(3_000)).toBe(1);
    expect(store.list().map((r) => r.runId)).toEqual(["c"]);
  });

  it("sums debits per day and per role", () => {
    store.appendDebit({ day: "2026-03-01", role: "implementer", cost: 100, recordedAt: 1 });
    store.appendDebit({ day: "2026-03-01", role: "validator", cost: 40, recordedAt: 2 });
    store.appendDebit({ day: "2026-03-01", role: "implementer", cost: 60, recordedAt: 3 });
    store.appendDebit({ day: "2026-03-01", role: null, cost: 5, recordedAt: 4 });
    store.appendDebit({ day: "2026-03-02", role: "implementer", cost: 999, recordedAt: 5 });

    expect(store.dailyUsage("2026-03-01")).toBe(205);
    expect(store.dailyUsage("2026-02-28")).toBe(0);
    expect(store.usageByRole("2026-03-01")).toEqual([
      { role: "implementer", total: 160 },
      { role: "validator", total: 40 },
      { role: null, total: 5 },
    ]);
  });
});
