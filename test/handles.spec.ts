import { describe, expect, it } from "vitest";
import {
  awaitDependencies,
  barrier,
  CancelledError,
  HandleStateError,
  HandleStore,
  TraceRecorder,
} from "../src";

function storeWithClock() {
  let now = 0;
  const clock = () => now;
  const store = new HandleStore(new TraceRecorder(), clock);
  return {
    store,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("CompletionHandle", () => {
  it("signals exactly once and records timestamps", async () => {
    const { store, advance } = storeWithClock();
    const handle = store.create("transfer", "h2d(a)");
    advance(2);
    handle.markStarted();
    advance(3);
    handle.signal();

    await expect(handle.settled).resolves.toEqual({ ok: true, handle });
    expect(handle.status).toBe("signaled");
    expect(handle.queuedAt).toBe(0);
    expect(handle.startedAt).toBe(2);
    expect(handle.durationMs).toBe(3);
    expect(() => handle.signal()).toThrow(HandleStateError);
    expect(() => handle.fail(new Error("late"))).toThrow(HandleStateError);
  });

  it("rethrows the failure from wait() but never rejects settled", async () => {
    const { store } = storeWithClock();
    const handle = store.create("invoke", "stage0");
    const error = new Error("kernel fault");
    handle.fail(error);

    await expect(handle.wait()).rejects.toBe(error);
    const outcome = await handle.settled;
    expect(outcome.ok).toBe(false);
    expect(handle.error).toBe(error);
  });

  it("records issue, start, signal, fail and cancel events in order", () => {
    const { store } = storeWithClock();
    const first = store.create("transfer", "t");
    const second = store.create("invoke", "s", [first]);
    const third = store.create("host", "h");
    first.markStarted();
    first.signal();
    second.fail(new Error("bad"));
    third.fail(new CancelledError("h cancelled"));

    expect(store.trace.snapshot()).toEqual([
      { type: "issue", seq: 1, handle: 1, kind: "transfer", label: "t", waitFor: [] },
      { type: "issue", seq: 2, handle: 2, kind: "invoke", label: "s", waitFor: [1] },
      { type: "issue", seq: 3, handle: 3, kind: "host", label: "h", waitFor: [] },
      { type: "start", seq: 4, handle: 1, label: "t" },
      { type: "signal", seq: 5, handle: 1, label: "t" },
      { type: "fail", seq: 6, handle: 2, label: "s", error: "bad" },
      { type: "cancel", seq: 7, handle: 3, label: "h" },
    ]);
    expect(second.settledSeq).toBe(6);
    expect(second.describe()).toBe("invoke:s#2");
  });

  it("refuses to start twice", () => {
    const { store } = storeWithClock();
    const handle = store.create("host", "h");
    handle.markStarted();

    expect(() => handle.markStarted()).toThrow(HandleStateError);
  });
});

describe("HandleStore", () => {
  it("hands out increasing ids and tracks pending handles", () => {
    const { store } = storeWithClock();
    const a = store.create("transfer", "a");
    const b = store.create("transfer", "b");
    a.signal();

    expect([a.id, b.id]).toEqual([1, 2]);
    expect(store.all()).toEqual([a, b]);
    expect(store.pending()).toEqual([b]);
  });
});

describe("awaitDependencies", () => {
  it("resolves null once every dependency signaled", async () => {
    const { store } = storeWithClock();
    const a = store.create("transfer", "a");
    const b = store.create("transfer", "b");
    const waiting = awaitDependencies([a, b]);
    b.signal();
    a.signal();

    await expect(waiting).resolves.toBeNull();
  });

  it("reports the dependency that failed first", async () => {
    const { store } = storeWithClock();
    const a = store.create("invoke", "a");
    const b = store.create("invoke", "b");
    const c = store.create("invoke", "c");
    b.fail(new Error("first"));
    a.fail(new Error("second"));
    c.signal();

    await expect(awaitDependencies([a, b, c])).resolves.toBe(b);
  });
});

describe("barrier", () => {
  it("waits for every handle and records one barrier event", async () => {
    const { store } = storeWithClock();
    const a = store.create("transfer", "a");
    const b = store.create("invoke", "b");
    const done = barrier([a, b], store.trace);
    a.signal();
    b.fail(new Error("x"));
    const outcomes = await done;

    expect(outcomes.map((outcome) => outcome.ok)).toEqual([true, false]);
    expect(store.trace.snapshot().at(-1)).toEqual({ type: "barrier", seq: 5, count: 2 });
  });
});
