import { performance } from "node:perf_hooks";

import { CancelledError, HandleStateError } from "./engine-errors";
import { TraceRecorder } from "./trace";

export type HandleId = number;
export type HandleKind = "transfer" | "invoke" | "host";
export type HandleState = "pending" | "signaled" | "failed";

export type HandleOutcome =
  | { ok: true; handle: CompletionHandle }
  | { ok: false; handle: CompletionHandle; error: unknown };

export type Clock = () => number;

export const defaultClock: Clock = () => performance.now();

/**
 * One-shot completion signal for an asynchronous operation.
 *
 * A handle is signaled or failed exactly once. It carries no value; observers
 * wait on `settled`, which never rejects, or on `wait()`, which rethrows the
 * failure.
 */
export class CompletionHandle {
  private state: HandleState = "pending";
  private failure: unknown = null;
  private readonly resolveSettled: (outcome: HandleOutcome) => void;

  readonly settled: Promise<HandleOutcome>;
  readonly queuedAt: number;
  startedAt: number | null = null;
  endedAt: number | null = null;
  /** Trace sequence number of the signal (or failure) event. */
  settledSeq: number | null = null;

  constructor(
    readonly id: HandleId,
    readonly kind: HandleKind,
    readonly label: string,
    readonly waitFor: readonly CompletionHandle[],
    private readonly clock: Clock,
    private readonly trace: TraceRecorder,
  ) {
    this.queuedAt = clock();
    let resolveSettled: (outcome: HandleOutcome) => void = () => undefined;
    this.settled = new Promise<HandleOutcome>((resolve) => {
      resolveSettled = resolve;
    });
    this.resolveSettled = resolveSettled;
    trace.record({
      type: "issue",
      handle: id,
      kind,
      label,
      waitFor: waitFor.map((dep) => dep.id),
    });
  }

  get status(): HandleState {
    return this.state;
  }

  get error(): unknown {
    return this.failure;
  }

  get isSettled(): boolean {
    return this.state !== "pending";
  }

  /** Duration in ms between start and end, or null until signaled. */
  get durationMs(): number | null {
    if (this.startedAt === null || this.endedAt === null) return null;
    return this.endedAt - this.startedAt;
  }

  markStarted(): void {
    if (this.state !== "pending" || this.startedAt !== null) {
      throw new HandleStateError(`Handle ${this.describe()} already started`);
    }
    this.startedAt = this.clock();
    this.trace.record({ type: "start", handle: this.id, label: this.label });
  }

  signal(): void {
    this.ensurePending();
    this.state = "signaled";
    this.endedAt = this.clock();
    this.settledSeq = this.trace.record({
      type: "signal",
      handle: this.id,
      label: this.label,
    });
    this.resolveSettled({ ok: true, handle: this });
  }

  fail(error: unknown): void {
    this.ensurePending();
    this.state = "failed";
    this.failure = error;
    this.endedAt = this.clock();
    this.settledSeq =
      error instanceof CancelledError
        ? this.trace.record({
            type: "cancel",
            handle: this.id,
            label: this.label,
          })
        : this.trace.record({
            type: "fail",
            handle: this.id,
            label: this.label,
            error: error instanceof Error ? error.message : String(error),
          });
    this.resolveSettled({ ok: false, handle: this, error });
  }

  async wait(): Promise<void> {
    const outcome = await this.settled;
    if (!outcome.ok) {
      throw outcome.error;
    }
  }

  describe(): string {
    return `${this.kind}:${this.label}#${this.id}`;
  }

  private ensurePending(): void {
    if (this.state !== "pending") {
      throw new HandleStateError(
        `Handle ${this.describe()} was already ${this.state}`,
      );
    }
  }
}

/**
 * Allocates handles with monotonically increasing ids and keeps every handle
 * it produced, so a barrier can wait on all of them.
 */
export class HandleStore {
  private nextId = 1;
  private readonly handles: CompletionHandle[] = [];

  constructor(
    readonly trace: TraceRecorder = new TraceRecorder(),
    readonly clock: Clock = defaultClock,
  ) {}

  create(
    kind: HandleKind,
    label: string,
    waitFor: readonly CompletionHandle[] = [],
  ): CompletionHandle {
    const handle = new CompletionHandle(
      this.nextId++,
      kind,
      label,
      waitFor.slice(),
      this.clock,
      this.trace,
    );
    this.handles.push(handle);
    return handle;
  }

  all(): readonly CompletionHandle[] {
    return this.handles;
  }

  pending(): CompletionHandle[] {
    return this.handles.filter((handle) => !handle.isSettled);
  }
}

/**
 * Wait until every handle in `waitFor` has settled. Returns the first failed
 * handle in settle order, or null when all of them signaled.
 */
export async function awaitDependencies(
  waitFor: readonly CompletionHandle[],
): Promise<CompletionHandle | null> {
  const outcomes = await Promise.all(waitFor.map((handle) => handle.settled));
  let firstFailed: CompletionHandle | null = null;
  for (const outcome of outcomes) {
    if (outcome.ok) continue;
    const seq = outcome.handle.settledSeq ?? Number.POSITIVE_INFINITY;
    if (firstFailed === null || seq < (firstFailed.settledSeq ?? Number.POSITIVE_INFINITY)) {
      firstFailed = outcome.handle;
    }
  }
  return firstFailed;
}

/** Block until every handle has settled; the single full-pipeline barrier. */
export async function barrier(
  handles: readonly CompletionHandle[],
  trace?: TraceRecorder,
): Promise<HandleOutcome[]> {
  const outcomes = await Promise.all(handles.map((handle) => handle.settled));
  trace?.record({ type: "barrier", count: handles.length });
  return outcomes;
}
