import { describe, expect, it, vi } from "vitest";
import {
  ConfigBlob,
  createSimContext,
  DependencyFailedError,
  InvocationError,
  type Logger,
  PipelineBusyError,
  PipelineConfigError,
  PipelineError,
  PipelineOrchestrator,
  PipelineStateError,
  Table,
  TableSealedError,
  TransferError,
} from "../src";
import { buildJoinChain } from "./helpers/pipelines";

function recordingLogger(): Logger & { info: ReturnType<typeof vi.fn> } {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("PipelineOrchestrator", () => {
  it("runs a five-stage ping-pong join chain and seals the read-back", async () => {
    const chain = await buildJoinChain({ stages: 5 });
    const result = await chain.orchestrator.run();
    const final = result.output("tk0");

    expect(final).toBe(chain.final);
    expect(final.rows()).toEqual(chain.expected);
    expect(chain.expected.length).toBeGreaterThan(0);
    expect(final.sealed).toBe(true);
    expect(result.tables).toEqual([chain.final]);
    expect(result.handle("stage4")?.status).toBe("signaled");
    expect(() => result.output("fact")).toThrow(PipelineConfigError);
  });

  it("transfers host-produced tables after their host step", async () => {
    const chain = await buildJoinChain({ stages: 2, hostFilter: true });
    const plan = chain.orchestrator.build();
    const result = await chain.orchestrator.run();

    expect(plan.find((node) => node.name === "h2d:fact_head")?.deps).toEqual(["prefilter"]);
    expect(plan.find((node) => node.name === "stage0")?.deps).toEqual([
      "h2d:eager",
      "h2d:fact_head",
    ]);
    expect(result.output("tk1").rows()).toEqual(chain.expected);
  });

  it("allocates missing buffers and binds one executor per stage at build", async () => {
    const chain = await buildJoinChain({ stages: 3 });
    expect(chain.outputs[0].hasDevice).toBe(false);
    chain.orchestrator.build();

    expect(chain.outputs[0].hasHost).toBe(true);
    expect(chain.outputs[0].hasDevice).toBe(true);
    expect(chain.orchestrator.stage("stage1").state).toBe("bound");
    expect(() => chain.orchestrator.stage("stage9")).toThrow(PipelineConfigError);
    expect(() => chain.orchestrator.build()).toThrow(PipelineStateError);
  });

  it("holds an exec lock and runs only once", async () => {
    const chain = await buildJoinChain({ stages: 2, sim: { latency: 2 } });
    const first = chain.orchestrator.run();

    await expect(chain.orchestrator.run()).rejects.toBeInstanceOf(PipelineBusyError);
    await first;
    await expect(chain.orchestrator.run()).rejects.toBeInstanceOf(PipelineStateError);
    expect(() => chain.orchestrator.readBack(chain.fact)).toThrow(PipelineStateError);
  });

  it("aborts the chain at the first failing stage", async () => {
    const chain = await buildJoinChain({
      stages: 5,
      sim: { latency: 1, faults: { invocations: ["stage2"] } },
    });
    const error = await rejection(chain.orchestrator.run());

    expect(error).toBeInstanceOf(PipelineError);
    expect(error instanceof PipelineError && error.node).toBe("stage2");
    expect(error instanceof Error && error.cause).toBeInstanceOf(InvocationError);

    const started = chain.context.handles.trace
      .snapshot()
      .flatMap((event) => (event.type === "start" ? [event.label] : []));
    expect(started).not.toContain("stage3");
    expect(started).not.toContain("stage4");
    expect(started).not.toContain("d2h:tk0");
    expect(chain.orchestrator.stage("stage2").state).toBe("failed");
    expect(chain.orchestrator.stage("stage3").handle?.error).toBeInstanceOf(DependencyFailedError);
    expect(chain.final.sealed).toBe(false);
  });

  it("starts no stage when the eager transfer fails", async () => {
    const chain = await buildJoinChain({
      stages: 3,
      sim: { faults: { transfers: ["h2d:eager"] } },
    });
    const error = await rejection(chain.orchestrator.run());

    expect(error instanceof PipelineError && error.node).toBe("h2d:eager");
    expect(error instanceof Error && error.cause).toBeInstanceOf(TransferError);
    const started = chain.context.handles.trace
      .snapshot()
      .flatMap((event) => (event.type === "start" ? [event.label] : []));
    expect(started).toEqual(["h2d:eager"]);
  });

  it("surfaces a host step failure as a PipelineError naming the step", async () => {
    const context = createSimContext();
    const input = new Table({ name: "in", capacity: 2, columns: [{ name: "a", width: 4 }] });
    const output = new Table({ name: "out", capacity: 2, columns: [{ name: "a", width: 4 }] });
    input.allocateHost();
    const failure = new Error("bad row");
    const orchestrator = new PipelineOrchestrator(context, { logger: recordingLogger() })
      .addHostStep({
        name: "clean",
        inputs: [input],
        output,
        run: () => {
          throw failure;
        },
      })
      .readBack(output);
    const error = await rejection(orchestrator.run());

    expect(error).toBeInstanceOf(PipelineError);
    expect(error instanceof Error && error.message).toBe("Pipeline failed at clean: bad row");
    expect(error instanceof Error && error.cause).toBe(failure);
  });

  it("reports errors raised while issuing as a PipelineError", async () => {
    const chain = await buildJoinChain({ stages: 1 });
    chain.orchestrator.build();
    chain.final.seal();
    const error = await rejection(chain.orchestrator.run());

    expect(error instanceof PipelineError && error.node).toBe("d2h:tk0");
    expect(error instanceof Error && error.cause).toBeInstanceOf(TableSealedError);
  });

  it("requires a scratch pool for scratch users and initializes it once", async () => {
    const context = createSimContext();
    const input = new Table({ name: "in", capacity: 2, columns: [{ name: "a", width: 4 }] });
    const output = new Table({ name: "out", capacity: 2, columns: [{ name: "a", width: 4 }] });
    input.allocateHost();
    const declare = (orchestrator: PipelineOrchestrator) =>
      orchestrator.addStage({
        name: "s0",
        kernel: "filter",
        inputs: [input],
        output,
        config: new ConfigBlob(0),
        usesScratch: true,
      });

    expect(() => declare(new PipelineOrchestrator(context)).build()).toThrow(
      "A stage uses scratch but no scratch pool was given",
    );

    const chain = await buildJoinChain({ stages: 3, usesScratch: true });
    await chain.orchestrator.run();
    expect(chain.scratch?.initialized).toBe(true);
    expect(chain.scratch?.leaseCount).toBe(3);
    expect(chain.scratch?.holder).toBeNull();
  });

  it("describes the plan only once built", async () => {
    const chain = await buildJoinChain({ stages: 2 });

    expect(() => chain.orchestrator.describe()).toThrow(PipelineStateError);
    const built = chain.orchestrator.build();
    expect(chain.orchestrator.describe()).toEqual(built);
    expect(built.map((node) => node.kind)).toEqual(["h2d", "stage", "stage", "d2h"]);
  });

  it("reports a profile and logs it when profiling is on", async () => {
    const logger = recordingLogger();
    const chain = await buildJoinChain({ stages: 2, sim: { latency: 1 }, logger, profile: true });
    const result = await chain.orchestrator.run();

    expect(result.profile.entries.map((entry) => entry.label)).toEqual([
      "h2d:eager",
      "stage0",
      "stage1",
      "d2h:tk1",
    ]);
    expect(result.profile.entries.every((entry) => entry.status === "signaled")).toBe(true);
    expect(result.profile.totalMs).toBeGreaterThan(0);
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(String(logger.info.mock.calls[0][0])).toMatch(/^=== Profile \(pipeline\) ===/);
  });
});
