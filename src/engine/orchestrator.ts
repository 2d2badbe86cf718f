import type { DeviceContext } from "../backend/types";
import { getConfig, type TransferPolicy } from "../config";
import { createLogger, type Logger } from "../logger";
import type { BufferPair } from "../table/buffer-pair";
import type { ScratchBufferPool } from "../table/scratch-pool";
import type { Table } from "../table/table";
import {
  CancelledError,
  DependencyFailedError,
  PipelineBusyError,
  PipelineConfigError,
  PipelineError,
  PipelineStateError,
} from "./engine-errors";
import {
  awaitDependencies,
  barrier,
  type CompletionHandle,
  type HandleOutcome,
} from "./handles";
import {
  buildPipelinePlan,
  type HostNode,
  type HostStepDecl,
  type PipelinePlan,
  type PlanNode,
  type PlanNodeSummary,
  type ProgramStep,
  type StageDecl,
  summarizePlan,
} from "./planner";
import {
  buildProfile,
  formatProfile,
  isProfilingEnabled,
  type PipelineProfile,
} from "./profiler";
import { StageExecutor } from "./stage-executor";
import { TransferScheduler } from "./transfer-scheduler";

export type OrchestratorOptions = {
  policy?: TransferPolicy;
  scratch?: ScratchBufferPool | null;
  logger?: Logger;
  /** Log a latency report after the run; defaults to TABLEFLOW_PROFILE. */
  profile?: boolean;
};

export type PipelineResult = {
  /** Read-back tables, sealed, in the order they were declared. */
  tables: Table[];
  output(name: string): Table;
  profile: PipelineProfile;
  /** The handle issued for a plan node, by node name. */
  handle(name: string): CompletionHandle | undefined;
};

type RunPhase = "declaring" | "built" | "running" | "finished";

/**
 * Wires stages, host steps and transfers into one overlapped run.
 *
 * Declare steps in program order, then `build()` once and `run()` once. All
 * operations are issued up front with their minimal `waitFor` sets; the only
 * blocking point is the final barrier.
 */
export class PipelineOrchestrator {
  readonly policy: TransferPolicy;
  private readonly scratch: ScratchBufferPool | null;
  private readonly logger: Logger;
  private readonly profile: boolean;
  private readonly steps: ProgramStep[] = [];
  private readonly readBacks: Table[] = [];
  private readonly executors = new Map<string, StageExecutor>();
  private plan: PipelinePlan | null = null;
  private phase: RunPhase = "declaring";

  constructor(
    private readonly context: DeviceContext,
    options: OrchestratorOptions = {},
  ) {
    this.policy = options.policy ?? getConfig().transferPolicy;
    this.scratch = options.scratch ?? null;
    this.logger = options.logger ?? createLogger("pipeline");
    this.profile = options.profile ?? isProfilingEnabled();
  }

  // ==========================================================================
  // Declaration
  // ==========================================================================

  addHostStep(decl: HostStepDecl): this {
    this.ensureDeclaring();
    this.steps.push({ kind: "host", decl: { ...decl, inputs: decl.inputs.slice() } });
    return this;
  }

  addStage(decl: StageDecl): this {
    this.ensureDeclaring();
    this.steps.push({ kind: "stage", decl: { ...decl, inputs: decl.inputs.slice() } });
    return this;
  }

  readBack(table: Table): this {
    this.ensureDeclaring();
    if (!this.readBacks.includes(table)) {
      this.readBacks.push(table);
    }
    return this;
  }

  /** The executor bound to stage `name`; available after `build()`. */
  stage(name: string): StageExecutor {
    const executor = this.executors.get(name);
    if (!executor) {
      throw new PipelineConfigError(`No built stage named ${name}`);
    }
    return executor;
  }

  // ==========================================================================
  // Build
  // ==========================================================================

  build(): PlanNodeSummary[] {
    this.ensureDeclaring();
    const plan = buildPipelinePlan(
      { steps: this.steps, readBacks: this.readBacks },
      this.policy,
    );

    const stages = plan.nodes.flatMap((node) => (node.kind === "stage" ? [node.stage] : []));
    if (stages.some((stage) => stage.usesScratch)) {
      if (!this.scratch) {
        throw new PipelineConfigError("A stage uses scratch but no scratch pool was given");
      }
      if (!this.scratch.initialized) {
        this.scratch.init(this.context);
      }
    }

    this.allocate(plan);
    for (const stage of stages) {
      const executor = new StageExecutor(this.context, stage.kernel, stage.name);
      executor.setup(
        stage.inputs,
        stage.output,
        stage.config,
        stage.usesScratch ? this.scratch : null,
      );
      this.executors.set(stage.name, executor);
    }

    this.plan = plan;
    this.phase = "built";
    const summary = summarizePlan(plan);
    this.logger.debug(
      `built ${summary.length} nodes (${this.policy})`,
      summary.map((node) => `${node.name} <- [${node.deps.join(", ")}]`),
    );
    return summary;
  }

  describe(): PlanNodeSummary[] {
    if (!this.plan) {
      throw new PipelineStateError("Pipeline has not been built");
    }
    return summarizePlan(this.plan);
  }

  private allocate(plan: PipelinePlan): void {
    const hostSide = new Set<BufferPair>();
    const deviceSide = new Set<BufferPair>();
    for (const node of plan.nodes) {
      if (node.kind === "stage") {
        for (const item of [...node.stage.inputs, node.stage.output, node.stage.config]) {
          deviceSide.add(item);
          hostSide.add(item);
        }
      } else if (node.kind === "host") {
        for (const table of [...node.step.inputs, node.step.output]) {
          hostSide.add(table);
        }
      }
    }
    for (const item of hostSide) {
      if (!item.hasHost) item.allocateHost();
    }
    for (const item of deviceSide) {
      if (!item.hasDevice) item.allocateDevice(this.context);
    }
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  async run(): Promise<PipelineResult> {
    if (this.phase === "running") {
      throw new PipelineBusyError("Pipeline is already running");
    }
    if (this.phase === "finished") {
      throw new PipelineStateError(
        "Pipeline already ran; build a new pipeline to run again",
      );
    }
    if (this.phase === "declaring") {
      this.build();
    }
    const plan = this.plan;
    if (!plan) {
      throw new PipelineStateError("Pipeline has not been built");
    }

    this.phase = "running";
    try {
      return await this.execute(plan);
    } finally {
      this.phase = "finished";
    }
  }

  private async execute(plan: PipelinePlan): Promise<PipelineResult> {
    const controller = new AbortController();
    const transfers = new TransferScheduler(this.context, controller.signal);
    const issued = new Map<number, CompletionHandle>();
    const watchers: Promise<void>[] = [];
    let issueError: { node: PlanNode; error: unknown } | null = null;

    const onSettled = (node: PlanNode, outcome: HandleOutcome): void => {
      if (outcome.ok) return;
      if (!controller.signal.aborted) {
        this.logger.error(`${node.name} failed; aborting run`, outcome.error);
        controller.abort(outcome.error);
      }
    };

    for (const node of plan.nodes) {
      const waitFor = node.deps.map((dep) => {
        const handle = issued.get(dep);
        if (!handle) {
          throw new PipelineStateError(`${node.name} depends on unissued node ${dep}`);
        }
        return handle;
      });
      let handle: CompletionHandle;
      try {
        handle = this.issue(node, waitFor, transfers, controller.signal);
      } catch (error) {
        issueError = { node, error };
        controller.abort(error);
        break;
      }
      issued.set(node.index, handle);
      watchers.push(handle.settled.then((outcome) => onSettled(node, outcome)));
    }

    const handles = Array.from(issued.values());
    const outcomes = await barrier(handles, this.context.handles.trace);
    await Promise.all(watchers);

    if (issueError) {
      throw new PipelineError(issueError.node.name, issueError.error);
    }
    const failure = rootFailure(outcomes);
    if (failure) {
      throw new PipelineError(failure.handle.label, failure.error);
    }

    for (const table of plan.readBacks) {
      table.seal();
    }
    const profile = buildProfile(handles);
    if (this.profile) {
      this.logger.info(formatProfile(profile));
    }

    const byName = new Map<string, CompletionHandle>();
    for (const node of plan.nodes) {
      const handle = issued.get(node.index);
      if (handle) byName.set(node.name, handle);
    }
    const tables = plan.readBacks.slice();
    return {
      tables,
      output: (name) => {
        const table = tables.find((candidate) => candidate.name === name);
        if (!table) {
          throw new PipelineConfigError(`${name} is not a read-back table`);
        }
        return table;
      },
      profile,
      handle: (name) => byName.get(name),
    };
  }

  private issue(
    node: PlanNode,
    waitFor: CompletionHandle[],
    transfers: TransferScheduler,
    signal: AbortSignal,
  ): CompletionHandle {
    switch (node.kind) {
      case "h2d":
        return transfers.enqueue(node.items, "host-to-device", waitFor, node.name);
      case "d2h":
        return transfers.enqueue(node.items, "device-to-host", waitFor, node.name);
      case "stage":
        return this.stage(node.name).run(waitFor, signal);
      case "host": {
        const handle = this.context.handles.create("host", node.name, waitFor);
        // Settles the handle on every path; the barrier observes it.
        void runHostStep(handle, node, signal);
        return handle;
      }
    }
  }

  private ensureDeclaring(): void {
    if (this.phase !== "declaring") {
      throw new PipelineStateError("Pipeline is already built");
    }
  }
}

async function runHostStep(
  handle: CompletionHandle,
  node: HostNode,
  signal: AbortSignal,
): Promise<void> {
  const failedDep = await awaitDependencies(handle.waitFor);
  if (failedDep) {
    handle.fail(
      new DependencyFailedError(
        `${node.name} not started: upstream ${failedDep.describe()} failed`,
      ),
    );
    return;
  }
  if (signal.aborted) {
    handle.fail(new CancelledError(`${node.name} cancelled`));
    return;
  }
  handle.markStarted();
  try {
    await node.step.run(node.step.inputs, node.step.output);
  } catch (error) {
    handle.fail(error);
    return;
  }
  handle.signal();
}

/**
 * The failure that caused the abort: the earliest one that is not itself a
 * consequence of another failure.
 */
function rootFailure(
  outcomes: readonly HandleOutcome[],
): { handle: CompletionHandle; error: unknown } | null {
  let best: { handle: CompletionHandle; error: unknown } | null = null;
  let bestIsRoot = false;
  for (const outcome of outcomes) {
    if (outcome.ok) continue;
    const isRoot =
      !(outcome.error instanceof DependencyFailedError) &&
      !(outcome.error instanceof CancelledError);
    const seq = outcome.handle.settledSeq ?? Number.POSITIVE_INFINITY;
    const bestSeq = best?.handle.settledSeq ?? Number.POSITIVE_INFINITY;
    if (
      best === null ||
      (isRoot && !bestIsRoot) ||
      (isRoot === bestIsRoot && seq < bestSeq)
    ) {
      best = { handle: outcome.handle, error: outcome.error };
      bestIsRoot = isRoot;
    }
  }
  return best;
}
