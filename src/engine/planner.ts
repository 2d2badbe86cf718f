import type { TransferPolicy } from "../config";
import type { Transferable } from "../table/buffer-pair";
import type { ConfigBlob } from "../table/config-blob";
import type { Table } from "../table/table";
import { PipelineConfigError } from "./engine-errors";

// ============================================================================
// Declarations
// ============================================================================

export type StageDecl = {
  name: string;
  kernel: string;
  inputs: Table[];
  output: Table;
  config: ConfigBlob;
  usesScratch?: boolean;
};

export type HostStepFn = (inputs: readonly Table[], output: Table) => void | Promise<void>;

export type HostStepDecl = {
  name: string;
  inputs: Table[];
  output: Table;
  run: HostStepFn;
};

export type ProgramStep =
  | { kind: "stage"; decl: StageDecl }
  | { kind: "host"; decl: HostStepDecl };

export type PipelineDecl = {
  steps: readonly ProgramStep[];
  readBacks: readonly Table[];
};

// ============================================================================
// Plan
// ============================================================================

type PlanNodeBase = {
  index: number;
  name: string;
  /** Resources read, as `<buffer>@host` / `<buffer>@device` or `scratch`. */
  reads: string[];
  writes: string[];
  /** Indices of the nodes this one waits for, transitively reduced. */
  deps: number[];
};

export type TransferNode = PlanNodeBase & {
  kind: "h2d" | "d2h";
  items: Transferable[];
  /** Issued up front with no producer to wait for. */
  eager: boolean;
};

export type StageNode = PlanNodeBase & { kind: "stage"; stage: StageDecl };

export type HostNode = PlanNodeBase & { kind: "host"; step: HostStepDecl };

export type PlanNode = TransferNode | StageNode | HostNode;

export type PipelinePlan = {
  policy: TransferPolicy;
  nodes: PlanNode[];
  readBacks: Table[];
};

export type PlanNodeSummary = {
  name: string;
  kind: PlanNode["kind"];
  items: string[];
  deps: string[];
};

export const SCRATCH_RESOURCE = "scratch";

const onHost = (item: Transferable): string => `${item.label}@host`;
const onDevice = (item: Transferable): string => `${item.label}@device`;

type Residency = { host: boolean; device: boolean };

type Draft =
  | Omit<TransferNode, "index" | "deps">
  | Omit<StageNode, "index" | "deps">
  | Omit<HostNode, "index" | "deps">;

// ============================================================================
// Validation
// ============================================================================

function validate(decl: PipelineDecl): void {
  if (decl.steps.length === 0) {
    throw new PipelineConfigError("Pipeline has no steps");
  }
  const stepNames = new Set<string>();
  const buffers = new Map<string, Transferable>();
  const register = (item: Transferable): void => {
    const existing = buffers.get(item.label);
    if (existing && existing !== item) {
      throw new PipelineConfigError(`Two different buffers are named ${item.label}`);
    }
    buffers.set(item.label, item);
  };

  for (const step of decl.steps) {
    const { name, inputs, output } = step.decl;
    if (stepNames.has(name)) {
      throw new PipelineConfigError(`Duplicate step name ${name}`);
    }
    stepNames.add(name);
    if (inputs.length === 0) {
      throw new PipelineConfigError(`Step ${name} has no inputs`);
    }
    if (inputs.includes(output)) {
      throw new PipelineConfigError(`Step ${name} reads and writes ${output.name}`);
    }
    inputs.forEach(register);
    register(output);
    if (step.kind === "stage") {
      register(step.decl.config);
    }
  }

  for (const table of decl.readBacks) {
    if (buffers.get(table.label) !== table) {
      throw new PipelineConfigError(
        `Read-back table ${table.name} is not used by any step`,
      );
    }
  }
}

// ============================================================================
// Eager transfers
// ============================================================================

/**
 * Items without a producer that a stage reads: tables still holding what was
 * loaded into them, and every config blob. Grouped by first consuming stage.
 */
function collectEager(steps: readonly ProgramStep[]): Map<string, Transferable[]> {
  const written = new Set<Transferable>();
  const claimed = new Set<Transferable>();
  const byStage = new Map<string, Transferable[]>();

  for (const step of steps) {
    if (step.kind === "stage") {
      const fresh: Transferable[] = [];
      for (const item of [...step.decl.inputs, step.decl.config]) {
        if (written.has(item) || claimed.has(item)) continue;
        claimed.add(item);
        fresh.push(item);
      }
      if (fresh.length > 0) {
        byStage.set(step.decl.name, fresh);
      }
    }
    written.add(step.decl.output);
  }
  return byStage;
}

function eagerDrafts(
  byStage: Map<string, Transferable[]>,
  policy: TransferPolicy,
): Draft[] {
  const transfer = (name: string, items: Transferable[]): Draft => ({
    kind: "h2d",
    name,
    items,
    eager: true,
    reads: items.map(onHost),
    writes: items.map(onDevice),
  });

  if (policy === "batched") {
    const items = Array.from(byStage.values()).flat();
    return items.length === 0 ? [] : [transfer("h2d:eager", items)];
  }
  return Array.from(byStage, ([stage, items]) => transfer(`h2d:eager:${stage}`, items));
}

// ============================================================================
// Residency
// ============================================================================

/**
 * Walk the program in order, inserting the transfers each consumer needs so
 * that it sees a valid copy of every input where it runs.
 */
function residencyDrafts(decl: PipelineDecl, eager: readonly Draft[]): Draft[] {
  const residency = new Map<Transferable, Residency>();
  const where = (item: Transferable): Residency => {
    let state = residency.get(item);
    if (!state) {
      state = { host: true, device: false };
      residency.set(item, state);
    }
    return state;
  };
  for (const draft of eager) {
    if (draft.kind !== "h2d") continue;
    for (const item of draft.items) {
      where(item).device = true;
    }
  }

  const drafts: Draft[] = [];
  for (const step of decl.steps) {
    if (step.kind === "stage") {
      const stage = step.decl;
      const missing = [...stage.inputs, stage.config].filter(
        (item) => !where(item).device,
      );
      if (missing.length > 0) {
        drafts.push({
          kind: "h2d",
          name: `h2d:${missing.map((item) => item.label).join(",")}`,
          items: missing,
          eager: false,
          reads: missing.map(onHost),
          writes: missing.map(onDevice),
        });
        for (const item of missing) {
          where(item).device = true;
        }
      }
      drafts.push({
        kind: "stage",
        name: stage.name,
        stage,
        reads: [...stage.inputs, stage.config].map(onDevice),
        writes: [
          onDevice(stage.output),
          ...(stage.usesScratch ? [SCRATCH_RESOURCE] : []),
        ],
      });
      residency.set(stage.output, { host: false, device: true });
    } else {
      const host = step.decl;
      const stale = host.inputs.filter((table) => !where(table).host);
      // Reading device-produced data on the host stalls the pipeline here.
      for (const table of stale) {
        drafts.push(deviceToHost(table));
        where(table).host = true;
      }
      drafts.push({
        kind: "host",
        name: host.name,
        step: host,
        reads: host.inputs.map(onHost),
        writes: [onHost(host.output)],
      });
      residency.set(host.output, { host: true, device: false });
    }
  }

  for (const table of decl.readBacks) {
    if (!where(table).host) {
      drafts.push(deviceToHost(table));
      where(table).host = true;
    }
  }
  return drafts;
}

function deviceToHost(table: Table): Draft {
  return {
    kind: "d2h",
    name: `d2h:${table.name}`,
    items: [table],
    eager: false,
    reads: [onDevice(table)],
    writes: [onHost(table)],
  };
}

// ============================================================================
// Hazards
// ============================================================================

/**
 * Read-after-write, write-after-read and write-after-write edges per
 * resource, in node order. Every edge points to an earlier node.
 */
function hazardEdges(drafts: readonly Draft[]): Set<number>[] {
  const lastWriter = new Map<string, number>();
  const readersSinceWrite = new Map<string, number[]>();

  return drafts.map((draft, index) => {
    const deps = new Set<number>();
    for (const resource of draft.reads) {
      const writer = lastWriter.get(resource);
      if (writer !== undefined) deps.add(writer);
    }
    for (const resource of draft.writes) {
      const writer = lastWriter.get(resource);
      if (writer !== undefined) deps.add(writer);
      for (const reader of readersSinceWrite.get(resource) ?? []) {
        deps.add(reader);
      }
    }
    for (const resource of draft.reads) {
      const readers = readersSinceWrite.get(resource) ?? [];
      readers.push(index);
      readersSinceWrite.set(resource, readers);
    }
    for (const resource of draft.writes) {
      lastWriter.set(resource, index);
      readersSinceWrite.set(resource, []);
    }
    deps.delete(index);
    return deps;
  });
}

/**
 * Drop every edge implied by a longer path. Requires edges to point to
 * earlier nodes, which holds for anything `hazardEdges` produces.
 */
export function transitiveReduction(edges: readonly ReadonlySet<number>[]): number[][] {
  const ancestors: Set<number>[] = [];
  return edges.map((deps, index) => {
    const reach = new Set<number>();
    for (const dep of deps) {
      if (dep >= index) {
        throw new PipelineConfigError(`Edge ${dep} -> ${index} is not acyclic`);
      }
      reach.add(dep);
      for (const upstream of ancestors[dep]) reach.add(upstream);
    }
    ancestors.push(reach);
    const kept = Array.from(deps).filter(
      (dep) =>
        !Array.from(deps).some(
          (other) => other !== dep && ancestors[other].has(dep),
        ),
    );
    return kept.sort((a, b) => a - b);
  });
}

// ============================================================================
// Entry point
// ============================================================================

export function buildPipelinePlan(
  decl: PipelineDecl,
  policy: TransferPolicy,
): PipelinePlan {
  validate(decl);

  const eager = eagerDrafts(collectEager(decl.steps), policy);
  const drafts = [...eager, ...residencyDrafts(decl, eager)];
  const edges = hazardEdges(drafts);

  // Staged eager transfers form one chain so earlier stages' inputs land first.
  for (let i = 1; i < eager.length; i++) {
    edges[i].add(i - 1);
  }

  const deps = transitiveReduction(edges);
  const nodes: PlanNode[] = drafts.map((draft, index) => ({
    ...draft,
    index,
    deps: deps[index],
  }));
  return { policy, nodes, readBacks: decl.readBacks.slice() };
}

export function summarizePlan(plan: PipelinePlan): PlanNodeSummary[] {
  return plan.nodes.map((node) => ({
    name: node.name,
    kind: node.kind,
    items: node.kind === "h2d" || node.kind === "d2h"
      ? node.items.map((item) => item.label)
      : [],
    deps: node.deps.map((dep) => plan.nodes[dep].name),
  }));
}
