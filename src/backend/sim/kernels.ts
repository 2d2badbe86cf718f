import { InvocationError } from "../../engine/engine-errors";
import type { ConfigBlob } from "../../table/config-blob";
import type { TableView } from "../../table/view";

export type KernelInvocation = {
  label: string;
  config: Uint8Array;
  inputs: TableView[];
  output: TableView;
  scratch: Uint8Array[];
};

/** Synchronous stand-in for an accelerator program. */
export type KernelFn = (invocation: KernelInvocation) => void;

export type KernelRegistry = Map<string, KernelFn>;

// ============================================================================
// Config encoding
// ============================================================================

/** Projection entry: which input (0 = build/left, 1 = probe/right) and column. */
export type Projection = [side: number, column: number];

export type JoinConfig = {
  buildKey: number;
  probeKey: number;
  project: Projection[];
};

export type FilterOp = "eq" | "ne" | "lt" | "le" | "gt" | "ge";

export type FilterConfig = {
  column: number;
  op: FilterOp;
  value: number;
  project: number[];
};

const FILTER_OPS: readonly FilterOp[] = ["eq", "ne", "lt", "le", "gt", "ge"];

export function encodeJoinConfig(blob: ConfigBlob, config: JoinConfig): void {
  blob.setWords([
    config.buildKey,
    config.probeKey,
    config.project.length,
    ...config.project.map(([side, column]) => (side << 16) | column),
  ]);
}

export function encodeFilterConfig(blob: ConfigBlob, config: FilterConfig): void {
  blob.setWords([
    config.column,
    FILTER_OPS.indexOf(config.op),
    config.value,
    config.project.length,
    ...config.project,
  ]);
}

function readWords(config: Uint8Array): (index: number) => number {
  const data = new DataView(config.buffer, config.byteOffset, config.byteLength);
  return (index) => {
    if ((index + 1) * 4 > config.byteLength) {
      throw new InvocationError(`Config word ${index} out of range`);
    }
    return data.getUint32(index * 4, true);
  };
}

function requireInputs(invocation: KernelInvocation, count: number): void {
  if (invocation.inputs.length !== count) {
    throw new InvocationError(
      `${invocation.label}: expected ${count} inputs, got ${invocation.inputs.length}`,
    );
  }
}

function requireOutputColumns(invocation: KernelInvocation, count: number): void {
  const actual = invocation.output.layout.columns.length;
  if (actual !== count) {
    throw new InvocationError(
      `${invocation.label}: projection has ${count} columns, output has ${actual}`,
    );
  }
}

function ensureRoom(invocation: KernelInvocation, rows: number): void {
  if (rows > invocation.output.capacity) {
    throw new InvocationError(
      `${invocation.label}: output overflow, ${rows} rows exceed capacity ${invocation.output.capacity}`,
    );
  }
}

// ============================================================================
// Reference kernels
// ============================================================================

/**
 * Inner equi-join. Rows come out in probe order, and for each probe row in
 * build order.
 */
export const hashJoinKernel: KernelFn = (invocation) => {
  requireInputs(invocation, 2);
  const word = readWords(invocation.config);
  const buildKey = word(0);
  const probeKey = word(1);
  const count = word(2);
  const project: Projection[] = [];
  for (let i = 0; i < count; i++) {
    const packed = word(3 + i);
    project.push([packed >>> 16, packed & 0xffff]);
  }
  requireOutputColumns(invocation, project.length);

  const [build, probe] = invocation.inputs;
  const index = new Map<number, number[]>();
  for (let row = 0; row < build.rowCount; row++) {
    const key = build.getInt(buildKey, row);
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }

  const output = invocation.output;
  let produced = 0;
  for (let row = 0; row < probe.rowCount; row++) {
    const matches = index.get(probe.getInt(probeKey, row));
    if (!matches) continue;
    for (const buildRow of matches) {
      ensureRoom(invocation, produced + 1);
      project.forEach(([side, column], target) => {
        if (side === 0) {
          output.copyCell(build, column, buildRow, target, produced);
        } else {
          output.copyCell(probe, column, row, target, produced);
        }
      });
      produced++;
    }
  }
  output.rowCount = produced;
};

function compare(op: FilterOp, left: number, right: number): boolean {
  switch (op) {
    case "eq":
      return left === right;
    case "ne":
      return left !== right;
    case "lt":
      return left < right;
    case "le":
      return left <= right;
    case "gt":
      return left > right;
    case "ge":
      return left >= right;
  }
}

/** Keeps rows whose int column satisfies `column <op> value`. */
export const filterKernel: KernelFn = (invocation) => {
  requireInputs(invocation, 1);
  const word = readWords(invocation.config);
  const column = word(0);
  const op = FILTER_OPS[word(1)];
  if (op === undefined) {
    throw new InvocationError(`${invocation.label}: unknown filter op ${word(1)}`);
  }
  const value = word(2) | 0;
  const count = word(3);
  const project: number[] = [];
  for (let i = 0; i < count; i++) {
    project.push(word(4 + i));
  }
  requireOutputColumns(invocation, project.length);

  const [input] = invocation.inputs;
  const output = invocation.output;
  let produced = 0;
  for (let row = 0; row < input.rowCount; row++) {
    if (!compare(op, input.getInt(column, row), value)) continue;
    ensureRoom(invocation, produced + 1);
    project.forEach((source, target) => {
      output.copyCell(input, source, row, target, produced);
    });
    produced++;
  }
  output.rowCount = produced;
};

export function referenceKernels(): KernelRegistry {
  return new Map<string, KernelFn>([
    ["hash-join", hashJoinKernel],
    ["filter", filterKernel],
  ]);
}
