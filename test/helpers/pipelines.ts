/**
 * Synthetic join chains over the sim backend.
 *
 * A fact table (k, v) is probed against one dimension table per stage; stage
 * outputs alternate between two ping-pong tables. Dimension j drops every key
 * divisible by j + 2, so the final output holds the fact rows whose key
 * survives every dimension, in fact order.
 */
import {
  ConfigBlob,
  createSimContext,
  encodeJoinConfig,
  type Logger,
  MemorySource,
  PipelineOrchestrator,
  type Row,
  ScratchBufferPool,
  type SimContextOptions,
  type SimDeviceContext,
  Table,
  type TransferPolicy,
} from "../../src";

export type ChainOptions = {
  stages: number;
  rows?: number;
  keys?: number;
  policy?: TransferPolicy;
  /** Keep only the first half of the fact rows, on the host, before stage 0. */
  hostFilter?: boolean;
  usesScratch?: boolean;
  sim?: SimContextOptions;
  logger?: Logger;
  profile?: boolean;
};

export type JoinChain = {
  context: SimDeviceContext;
  orchestrator: PipelineOrchestrator;
  fact: Table;
  dims: Table[];
  outputs: [Table, Table];
  final: Table;
  scratch: ScratchBufferPool | null;
  expected: Row[];
};

const intColumns = (...names: string[]) => names.map((name) => ({ name, width: 4 }));

export function factRows(rows: number, keys: number): Row[] {
  return Array.from({ length: rows }, (_, i) => [i % keys, i]);
}

export function dimRows(stage: number, keys: number): Row[] {
  const rows: Row[] = [];
  for (let k = 0; k < keys; k++) {
    if (k % (stage + 2) !== 0) rows.push([k, k * 10 + stage]);
  }
  return rows;
}

export function expectedRows(options: ChainOptions): Row[] {
  const rows = options.rows ?? 48;
  const keys = options.keys ?? 16;
  return factRows(rows, keys).filter(([k, v]) => {
    if (options.hostFilter && Number(v) >= rows / 2) return false;
    for (let stage = 0; stage < options.stages; stage++) {
      if (Number(k) % (stage + 2) === 0) return false;
    }
    return true;
  });
}

export async function buildJoinChain(options: ChainOptions): Promise<JoinChain> {
  const rows = options.rows ?? 48;
  const keys = options.keys ?? 16;
  const context = createSimContext(options.sim);
  const source = new MemorySource({ fact: factRows(rows, keys) });

  const fact = new Table({ name: "fact", capacity: rows, columns: intColumns("k", "v") });
  fact.allocateHost();
  await fact.load(source);

  const dims: Table[] = [];
  for (let stage = 0; stage < options.stages; stage++) {
    const dim = new Table({ name: `dim${stage}`, capacity: keys, columns: intColumns("k", "w") });
    source.set(dim.name, dimRows(stage, keys));
    dim.allocateHost();
    await dim.load(source);
    dims.push(dim);
  }

  const outputs: [Table, Table] = [
    new Table({ name: "tk0", capacity: rows, columns: intColumns("k", "v") }),
    new Table({ name: "tk1", capacity: rows, columns: intColumns("k", "v") }),
  ];
  const scratch = options.usesScratch ? new ScratchBufferPool([256, 128]) : null;
  const orchestrator = new PipelineOrchestrator(context, {
    policy: options.policy ?? "batched",
    scratch,
    logger: options.logger,
    profile: options.profile ?? false,
  });

  let probe = fact;
  if (options.hostFilter) {
    const filtered = new Table({ name: "fact_head", capacity: rows, columns: intColumns("k", "v") });
    orchestrator.addHostStep({
      name: "prefilter",
      inputs: [fact],
      output: filtered,
      run: ([input], output) => {
        for (const row of input.rows()) {
          if (Number(row[1]) < rows / 2) output.appendRow(row);
        }
      },
    });
    probe = filtered;
  }

  for (let stage = 0; stage < options.stages; stage++) {
    const config = new ConfigBlob(stage);
    config.allocateHost();
    encodeJoinConfig(config, { buildKey: 0, probeKey: 0, project: [[1, 0], [1, 1]] });
    const output = outputs[stage % 2];
    orchestrator.addStage({
      name: `stage${stage}`,
      kernel: "hash-join",
      inputs: [dims[stage], probe],
      output,
      config,
      usesScratch: options.usesScratch,
    });
    probe = output;
  }

  orchestrator.readBack(probe);
  return {
    context,
    orchestrator,
    fact,
    dims,
    outputs,
    final: probe,
    scratch,
    expected: expectedRows(options),
  };
}
