import {
  ConfigBlob,
  createContext,
  createSimContext,
  encodeJoinConfig,
  type PipelineResult,
  PipelineOrchestrator,
  registerBackend,
  type SimOperation,
  Table,
  type TransferPolicy,
} from "../../src";
import type { BenchCase } from "../types";

const columns = [
  { name: "k", width: 4 },
  { name: "v", width: 4 },
];

/** Roughly a PCIe-class link: 1 ms per 8 MB, plus a fixed launch cost. */
function latency(op: SimOperation): number {
  return op.kind === "transfer" ? 0.2 + op.bytes / 8e6 : 1 + op.bytes / 32e6;
}

/** The sim device behind a single-DMA-channel, single-compute-unit link. */
export const PCIE_SIM_BACKEND = registerBackend({
  name: "sim-pcie",
  createContext: (options) =>
    createSimContext({ ...options, latency, dmaChannels: 1, computeUnits: 1 }),
}).name;

function filledTable(name: string, capacity: number, rows: (row: number) => [number, number] | null): Table {
  const table = new Table({ name, capacity, columns });
  table.allocateHost();
  for (let row = 0; row < capacity; row++) {
    const values = rows(row);
    if (values) table.appendRow(values);
  }
  return table;
}

/** Build and run one fresh five-stage join chain over `rows` fact rows. */
export async function runJoinChain(
  policy: TransferPolicy,
  stages: number,
  rows: number,
  keys: number,
  backend: string = PCIE_SIM_BACKEND,
): Promise<PipelineResult> {
  const context = createContext({}, backend);
  const orchestrator = new PipelineOrchestrator(context, { policy, profile: false });
  const outputs = [new Table({ name: "tk0", capacity: rows, columns }), new Table({ name: "tk1", capacity: rows, columns })];

  let probe = filledTable("fact", rows, (row) => [row % keys, row]);
  for (let stage = 0; stage < stages; stage++) {
    const dim = filledTable(`dim${stage}`, keys, (k) => (k % (stage + 2) === 0 ? null : [k, stage]));
    const config = new ConfigBlob(stage);
    config.allocateHost();
    encodeJoinConfig(config, { buildKey: 0, probeKey: 0, project: [[1, 0], [1, 1]] });
    const output = outputs[stage % 2];
    orchestrator.addStage({ name: `stage${stage}`, kernel: "hash-join", inputs: [dim, probe], output, config });
    probe = output;
  }
  orchestrator.readBack(probe);
  try {
    return await orchestrator.run();
  } finally {
    await context.idle();
    context.destroy();
  }
}

export function createJoinChainSuite(): BenchCase[] {
  const cases: BenchCase[] = [];
  for (const rows of [10_000, 100_000]) {
    for (const policy of ["batched", "staged"] as const) {
      cases.push({
        name: `join-chain.${policy}.5x${rows}`,
        rows,
        run: async () => {
          await runJoinChain(policy, 5, rows, 1024);
        },
      });
    }
  }
  return cases;
}
