import fs from "node:fs";
import path from "node:path";
import { performance } from "node:perf_hooks";

import { createLogger, type PipelineProfile } from "../src";
import { createJoinChainSuite, runJoinChain } from "./suites/join-chain";
import { type BenchCase, type BenchResult, formatBenchResult } from "./types";

const warmupIters = Number.parseInt(process.env.BENCH_WARMUP ?? "2", 10);
const runIters = Number.parseInt(process.env.BENCH_ITERS ?? "5", 10);
const logger = createLogger("bench", "info");

function median(values: number[]): number {
  const sorted = values.slice().sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

/** Fraction of transfer busy time that ran while a kernel was also running. */
function overlapOf(profile: PipelineProfile): number {
  const spans = (kind: "transfer" | "invoke") =>
    profile.entries.flatMap((entry) =>
      entry.kind === kind && entry.startMs !== null && entry.endMs !== null
        ? [[entry.startMs, entry.endMs] as const]
        : [],
    );
  const kernels = spans("invoke");
  let hidden = 0;
  for (const [start, end] of spans("transfer")) {
    for (const [kStart, kEnd] of kernels) {
      hidden += Math.max(0, Math.min(end, kEnd) - Math.max(start, kStart));
    }
  }
  return profile.busyMs.transfer > 0 ? hidden / profile.busyMs.transfer : 0;
}

async function runCase(benchCase: BenchCase): Promise<BenchResult> {
  if (benchCase.skip || !benchCase.run) {
    return {
      name: benchCase.name,
      status: "skipped",
      reason: benchCase.skip ?? "missing run",
    };
  }

  for (let i = 0; i < warmupIters; i += 1) {
    await benchCase.run();
  }

  const durations: number[] = [];
  for (let i = 0; i < runIters; i += 1) {
    const start = performance.now();
    await benchCase.run();
    durations.push(performance.now() - start);
  }

  const msMedian = median(durations);
  const seconds = msMedian / 1000;
  return {
    name: benchCase.name,
    status: "ok",
    iterations: runIters,
    msMedian,
    rowsPerSec: benchCase.rows && seconds > 0 ? benchCase.rows / seconds : undefined,
  };
}

async function run(): Promise<void> {
  const results: BenchResult[] = [];
  for (const benchCase of createJoinChainSuite()) {
    results.push(await runCase(benchCase));
  }
  for (const policy of ["batched", "staged"] as const) {
    const { profile } = await runJoinChain(policy, 5, 100_000, 1024);
    results.push({
      name: `join-chain.${policy}.overlap`,
      status: "ok",
      iterations: 1,
      msMedian: profile.totalMs,
      overlap: overlapOf(profile),
    });
  }

  const output = {
    timestamp: new Date().toISOString(),
    warmupIters,
    runIters,
    results,
  };
  const outDir = path.resolve("bench", "results");
  fs.mkdirSync(outDir, { recursive: true });
  fs.writeFileSync(path.join(outDir, "latest.json"), JSON.stringify(output, null, 2));

  for (const result of results) {
    logger.info(formatBenchResult(result));
  }
}

run().catch((error: unknown) => {
  logger.error("bench failed", error);
  process.exitCode = 1;
});
