export type BenchCase = {
  name: string;
  run?: () => Promise<void>;
  /** Fact rows pushed through the chain per run. */
  rows?: number;
  skip?: string;
};

export type BenchResult =
  | {
      name: string;
      status: "skipped";
      reason: string;
    }
  | {
      name: string;
      status: "ok";
      iterations: number;
      msMedian: number;
      rowsPerSec?: number;
      /** Share of transfer time hidden behind kernel execution, 0..1. */
      overlap?: number;
    };

/** One log line per result: median latency, then throughput and overlap when known. */
export function formatBenchResult(result: BenchResult): string {
  if (result.status === "skipped") {
    return `${result.name}: skipped (${result.reason})`;
  }
  const fields = [`${result.msMedian.toFixed(3)} ms`];
  if (result.rowsPerSec !== undefined) {
    fields.push(`${(result.rowsPerSec / 1e6).toFixed(2)} Mrows/s`);
  }
  if (result.overlap !== undefined) {
    fields.push(`overlap=${(result.overlap * 100).toFixed(1)}%`);
  }
  return `${result.name}: ${fields.join(" ")}`;
}
