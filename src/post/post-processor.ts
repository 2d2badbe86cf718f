import { PipelineConfigError } from "../engine/engine-errors";
import type { PipelineResult } from "../engine/orchestrator";
import { createLogger, type Logger } from "../logger";
import type { Table } from "../table/table";
import { type GroupAggregateOptions, groupAggregate } from "./group-by";
import { type SortKey, sortTable } from "./sort";

export type PostStep = (input: Table) => Table | Promise<Table>;

/**
 * CPU-side finishing over a pipeline's final table. Steps run in the order
 * they were added; each one's output is sealed before the next consumes it.
 */
export class PostProcessor {
  private readonly steps: { name: string; fn: PostStep }[] = [];

  constructor(private readonly logger: Logger = createLogger("post")) {}

  groupBy(options: GroupAggregateOptions): this {
    return this.step(`group-by(${options.keys.join(",")})`, (input) =>
      groupAggregate(input, options),
    );
  }

  sortBy(keys: ReadonlyArray<SortKey | string>, name?: string): this {
    const label = keys.map((key) => (typeof key === "string" ? key : key.column));
    return this.step(`sort(${label.join(",")})`, (input) => sortTable(input, keys, name));
  }

  step(name: string, fn: PostStep): this {
    this.steps.push({ name, fn });
    return this;
  }

  async process(input: Table): Promise<Table> {
    if (!input.sealed) {
      throw new PipelineConfigError(
        `${input.name} must be sealed by a finished pipeline before post-processing`,
      );
    }
    let current = input;
    for (const step of this.steps) {
      const next = await step.fn(current);
      next.seal();
      this.logger.debug(`${step.name}: ${current.rowCount} -> ${next.rowCount} rows`);
      current = next;
    }
    return current;
  }

  processResult(result: PipelineResult, table: string): Promise<Table> {
    return this.process(result.output(table));
  }
}
