import { describe, expect, it } from "vitest";
import {
  groupAggregate,
  PipelineConfigError,
  PostProcessor,
  sortTable,
  Table,
  TableLayoutError,
} from "../src";
import { buildJoinChain } from "./helpers/pipelines";

function sales(): Table {
  const table = new Table({
    name: "sales",
    capacity: 8,
    columns: [
      { name: "region", width: 6, kind: "bytes" },
      { name: "item", width: 4 },
      { name: "qty", width: 2 },
      { name: "price", width: 4 },
    ],
  });
  table.allocateHost();
  for (const row of [
    ["east", 1, 3, 100],
    ["west", 2, 1, 50],
    ["east", 1, 2, 90],
    ["east", 2, 5, 10],
    ["west", 2, 4, 70],
  ]) {
    table.appendRow(row);
  }
  return table;
}

describe("groupAggregate", () => {
  it("folds every aggregate per group in first-appearance order", () => {
    const out = groupAggregate(sales(), {
      name: "by_region",
      keys: ["region"],
      aggregates: [
        { op: "count", as: "n" },
        { op: "sum", column: "qty", as: "q" },
        { op: "min", column: "price", as: "lo" },
        { op: "max", column: "price", as: "hi" },
      ],
    });

    expect(out.name).toBe("by_region");
    expect(out.columns.map((column) => [column.name, column.width])).toEqual([
      ["region", 6],
      ["n", 8],
      ["q", 8],
      ["lo", 4],
      ["hi", 4],
    ]);
    expect(out.rows()).toEqual([
      ["east", 3, 10, 10, 100],
      ["west", 2, 5, 50, 70],
    ]);
  });

  it("groups by several keys", () => {
    const out = groupAggregate(sales(), {
      name: "by_item",
      keys: ["region", "item"],
      aggregates: [{ op: "sum", column: "qty", as: "q" }],
    });

    expect(out.rows()).toEqual([
      ["east", 1, 5],
      ["west", 2, 5],
      ["east", 2, 5],
    ]);
  });

  it("rejects bad columns and undersized outputs", () => {
    expect(() =>
      groupAggregate(sales(), {
        name: "x",
        keys: ["region"],
        aggregates: [{ op: "sum", column: "region", as: "s" }],
      }),
    ).toThrow(PipelineConfigError);
    expect(() =>
      groupAggregate(sales(), { name: "x", keys: ["nope"], aggregates: [] }),
    ).toThrow("sales has no column nope");
    expect(() =>
      groupAggregate(sales(), { name: "x", keys: ["item"], aggregates: [], capacity: 1 }),
    ).toThrow(TableLayoutError);
  });
});

describe("sortTable", () => {
  it("sorts descending by one key", () => {
    const out = sortTable(sales(), [{ column: "price", descending: true }]);

    expect(out.name).toBe("sales_sorted");
    expect(out.rows().map((row) => row[3])).toEqual([100, 90, 70, 50, 10]);
  });

  it("keeps input order among equal keys", () => {
    expect(sortTable(sales(), ["item"], "by_item").rows()).toEqual([
      ["east", 1, 3, 100],
      ["east", 1, 2, 90],
      ["west", 2, 1, 50],
      ["east", 2, 5, 10],
      ["west", 2, 4, 70],
    ]);
  });

  it("breaks ties with later keys", () => {
    const out = sortTable(sales(), ["region", { column: "qty", descending: true }]);

    expect(out.rows().map((row) => [row[0], row[2]])).toEqual([
      ["east", 5],
      ["east", 3],
      ["east", 2],
      ["west", 4],
      ["west", 1],
    ]);
  });
});

describe("PostProcessor", () => {
  it("chains steps over a sealed table and seals each result", async () => {
    const input = sales();
    input.seal();
    const out = await new PostProcessor()
      .groupBy({
        name: "revenue",
        keys: ["region"],
        aggregates: [{ op: "sum", column: "price", as: "revenue" }],
      })
      .sortBy(["revenue"])
      .process(input);

    expect(out.rows()).toEqual([
      ["west", 120],
      ["east", 200],
    ]);
    expect(out.sealed).toBe(true);
  });

  it("refuses tables that no pipeline has sealed", async () => {
    await expect(new PostProcessor().process(sales())).rejects.toBeInstanceOf(PipelineConfigError);
  });

  it("finishes a pipeline result", async () => {
    const chain = await buildJoinChain({ stages: 2 });
    const result = await chain.orchestrator.run();
    const counts = await new PostProcessor()
      .groupBy({ name: "per_key", keys: ["k"], aggregates: [{ op: "count", as: "n" }] })
      .processResult(result, "tk1");

    expect(counts.rows()).toEqual([
      [1, 3],
      [5, 3],
      [7, 3],
      [11, 3],
      [13, 3],
    ]);
  });
});
