import { PipelineConfigError, TableLayoutError } from "../engine/engine-errors";
import type { ColumnDef } from "../table/layout";
import { Table } from "../table/table";
import type { CellValue, TableView } from "../table/view";

export type AggregateOp = "sum" | "count" | "min" | "max";

export type AggregateSpec =
  | { op: "count"; as: string }
  | { op: "sum" | "min" | "max"; column: string; as: string };

export type GroupAggregateOptions = {
  /** Name of the produced table. */
  name: string;
  keys: string[];
  aggregates: AggregateSpec[];
  /** Defaults to the number of groups found. */
  capacity?: number;
};

type Group = { key: CellValue[]; state: (number | null)[] };

/** Width of sum and count columns; wide enough for any safe integer. */
const WIDE = 8;

function outputColumn(input: Table, aggregate: AggregateSpec): ColumnDef {
  if (aggregate.op === "count") {
    return { name: aggregate.as, width: WIDE, kind: "int", rowId: false };
  }
  const source = input.columns.find((column) => column.name === aggregate.column);
  if (!source) {
    throw new PipelineConfigError(`${input.name} has no column ${aggregate.column}`);
  }
  if (source.kind !== "int") {
    throw new PipelineConfigError(
      `Cannot ${aggregate.op} bytes column ${input.name}.${aggregate.column}`,
    );
  }
  return {
    name: aggregate.as,
    width: aggregate.op === "sum" ? WIDE : source.width,
    kind: "int",
    rowId: false,
  };
}

function fold(
  aggregate: AggregateSpec,
  current: number | null,
  view: TableView,
  row: number,
): number {
  if (aggregate.op === "count") return (current ?? 0) + 1;
  const value = view.getInt(aggregate.column, row);
  if (current === null) return value;
  switch (aggregate.op) {
    case "sum":
      return current + value;
    case "min":
      return Math.min(current, value);
    case "max":
      return Math.max(current, value);
  }
}

/**
 * Group `input` by its key columns and fold each aggregate over the group.
 * Groups appear in the order their first row does.
 */
export function groupAggregate(input: Table, options: GroupAggregateOptions): Table {
  if (options.keys.length === 0) {
    throw new PipelineConfigError("groupAggregate needs at least one key column");
  }
  const keyColumns = options.keys.map((key) => {
    const column = input.columns.find((candidate) => candidate.name === key);
    if (!column) {
      throw new PipelineConfigError(`${input.name} has no column ${key}`);
    }
    return column;
  });
  const aggregateColumns = options.aggregates.map((aggregate) => outputColumn(input, aggregate));

  const view = input.view();
  const groups = new Map<string, Group>();
  for (let row = 0; row < view.rowCount; row++) {
    const key = keyColumns.map((column) => view.get(column.name, row));
    const id = JSON.stringify(key);
    let group = groups.get(id);
    if (!group) {
      group = { key, state: options.aggregates.map(() => null) };
      groups.set(id, group);
    }
    const { state } = group;
    options.aggregates.forEach((aggregate, index) => {
      state[index] = fold(aggregate, state[index], view, row);
    });
  }

  const capacity = options.capacity ?? groups.size;
  if (groups.size > capacity) {
    throw new TableLayoutError(
      `${options.name}: ${groups.size} groups exceed capacity ${capacity}`,
    );
  }
  const output = new Table({
    name: options.name,
    capacity,
    alignment: input.alignment,
    columns: [...keyColumns, ...aggregateColumns].map((column) => ({
      name: column.name,
      width: column.width,
      kind: column.kind,
    })),
  });
  output.allocateHost();
  for (const { key, state } of groups.values()) {
    output.appendRow([...key, ...state.map((value) => value ?? 0)]);
  }
  return output;
}
