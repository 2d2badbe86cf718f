import { PipelineConfigError } from "../engine/engine-errors";
import { Table } from "../table/table";
import type { CellValue } from "../table/view";

export type SortKey = { column: string; descending?: boolean };

function compareCells(left: CellValue, right: CellValue): number {
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stable multi-key sort into a new host table with the same columns. Rows
 * equal on every key keep their input order.
 */
export function sortTable(
  input: Table,
  keys: ReadonlyArray<SortKey | string>,
  name = `${input.name}_sorted`,
): Table {
  if (keys.length === 0) {
    throw new PipelineConfigError("sortTable needs at least one key");
  }
  const resolved = keys.map((key) => (typeof key === "string" ? { column: key } : key));
  for (const key of resolved) {
    if (!input.columns.some((column) => column.name === key.column)) {
      throw new PipelineConfigError(`${input.name} has no column ${key.column}`);
    }
  }

  const source = input.view();
  const order = Array.from({ length: source.rowCount }, (_, row) => row);
  const cells = resolved.map((key) => order.map((row) => source.get(key.column, row)));
  order.sort((a, b) => {
    for (let k = 0; k < resolved.length; k++) {
      const result = compareCells(cells[k][a], cells[k][b]);
      if (result !== 0) return resolved[k].descending ? -result : result;
    }
    return 0;
  });

  const output = new Table({
    name,
    capacity: source.rowCount,
    alignment: input.alignment,
    columns: input.columns.map((column) => ({
      name: column.name,
      width: column.width,
      kind: column.kind,
    })),
  });
  output.allocateHost();
  const target = output.view();
  order.forEach((row, index) => {
    for (const column of source.layout.columns) {
      target.copyCell(source, column.index, row, column.index, index);
    }
  });
  target.rowCount = order.length;
  return output;
}
