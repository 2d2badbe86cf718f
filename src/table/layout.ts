import { isPowerOfTwo } from "../config";
import { TableLayoutError } from "../engine/engine-errors";

export type ColumnKind = "int" | "bytes";

export type ColumnOptions = {
  /** Defaults to "int"; widths other than 1, 2, 4 or 8 must be "bytes". */
  kind?: ColumnKind;
  /** Filled with the row index on load instead of being read from storage. */
  rowId?: boolean;
};

export type ColumnDef = {
  name: string;
  width: number;
  kind: ColumnKind;
  rowId: boolean;
};

export type ColumnLayout = ColumnDef & {
  index: number;
  /** Byte offset of the column region from the start of the buffer. */
  offset: number;
  regionBytes: number;
};

export type TableLayout = {
  capacity: number;
  alignment: number;
  headerBytes: number;
  rowWidth: number;
  byteSize: number;
  columns: ColumnLayout[];
};

export const INT_WIDTHS: readonly number[] = [1, 2, 4, 8];

/** Row count lives in the first 4 bytes of the header. */
export const ROW_COUNT_BYTES = 4;

export function alignTo(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}

export function defineColumn(
  name: string,
  width: number,
  options: ColumnOptions = {},
): ColumnDef {
  if (name.length === 0) {
    throw new TableLayoutError("Column name must not be empty");
  }
  if (!Number.isInteger(width) || width <= 0) {
    throw new TableLayoutError(
      `Column ${name} width must be a positive integer, got ${width}`,
    );
  }
  const kind = options.kind ?? "int";
  if (kind === "int" && !INT_WIDTHS.includes(width)) {
    throw new TableLayoutError(
      `Int column ${name} must be 1, 2, 4 or 8 bytes wide, got ${width}`,
    );
  }
  if (options.rowId && kind !== "int") {
    throw new TableLayoutError(`Row-id column ${name} must be an int column`);
  }
  return { name, width, kind, rowId: options.rowId ?? false };
}

/**
 * Column-major layout: an aligned header holding the row count, then one
 * aligned region of `capacity * width` bytes per column.
 */
export function computeLayout(
  columns: readonly ColumnDef[],
  capacity: number,
  alignment: number,
): TableLayout {
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new TableLayoutError(
      `Capacity must be a non-negative integer, got ${capacity}`,
    );
  }
  if (!isPowerOfTwo(alignment)) {
    throw new TableLayoutError(
      `Alignment must be a power of two, got ${alignment}`,
    );
  }

  const seen = new Set<string>();
  const headerBytes = alignTo(ROW_COUNT_BYTES, alignment);
  let offset = headerBytes;
  let rowWidth = 0;
  const laidOut: ColumnLayout[] = [];

  columns.forEach((column, index) => {
    if (seen.has(column.name)) {
      throw new TableLayoutError(`Duplicate column ${column.name}`);
    }
    seen.add(column.name);
    const regionBytes = alignTo(capacity * column.width, alignment);
    laidOut.push({ ...column, index, offset, regionBytes });
    offset += regionBytes;
    rowWidth += column.width;
  });

  return {
    capacity,
    alignment,
    headerBytes,
    rowWidth,
    byteSize: offset,
    columns: laidOut,
  };
}
