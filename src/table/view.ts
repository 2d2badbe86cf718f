import { TableLayoutError } from "../engine/engine-errors";
import type { ColumnLayout, TableLayout } from "./layout";

export type CellValue = number | string;
export type Row = CellValue[];

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Typed accessors over a byte buffer laid out by `computeLayout`. Used for
 * host buffers by `Table` and for device buffers by simulated kernels.
 */
export class TableView {
  private readonly data: DataView;

  constructor(
    readonly layout: TableLayout,
    readonly bytes: Uint8Array,
  ) {
    if (bytes.byteLength < layout.byteSize) {
      throw new TableLayoutError(
        `Buffer of ${bytes.byteLength} bytes is smaller than layout size ${layout.byteSize}`,
      );
    }
    this.data = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get capacity(): number {
    return this.layout.capacity;
  }

  get rowCount(): number {
    return this.data.getUint32(0, true);
  }

  set rowCount(count: number) {
    if (!Number.isInteger(count) || count < 0 || count > this.layout.capacity) {
      throw new TableLayoutError(
        `Row count ${count} outside [0, ${this.layout.capacity}]`,
      );
    }
    this.data.setUint32(0, count, true);
  }

  column(ref: string | number): ColumnLayout {
    const column =
      typeof ref === "number"
        ? this.layout.columns[ref]
        : this.layout.columns.find((candidate) => candidate.name === ref);
    if (!column) {
      throw new TableLayoutError(`Unknown column ${String(ref)}`);
    }
    return column;
  }

  getInt(ref: string | number, row: number): number {
    const column = this.intColumn(ref);
    const at = this.cellOffset(column, row);
    switch (column.width) {
      case 1:
        return this.data.getInt8(at);
      case 2:
        return this.data.getInt16(at, true);
      case 4:
        return this.data.getInt32(at, true);
      default:
        return Number(this.data.getBigInt64(at, true));
    }
  }

  setInt(ref: string | number, row: number, value: number): void {
    const column = this.intColumn(ref);
    if (!Number.isSafeInteger(value)) {
      throw new TableLayoutError(
        `Column ${column.name} expects an integer, got ${value}`,
      );
    }
    if (column.width < 8) {
      const limit = 2 ** (8 * column.width - 1);
      if (value < -limit || value >= limit) {
        throw new TableLayoutError(
          `Column ${column.name} holds ${column.width}-byte integers; ${value} is out of range`,
        );
      }
    }
    const at = this.cellOffset(column, row);
    switch (column.width) {
      case 1:
        this.data.setInt8(at, value);
        break;
      case 2:
        this.data.setInt16(at, value, true);
        break;
      case 4:
        this.data.setInt32(at, value, true);
        break;
      default:
        this.data.setBigInt64(at, BigInt(value), true);
    }
  }

  getBytes(ref: string | number, row: number): Uint8Array {
    const column = this.column(ref);
    const at = this.cellOffset(column, row);
    return this.bytes.subarray(at, at + column.width);
  }

  getString(ref: string | number, row: number): string {
    const cell = this.getBytes(ref, row);
    const end = cell.indexOf(0);
    return decoder.decode(end === -1 ? cell : cell.subarray(0, end));
  }

  setString(ref: string | number, row: number, value: string): void {
    const column = this.column(ref);
    if (column.kind !== "bytes") {
      throw new TableLayoutError(`Column ${column.name} is not a bytes column`);
    }
    const encoded = encoder.encode(value);
    if (encoded.byteLength > column.width) {
      throw new TableLayoutError(
        `Value of ${encoded.byteLength} bytes does not fit column ${column.name} (${column.width} bytes)`,
      );
    }
    const cell = this.getBytes(column.index, row);
    cell.fill(0);
    cell.set(encoded);
  }

  get(ref: string | number, row: number): CellValue {
    const column = this.column(ref);
    return column.kind === "int"
      ? this.getInt(column.index, row)
      : this.getString(column.index, row);
  }

  set(ref: string | number, row: number, value: CellValue): void {
    const column = this.column(ref);
    if (column.kind === "int") {
      if (typeof value !== "number") {
        throw new TableLayoutError(
          `Column ${column.name} expects a number, got "${value}"`,
        );
      }
      this.setInt(column.index, row, value);
    } else {
      this.setString(column.index, row, String(value));
    }
  }

  readRow(row: number): Row {
    return this.layout.columns.map((column) => this.get(column.index, row));
  }

  writeRow(row: number, values: readonly CellValue[]): void {
    if (values.length !== this.layout.columns.length) {
      throw new TableLayoutError(
        `Row has ${values.length} values, table has ${this.layout.columns.length} columns`,
      );
    }
    values.forEach((value, index) => this.set(index, row, value));
  }

  /** Append at `rowCount` and bump it. Returns the new row index. */
  appendRow(values: readonly CellValue[]): number {
    const row = this.rowCount;
    if (row >= this.layout.capacity) {
      throw new TableLayoutError(
        `Table is full (capacity ${this.layout.capacity})`,
      );
    }
    this.writeRow(row, values);
    this.rowCount = row + 1;
    return row;
  }

  /** Copy one cell, converting nothing: widths and kinds must agree. */
  copyCell(
    source: TableView,
    sourceColumn: string | number,
    sourceRow: number,
    targetColumn: string | number,
    targetRow: number,
  ): void {
    const from = source.column(sourceColumn);
    const to = this.column(targetColumn);
    if (from.kind === "int" && to.kind === "int") {
      this.setInt(to.index, targetRow, source.getInt(from.index, sourceRow));
      return;
    }
    if (from.kind !== to.kind || from.width !== to.width) {
      throw new TableLayoutError(
        `Cannot copy ${from.kind}(${from.width}) column ${from.name} into ${to.kind}(${to.width}) column ${to.name}`,
      );
    }
    this.getBytes(to.index, targetRow).set(source.getBytes(from.index, sourceRow));
  }

  private intColumn(ref: string | number): ColumnLayout {
    const column = this.column(ref);
    if (column.kind !== "int") {
      throw new TableLayoutError(`Column ${column.name} is not an int column`);
    }
    return column;
  }

  /** Offset from the start of the buffer. */
  private cellOffset(column: ColumnLayout, row: number): number {
    if (!Number.isInteger(row) || row < 0 || row >= this.layout.capacity) {
      throw new TableLayoutError(
        `Row ${row} outside capacity ${this.layout.capacity}`,
      );
    }
    return column.offset + row * column.width;
  }
}
