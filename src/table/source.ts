import fs from "node:fs";
import path from "node:path";

import { IOError } from "../engine/engine-errors";
import type { ColumnDef } from "./layout";
import type { Row } from "./view";

/** Storage loader: returns rows in the order of `columns`. */
export interface TableSource {
  load(tableName: string, columns: readonly ColumnDef[]): Promise<Row[]>;
}

export class MemorySource implements TableSource {
  private readonly tables = new Map<string, Row[]>();

  constructor(tables: Record<string, Row[]> = {}) {
    for (const [name, rows] of Object.entries(tables)) {
      this.tables.set(name, rows);
    }
  }

  set(tableName: string, rows: Row[]): this {
    this.tables.set(tableName, rows);
    return this;
  }

  async load(tableName: string): Promise<Row[]> {
    const rows = this.tables.get(tableName);
    if (!rows) {
      throw new IOError(`No rows registered for table ${tableName}`);
    }
    return rows.map((row) => row.slice());
  }
}

export type TblFileSourceOptions = {
  /** Field names per table in file order; defaults to the table's columns. */
  fields?: Record<string, string[]>;
  delimiter?: string;
};

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DECIMAL_PATTERN = /^-?\d+\.\d+$/;

/**
 * Parse a text field for an int column. Dates (`YYYY-MM-DD`) become
 * `YYYYMMDD`; decimals are scaled by 100 and rounded.
 */
export function parseIntField(raw: string): number | null {
  const date = DATE_PATTERN.exec(raw);
  if (date) {
    return Number(`${date[1]}${date[2]}${date[3]}`);
  }
  if (DECIMAL_PATTERN.test(raw)) {
    return Math.round(Number(raw) * 100);
  }
  const value = Number(raw);
  return raw.length > 0 && Number.isSafeInteger(value) ? value : null;
}

/** Reads pipe-delimited `<dir>/<table>.tbl` files. */
export class TblFileSource implements TableSource {
  private readonly delimiter: string;

  constructor(
    readonly dir: string,
    private readonly options: TblFileSourceOptions = {},
  ) {
    this.delimiter = options.delimiter ?? "|";
  }

  async load(tableName: string, columns: readonly ColumnDef[]): Promise<Row[]> {
    const filePath = path.join(this.dir, `${tableName}.tbl`);
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, "utf8");
    } catch (error) {
      throw new IOError(`Cannot read ${filePath}`, { cause: error });
    }

    const fieldNames = this.options.fields?.[tableName];
    const positions = columns.map((column, index) => {
      if (!fieldNames) return index;
      const position = fieldNames.indexOf(column.name);
      if (position === -1) {
        throw new IOError(`${filePath}: no field named ${column.name}`);
      }
      return position;
    });

    const rows: Row[] = [];
    const lines = text.split(/\r?\n/);
    lines.forEach((line, lineIndex) => {
      if (line.length === 0) return;
      const fields = line.split(this.delimiter);
      const row: Row = columns.map((column, index) => {
        const raw = fields[positions[index]];
        if (raw === undefined) {
          throw new IOError(
            `${filePath}:${lineIndex + 1}: missing field for ${column.name}`,
          );
        }
        if (column.kind === "bytes") return raw;
        const value = parseIntField(raw.trim());
        if (value === null) {
          throw new IOError(
            `${filePath}:${lineIndex + 1}: ${column.name} is not an integer: "${raw}"`,
          );
        }
        return value;
      });
      rows.push(row);
    });
    return rows;
  }
}
