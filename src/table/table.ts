import { getConfig } from "../config";
import {
  IOError,
  PipelineConfigError,
  TableLayoutError,
  TableSealedError,
} from "../engine/engine-errors";
import { BufferPair } from "./buffer-pair";
import {
  type ColumnDef,
  type ColumnOptions,
  computeLayout,
  defineColumn,
  type TableLayout,
} from "./layout";
import { TblFileSource, type TableSource } from "./source";
import { type CellValue, type Row, TableView } from "./view";

export type TableOptions = {
  name: string;
  capacity: number;
  columns?: ReadonlyArray<{ name: string; width: number } & ColumnOptions>;
  /** Directory holding `<name>.tbl`, used by `load()` without a source. */
  sourceDir?: string;
  alignment?: number;
};

/**
 * A named tabular buffer pair. Host and device copies share one layout, so a
 * transfer is a plain byte copy that also carries the row count.
 */
export class Table extends BufferPair {
  readonly name: string;
  readonly capacity: number;
  readonly sourceDir: string | null;
  readonly alignment: number;
  private readonly columnDefs: ColumnDef[] = [];
  private cachedLayout: TableLayout | null = null;
  private hostView: TableView | null = null;
  private isSealed = false;

  constructor(options: TableOptions) {
    super();
    if (options.name.length === 0) {
      throw new TableLayoutError("Table name must not be empty");
    }
    this.name = options.name;
    this.capacity = options.capacity;
    this.sourceDir = options.sourceDir ?? null;
    this.alignment = options.alignment ?? getConfig().alignment;
    for (const column of options.columns ?? []) {
      this.addColumn(column.name, column.width, column);
    }
    // Validate capacity and alignment eagerly.
    computeLayout(this.columnDefs, this.capacity, this.alignment);
  }

  get label(): string {
    return this.name;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  get deviceAlignment(): number {
    return this.alignment;
  }

  get columns(): readonly ColumnDef[] {
    return this.columnDefs;
  }

  get layout(): TableLayout {
    if (!this.cachedLayout) {
      this.cachedLayout = computeLayout(
        this.columnDefs,
        this.capacity,
        this.alignment,
      );
    }
    return this.cachedLayout;
  }

  get byteSize(): number {
    return this.layout.byteSize;
  }

  get rowWidth(): number {
    return this.layout.rowWidth;
  }

  addColumn(name: string, width: number, options: ColumnOptions = {}): this {
    this.ensureNotSealed();
    if (this.hasHost) {
      throw new TableLayoutError(
        `${this.name}: cannot add column ${name} after host allocation`,
      );
    }
    const column = defineColumn(name, width, options);
    if (this.columnDefs.some((existing) => existing.name === name)) {
      throw new TableLayoutError(`${this.name}: duplicate column ${name}`);
    }
    this.columnDefs.push(column);
    this.cachedLayout = null;
    return this;
  }

  // ==========================================================================
  // Host-side access
  // ==========================================================================

  view(): TableView {
    const bytes = this.hostBytes();
    if (!this.hostView || this.hostView.bytes !== bytes) {
      this.hostView = new TableView(this.layout, bytes);
    }
    return this.hostView;
  }

  get rowCount(): number {
    return this.view().rowCount;
  }

  set rowCount(count: number) {
    this.ensureNotSealed();
    this.view().rowCount = count;
  }

  get(column: string | number, row: number): CellValue {
    this.ensureRow(row);
    return this.view().get(column, row);
  }

  set(column: string | number, row: number, value: CellValue): void {
    this.ensureNotSealed();
    this.view().set(column, row, value);
  }

  appendRow(values: readonly CellValue[]): number {
    this.ensureNotSealed();
    return this.view().appendRow(values);
  }

  clear(): void {
    this.ensureNotSealed();
    this.view().rowCount = 0;
  }

  rows(): Row[] {
    const view = this.view();
    const out: Row[] = [];
    for (let row = 0; row < view.rowCount; row++) {
      out.push(view.readRow(row));
    }
    return out;
  }

  // ==========================================================================
  // Loading
  // ==========================================================================

  /**
   * Populate the host buffer from `source` (or a `.tbl` file in `sourceDir`).
   * Row-id columns are filled with the row index rather than read.
   */
  async load(source?: TableSource): Promise<void> {
    this.ensureNotSealed();
    const resolved = source ?? this.defaultSource();
    const loadColumns = this.columnDefs.filter((column) => !column.rowId);
    let rows: Row[];
    try {
      rows = await resolved.load(this.name, loadColumns);
    } catch (error) {
      if (error instanceof IOError) throw error;
      throw new IOError(`${this.name}: load failed`, { cause: error });
    }
    if (rows.length > this.capacity) {
      throw new IOError(
        `${this.name}: ${rows.length} rows exceed capacity ${this.capacity}`,
      );
    }

    const view = this.view();
    rows.forEach((values, row) => {
      if (values.length !== loadColumns.length) {
        throw new IOError(
          `${this.name}: row ${row} has ${values.length} fields, expected ${loadColumns.length}`,
        );
      }
      let next = 0;
      for (const column of this.columnDefs) {
        const value = column.rowId ? row : values[next++];
        try {
          view.set(column.name, row, value);
        } catch (error) {
          throw new IOError(`${this.name}: row ${row}, column ${column.name}`, {
            cause: error,
          });
        }
      }
    });
    view.rowCount = rows.length;
  }

  // ==========================================================================
  // Post-processing contract
  // ==========================================================================

  /** Freeze the table; every later mutation throws `TableSealedError`. */
  seal(): void {
    this.isSealed = true;
  }

  private ensureNotSealed(): void {
    if (this.isSealed) {
      throw new TableSealedError(`${this.name} is sealed`);
    }
  }

  private ensureRow(row: number): void {
    if (row >= this.rowCount) {
      throw new TableLayoutError(
        `${this.name}: row ${row} outside row count ${this.rowCount}`,
      );
    }
  }

  private defaultSource(): TableSource {
    if (!this.sourceDir) {
      throw new PipelineConfigError(
        `${this.name}: no source given and no source directory configured`,
      );
    }
    return new TblFileSource(this.sourceDir);
  }
}
