export { BufferPair, type Transferable } from "./buffer-pair";
export { ConfigBlob, DEFAULT_CONFIG_BYTES } from "./config-blob";
export {
  alignTo,
  type ColumnDef,
  type ColumnKind,
  type ColumnLayout,
  type ColumnOptions,
  computeLayout,
  defineColumn,
  INT_WIDTHS,
  type TableLayout,
} from "./layout";
export { ScratchBufferPool, ScratchLease } from "./scratch-pool";
export {
  MemorySource,
  parseIntField,
  type TableSource,
  TblFileSource,
  type TblFileSourceOptions,
} from "./source";
export { Table, type TableOptions } from "./table";
export { type CellValue, type Row, TableView } from "./view";
