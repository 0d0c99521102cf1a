export interface TableDescriptor {
  name: string;
  columnFamilies: readonly string[];
}

export interface Cell {
  row: string;
  family: string;
  qualifier: string;
  value: string;
}

/**
 * The operations the pipeline needs from a wide-column store. One instance is
 * opened at startup and shared for the whole run.
 */
export interface WideColumnStore {
  readonly isOpen: boolean;
  tableExists(table: string): Promise<boolean>;
  describeTable(table: string): Promise<TableDescriptor | null>;
  listTables(): Promise<string[]>;
  createTable(descriptor: TableDescriptor): Promise<void>;
  putCell(table: string, cell: Cell): Promise<void>;
  /** Latest value of the cell, or `null` when it does not exist. */
  getCell(table: string, row: string, family: string, qualifier: string): Promise<string | null>;
  close(): Promise<void>;
}
