// Core dataset types - fundamental building blocks
export type CellValue = string | number | null;

// One order line, keyed by column name
export type OrderRow = Readonly<Record<string, CellValue>>;

// Ordered rows sharing one column set; the columns survive even with zero rows
export interface Dataset {
  columns: readonly string[];
  rows: readonly OrderRow[];
}
