/**
 * Centralized column names - Single source of truth
 * Used by: CSV parsing, aggregations, API routes
 */

// Order columns as they appear in the source CSV header
export const ORDER_COLUMNS = {
  ORDER_ID: 'Order Id',
  ORDER_DATE: 'Order Date',
  SHIP_MODE: 'Ship Mode',
  SEGMENT: 'Segment',
  COUNTRY: 'Country',
  CITY: 'City',
  STATE: 'State',
  POSTAL_CODE: 'Postal Code',
  REGION: 'Region',
  CATEGORY: 'Category',
  SUB_CATEGORY: 'Sub Category',
  PRODUCT_ID: 'Product Id',
  COST_PRICE: 'cost price',
  LIST_PRICE: 'List Price',
  QUANTITY: 'Quantity',
  DISCOUNT_PERCENT: 'Discount Percent',
  PROFIT: 'Profit',
} as const;

export type OrderColumn = typeof ORDER_COLUMNS[keyof typeof ORDER_COLUMNS];

// Inputs to the profit calculation, in the order they are reported when missing
export const PROFIT_INPUT_COLUMNS: OrderColumn[] = [
  ORDER_COLUMNS.LIST_PRICE,
  ORDER_COLUMNS.COST_PRICE,
  ORDER_COLUMNS.QUANTITY,
  ORDER_COLUMNS.DISCOUNT_PERCENT,
];

// Columns the CSV reader coerces to numbers
export const NUMERIC_COLUMNS: ReadonlySet<string> = new Set<string>([
  ...PROFIT_INPUT_COLUMNS,
  ORDER_COLUMNS.PROFIT,
]);
