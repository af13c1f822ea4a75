/**
 * Report registry - names and table layouts of the generated reports
 */

import type {
  CategoryCountRow,
  RegionProfitRow,
  ReportColumn,
  ReportName,
  ShipMethodRow,
} from '../types';

export const REPORT_NAMES: ReportName[] = [
  'most_profitable_region',
  'most_common_ship_method',
  'orders_by_category',
  'orders_with_profit',
];

export function isReportName(value: string): value is ReportName {
  return REPORT_NAMES.some(name => name === value);
}

export const REGION_PROFIT_COLUMNS: ReportColumn<RegionProfitRow>[] = [
  { key: 'region', header: 'Region' },
  { key: 'total_profit', header: 'Total_Profit' },
];

export const SHIP_METHOD_COLUMNS: ReportColumn<ShipMethodRow>[] = [
  { key: 'category', header: 'Category' },
  { key: 'ship_mode', header: 'Ship Mode' },
  { key: 'count', header: 'Count' },
];

export const CATEGORY_COUNT_COLUMNS: ReportColumn<CategoryCountRow>[] = [
  { key: 'category', header: 'Category' },
  { key: 'sub_category', header: 'Sub Category' },
  { key: 'order_count', header: 'order_count' },
];
