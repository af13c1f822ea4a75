// Report types - aggregate tables and the bundle returned to callers
import type { Dataset } from './core';

// Region(s) tied for the maximum total profit
export interface RegionProfitRow {
  region: string;
  total_profit: number;
}

// Ship mode(s) tied for the maximum count within a category
export interface ShipMethodRow {
  category: string;
  ship_mode: string;
  count: number;
}

// Orders per category / sub-category pair
export interface CategoryCountRow {
  category: string;
  sub_category: string;
  order_count: number;
}

// Column layout used when a report is written as a table
export interface ReportColumn<T> {
  key: keyof T & string;
  header: string;
}

export interface AnalyticsReports {
  orders_with_profit: Dataset;
  most_profitable_region: RegionProfitRow[];
  most_common_ship_method: ShipMethodRow[];
  orders_by_category: CategoryCountRow[];
}

export type ReportName = keyof AnalyticsReports;

// Summary of one processing run
export interface ProcessingSummary {
  processing_time: string;
  input_file: string;
  records_processed: number;
  reports_generated: number;
  report_rows: Record<ReportName, number>;
}
