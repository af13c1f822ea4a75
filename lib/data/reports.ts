/**
 * Report orchestration - runs every aggregation over one dataset
 */

import { REPORT_NAMES } from '../constants/reports';
import { formatTimestamp } from '../formatters';
import type {
  AnalyticsReports,
  Dataset,
  ProcessingSummary,
  ReportName,
} from '../types';
import {
  calculateMostProfitableRegion,
  findMostCommonShipMethod,
  findNumberOfOrdersPerCategory,
} from './aggregations';
import { calculateProfitByOrder } from './profit';

/**
 * Generate all analytics reports for a dataset.
 * Ship mode and category reports read the dataset as supplied; the region
 * report reads the profit-augmented copy. Schema errors propagate.
 */
export function generateAnalyticsReports(orders: Dataset): AnalyticsReports {
  const ordersWithProfit = calculateProfitByOrder(orders);

  return {
    orders_with_profit: ordersWithProfit,
    most_profitable_region: calculateMostProfitableRegion(ordersWithProfit),
    most_common_ship_method: findMostCommonShipMethod(orders),
    orders_by_category: findNumberOfOrdersPerCategory(orders),
  };
}

/**
 * Row count of a single report
 */
export function countReportRows(reports: AnalyticsReports, name: ReportName): number {
  return name === 'orders_with_profit'
    ? reports.orders_with_profit.rows.length
    : reports[name].length;
}

/**
 * Summarize a processing run for logging and API responses
 */
export function buildProcessingSummary(
  inputFile: string,
  orders: Dataset,
  reports: AnalyticsReports,
  processedAt: Date = new Date()
): ProcessingSummary {
  return {
    processing_time: formatTimestamp(processedAt),
    input_file: inputFile,
    records_processed: orders.rows.length,
    reports_generated: REPORT_NAMES.length,
    report_rows: {
      most_profitable_region: countReportRows(reports, 'most_profitable_region'),
      most_common_ship_method: countReportRows(reports, 'most_common_ship_method'),
      orders_by_category: countReportRows(reports, 'orders_by_category'),
      orders_with_profit: countReportRows(reports, 'orders_with_profit'),
    },
  };
}
