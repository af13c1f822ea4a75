/**
 * Data utilities - profit derivation, aggregations, report orchestration
 * Re-exports all data transformation functions
 */

// Profit functions
export {
  calculateOrderProfit,
  calculateProfitByOrder,
} from './profit';

// Aggregation functions
export {
  calculateMostProfitableRegion,
  findMostCommonShipMethod,
  findNumberOfOrdersPerCategory,
} from './aggregations';

// Report orchestration
export {
  generateAnalyticsReports,
  buildProcessingSummary,
  countReportRows,
} from './reports';
