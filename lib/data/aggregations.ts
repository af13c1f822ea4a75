/**
 * Aggregation functions for the orders reports
 * Each groups the rows, then keeps either the tie set at the maximum or every group
 */

import { ORDER_COLUMNS } from '../constants/orders';
import type {
  CategoryCountRow,
  Dataset,
  RegionProfitRow,
  ShipMethodRow,
} from '../types';
import { compareText, readKey, readNumber, requireColumns } from './fields';

/**
 * Count rows per (outer, inner) key pair, skipping rows where either key is null
 */
function countPairs(
  dataset: Dataset,
  outerColumn: string,
  innerColumn: string
): Map<string, Map<string, number>> {
  const counts = new Map<string, Map<string, number>>();

  for (const row of dataset.rows) {
    const outer = readKey(row, outerColumn);
    const inner = readKey(row, innerColumn);
    if (outer === null || inner === null) continue;

    const group = counts.get(outer) ?? new Map<string, number>();
    group.set(inner, (group.get(inner) ?? 0) + 1);
    counts.set(outer, group);
  }

  return counts;
}

/**
 * Region(s) with the maximum total profit, sorted by region name.
 * Every region tied at the maximum is kept; the maximum may be negative.
 */
export function calculateMostProfitableRegion(ordersWithProfit: Dataset): RegionProfitRow[] {
  requireColumns(ordersWithProfit, [ORDER_COLUMNS.REGION, ORDER_COLUMNS.PROFIT]);

  const totals = new Map<string, number>();
  ordersWithProfit.rows.forEach((row, index) => {
    const region = readKey(row, ORDER_COLUMNS.REGION);
    if (region === null) return;
    const profit = readNumber(row, ORDER_COLUMNS.PROFIT, index);
    totals.set(region, (totals.get(region) ?? 0) + profit);
  });

  if (totals.size === 0) {
    return [];
  }

  let maxProfit = -Infinity;
  for (const total of totals.values()) {
    if (total > maxProfit) maxProfit = total;
  }

  return Array.from(totals, ([region, total_profit]) => ({ region, total_profit }))
    .filter(row => row.total_profit === maxProfit)
    .sort((a, b) => compareText(a.region, b.region));
}

/**
 * Most common ship mode(s) per category, sorted by category then ship mode.
 * Ties within a category are all returned.
 */
export function findMostCommonShipMethod(orders: Dataset): ShipMethodRow[] {
  requireColumns(orders, [ORDER_COLUMNS.CATEGORY, ORDER_COLUMNS.SHIP_MODE]);

  const counts = countPairs(orders, ORDER_COLUMNS.CATEGORY, ORDER_COLUMNS.SHIP_MODE);
  const result: ShipMethodRow[] = [];

  for (const [category, shipModes] of counts) {
    const maxCount = Math.max(...shipModes.values());
    for (const [ship_mode, count] of shipModes) {
      if (count === maxCount) {
        result.push({ category, ship_mode, count });
      }
    }
  }

  return result.sort(
    (a, b) => compareText(a.category, b.category) || compareText(a.ship_mode, b.ship_mode)
  );
}

/**
 * Number of orders for every observed category / sub-category pair
 */
export function findNumberOfOrdersPerCategory(orders: Dataset): CategoryCountRow[] {
  requireColumns(orders, [ORDER_COLUMNS.CATEGORY, ORDER_COLUMNS.SUB_CATEGORY]);

  const counts = countPairs(orders, ORDER_COLUMNS.CATEGORY, ORDER_COLUMNS.SUB_CATEGORY);
  const result: CategoryCountRow[] = [];

  for (const [category, subCategories] of counts) {
    for (const [sub_category, order_count] of subCategories) {
      result.push({ category, sub_category, order_count });
    }
  }

  // Grouped output: category first, then sub-category
  return result.sort(
    (a, b) => compareText(a.category, b.category) || compareText(a.sub_category, b.sub_category)
  );
}
