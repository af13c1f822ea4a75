/**
 * Per-order profit derivation
 */

import { ORDER_COLUMNS, PROFIT_INPUT_COLUMNS } from '../constants/orders';
import type { Dataset, OrderRow } from '../types';
import { readNumber, requireColumns } from './fields';

/**
 * Profit of a single order line: discounted revenue minus total cost
 */
export function calculateOrderProfit(
  listPrice: number,
  costPrice: number,
  quantity: number,
  discountPercent: number
): number {
  const revenue = listPrice * quantity * (1 - discountPercent / 100);
  const totalCost = costPrice * quantity;
  return revenue - totalCost;
}

/**
 * Return a copy of the dataset with a Profit column on every row.
 * The input is left untouched; row order and count are preserved.
 */
export function calculateProfitByOrder(dataset: Dataset): Dataset {
  requireColumns(dataset, PROFIT_INPUT_COLUMNS);

  const rows = dataset.rows.map((row, index): OrderRow => {
    const profit = calculateOrderProfit(
      readNumber(row, ORDER_COLUMNS.LIST_PRICE, index),
      readNumber(row, ORDER_COLUMNS.COST_PRICE, index),
      readNumber(row, ORDER_COLUMNS.QUANTITY, index),
      readNumber(row, ORDER_COLUMNS.DISCOUNT_PERCENT, index)
    );
    return { ...row, [ORDER_COLUMNS.PROFIT]: profit };
  });

  const columns = dataset.columns.includes(ORDER_COLUMNS.PROFIT)
    ? [...dataset.columns]
    : [...dataset.columns, ORDER_COLUMNS.PROFIT];

  return { columns, rows };
}
