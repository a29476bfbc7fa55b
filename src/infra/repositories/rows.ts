import { z } from 'zod';
import { DataIntegrityFault } from '../../domain/errors';
import { rawQuantity } from '../wire';

// pg returns BIGINT and NUMERIC as strings
const num = z.coerce.number();

export const TRADE_COLUMNS = [
  'base_asset',
  'quote_asset',
  'unit_price',
  'base_quantity',
  'quote_quantity',
  'base_quantity_normalized',
  'quote_quantity_normalized',
  'block_index',
  'block_time',
].join(', ');

export const TradeRowSchema = z.object({
  base_asset: z.string(),
  quote_asset: z.string(),
  unit_price: num,
  base_quantity: rawQuantity,
  quote_quantity: rawQuantity,
  base_quantity_normalized: num,
  quote_quantity_normalized: num,
  block_index: num,
  block_time: num,
});

export const SnapshotRowSchema = z.object({
  owner: z.string(),
  description: z.string(),
  divisible: z.boolean(),
  locked: z.boolean(),
  total_issued: rawQuantity,
  total_issued_normalized: num,
  change_type: z.string(),
  at_block: num,
  at_block_time: num,
});

export const AssetRowSchema = SnapshotRowSchema.extend({
  asset: z.string(),
  history: z.array(SnapshotRowSchema),
});

export const BALANCE_CHANGE_COLUMNS = [
  'address',
  'asset',
  'block_index',
  'block_time',
  'quantity',
  'new_balance',
  'new_balance_normalized',
].join(', ');

export const BalanceChangeRowSchema = z.object({
  address: z.string(),
  asset: z.string(),
  block_index: num,
  block_time: num,
  quantity: rawQuantity,
  new_balance: rawQuantity,
  new_balance_normalized: num,
});

export const BlockRowSchema = z.object({
  block_index: num,
  block_time: num,
});

export function parseRows<S extends z.ZodTypeAny>(schema: S, table: string, rows: unknown[]): z.infer<S>[] {
  return rows.map((row) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new DataIntegrityFault(`malformed ${table} row: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  });
}
