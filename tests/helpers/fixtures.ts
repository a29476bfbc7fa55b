import { AssetRecord, AssetSnapshot, BalanceChange, Order, Trade } from '../../src/domain/types';

export const UNIT = 100_000_000;
// 2023-11-14T22:13:20Z
export const NOW = 1_700_000_000_000;
export const HOUR = 60 * 60 * 1000;

export function snapshot(overrides: Partial<AssetSnapshot> = {}): AssetSnapshot {
  return {
    owner: 'owner-a',
    description: '',
    divisible: true,
    locked: false,
    total_issued: String(1000 * UNIT),
    total_issued_normalized: 1000,
    change_type: 'created',
    at_block: 100,
    at_block_time: NOW - 30 * 24 * HOUR,
    ...overrides,
  };
}

export function assetRecord(asset: string, overrides: Partial<AssetRecord> = {}): AssetRecord {
  return { asset, history: [], ...snapshot(), ...overrides };
}

/** The two reference assets plus PEPE and DOGE, all divisible. */
export function defaultAssets(): AssetRecord[] {
  return [assetRecord('XCP'), assetRecord('BTC'), assetRecord('PEPE'), assetRecord('DOGE')];
}

/** Trade of `baseQty` base units at `price` quote per base, both divisible. */
export function trade(
  base: string,
  quote: string,
  price: number,
  opts: { baseQty?: number; at?: number; block?: number } = {}
): Trade {
  const baseQty = opts.baseQty ?? 1;
  const quoteQty = baseQty * price;
  return {
    base_asset: base,
    quote_asset: quote,
    unit_price: price,
    base_quantity: String(Math.round(baseQty * UNIT)),
    quote_quantity: String(Math.round(quoteQty * UNIT)),
    base_quantity_normalized: baseQty,
    quote_quantity_normalized: quoteQty,
    block_index: opts.block ?? 1000,
    block_time: opts.at ?? NOW - HOUR,
  };
}

let txIndex = 0;

export function order(
  give: [string, number],
  get: [string, number],
  overrides: Partial<Order> = {}
): Order {
  txIndex += 1;
  return {
    tx_index: txIndex,
    tx_hash: `tx-${txIndex}`,
    source: 'source-a',
    give_asset: give[0],
    give_quantity: String(give[1]),
    give_remaining: String(give[1]),
    get_asset: get[0],
    get_quantity: String(get[1]),
    get_remaining: String(get[1]),
    fee_required: '0',
    fee_provided: '0',
    block_index: 500,
    expiration: 1000,
    expire_index: 1500,
    status: 'open',
    ...overrides,
  };
}

/** Balance of `address` after a change, `balance` in display units of a divisible asset. */
export function balanceChange(
  address: string,
  asset: string,
  balance: number,
  opts: { at?: number; block?: number; delta?: number } = {}
): BalanceChange {
  return {
    address,
    asset,
    block_index: opts.block ?? 1000,
    block_time: opts.at ?? NOW - HOUR,
    quantity: String(Math.round((opts.delta ?? balance) * UNIT)),
    new_balance: String(Math.round(balance * UNIT)),
    new_balance_normalized: balance,
  };
}
