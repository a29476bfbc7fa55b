import { beforeEach, describe, expect, it } from 'vitest';
import { OrderBookBuilder, feeFilters, makeBook, spreadAndMedian } from '../src/core/OrderBookBuilder';
import { PairCanonicalizer } from '../src/domain/AssetPairs';
import { InMemoryRecordStore } from './helpers/InMemoryRecordStore';
import { FakeLedger } from './helpers/FakeLedger';
import { NOW, UNIT, assetRecord, defaultAssets, order } from './helpers/fixtures';

describe('OrderBookBuilder', () => {
  let store: InMemoryRecordStore;
  let ledger: FakeLedger;
  let builder: OrderBookBuilder;

  beforeEach(() => {
    store = new InMemoryRecordStore({ assets: defaultAssets(), blocks: [[500, NOW]] });
    ledger = new FakeLedger();
    builder = new OrderBookBuilder(store, ledger, new PairCanonicalizer('XCP', 'BTC'));
  });

  it('merges orders into levels with depth, spread and median', async () => {
    ledger.orders = [
      // bids: give PEPE, get XCP
      order(['PEPE', 3 * UNIT], ['XCP', 6 * UNIT]),
      order(['PEPE', 2 * UNIT], ['XCP', 4 * UNIT]),
      order(['PEPE', 2 * UNIT], ['XCP', 5 * UNIT]),
      // ask: give XCP, get PEPE
      order(['XCP', 8 * UNIT], ['PEPE', 480_000_000]),
    ];

    const book = await builder.build('PEPE', 'XCP');

    expect(book.base_asset).toBe('XCP');
    expect(book.quote_asset).toBe('PEPE');
    expect(book.bid_levels).toEqual([
      { unit_price: 0.5, quantity: 10, count: 2, cumulative_depth: 10 },
      { unit_price: 0.4, quantity: 5, count: 1, cumulative_depth: 15 },
    ]);
    expect(book.ask_levels).toEqual([{ unit_price: 0.6, quantity: 8, count: 1, cumulative_depth: 8 }]);
    expect(book.bid_depth).toBe(15);
    expect(book.ask_depth).toBe(8);
    expect(book.spread).toBe(0.1);
    expect(book.median).toBe(0.55);
  });

  it('annotates raw and counter orders with block times', async () => {
    ledger.orders = [
      order(['PEPE', 1 * UNIT], ['XCP', 2 * UNIT], { block_index: 500 }),
      order(['XCP', 1 * UNIT], ['PEPE', 1 * UNIT], { block_index: 501 }),
    ];

    const book = await builder.build('PEPE', 'XCP');

    expect(book.raw_orders.map((o) => [o.block_index, o.block_time])).toEqual([
      [500, NOW],
      [501, null],
    ]);
    // counter orders give the asset the caller buys
    expect(book.open_counter_orders.map((o) => o.give_asset)).toEqual(['PEPE']);
  });

  it('skips drained and expired orders', async () => {
    ledger.orders = [
      order(['XCP', 1 * UNIT], ['PEPE', 1 * UNIT], { give_remaining: '0' }),
      order(['XCP', 1 * UNIT], ['PEPE', 2 * UNIT], { status: 'expired' }),
    ];

    const book = await builder.build('PEPE', 'XCP');

    expect(book.ask_levels).toEqual([]);
    expect(book.spread).toBe(0);
    expect(book.median).toBe(0);
  });

  it('narrows both sides by the caller fee when the fee asset is traded', async () => {
    ledger.orders = [
      order(['PEPE', 1 * UNIT], ['BTC', 1 * UNIT], { fee_required: '5000' }),
      order(['PEPE', 2 * UNIT], ['BTC', 1 * UNIT], { fee_required: '20000' }),
    ];

    const book = await builder.build('BTC', 'PEPE', { fee_required: 0.0001 });

    expect(book.bid_levels).toEqual([{ unit_price: 2, quantity: 1, count: 1, cumulative_depth: 1 }]);
    expect(ledger.orderQueries[1].filters).toContainEqual({ field: 'fee_provided', op: '>=', value: 10_000 });
  });
});

describe('feeFilters', () => {
  const btcBase = { base_asset: 'BTC', quote_asset: 'PEPE' };
  const btcQuote = { base_asset: 'XCP', quote_asset: 'BTC' };

  it('covers the fee asset as base', () => {
    expect(feeFilters(btcBase, 'BTC', 'BTC', { fee_required: 0.0001 })).toEqual({
      bid: [{ field: 'fee_required', op: '>=', value: 10_000 }],
      ask: [{ field: 'fee_provided', op: '>=', value: 10_000 }],
    });
    expect(feeFilters(btcBase, 'PEPE', 'BTC', { fee_provided: 0.0002 })).toEqual({
      bid: [{ field: 'fee_required', op: '<=', value: 20_000 }],
      ask: [{ field: 'fee_provided', op: '>=', value: 20_000 }],
    });
  });

  it('covers the fee asset as quote', () => {
    expect(feeFilters(btcQuote, 'BTC', 'BTC', { fee_required: 0.0001 })).toEqual({
      bid: [{ field: 'fee_provided', op: '>=', value: 10_000 }],
      ask: [{ field: 'fee_required', op: '>=', value: 10_000 }],
    });
    expect(feeFilters(btcQuote, 'XCP', 'BTC', { fee_provided: 0.0002 })).toEqual({
      bid: [{ field: 'fee_provided', op: '>=', value: 20_000 }],
      ask: [{ field: 'fee_required', op: '<=', value: 20_000 }],
    });
  });

  it('adds nothing without the needed preference or the fee asset', () => {
    expect(feeFilters(btcBase, 'BTC', 'BTC', { fee_provided: 0.0001 })).toEqual({ bid: [], ask: [] });
    expect(feeFilters({ base_asset: 'XCP', quote_asset: 'PEPE' }, 'PEPE', 'BTC', { fee_required: 1 })).toEqual({
      bid: [],
      ask: [],
    });
  });
});

describe('makeBook', () => {
  it('prices and sizes orders from raw quantities past 2^53', () => {
    const ask = order(['XCP', 1], ['PEPE', 1], {
      give_quantity: '9007199254740993',
      give_remaining: '9007199254740993',
      get_quantity: '18014398509481986',
      get_remaining: '18014398509481986',
    });

    const book = makeBook([ask], assetRecord('XCP'), assetRecord('PEPE'), false);

    expect(book.levels).toEqual([
      { unit_price: 2, quantity: 90071992.54740993, count: 1, cumulative_depth: 90071992.54740993 },
    ]);
    expect(book.depth).toBe(90071992.54740993);
  });
});

describe('spreadAndMedian', () => {
  it('is zero when a side is empty', () => {
    const ask = { unit_price: 2, quantity: 1, count: 1, cumulative_depth: 1 };

    expect(spreadAndMedian([], [ask])).toEqual({ spread: 0, median: 2 });
  });
});
