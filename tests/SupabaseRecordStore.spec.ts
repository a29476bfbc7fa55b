import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const supabase = vi.hoisted(() => {
  interface Outcome {
    data: unknown;
    error: { message: string; code?: string } | null;
  }

  const calls: Array<[string, ...unknown[]]> = [];
  const outcome: { list: Outcome; single: Outcome; tables: Map<string, Outcome> } = {
    list: { data: [], error: null },
    single: { data: null, error: null },
    tables: new Map(),
  };

  // PostgREST builder stand-in: records the chain, resolves the scripted outcome
  class QueryStub implements PromiseLike<Outcome> {
    constructor(private readonly table: string) {}

    select(...args: unknown[]): this {
      return this.track('select', args);
    }
    eq(...args: unknown[]): this {
      return this.track('eq', args);
    }
    gte(...args: unknown[]): this {
      return this.track('gte', args);
    }
    lte(...args: unknown[]): this {
      return this.track('lte', args);
    }
    in(...args: unknown[]): this {
      return this.track('in', args);
    }
    order(...args: unknown[]): this {
      return this.track('order', args);
    }
    limit(...args: unknown[]): this {
      return this.track('limit', args);
    }

    maybeSingle(): Promise<Outcome> {
      this.track('maybeSingle', []);
      return Promise.resolve(outcome.single);
    }

    then<A = Outcome, B = never>(
      onfulfilled?: ((value: Outcome) => A | PromiseLike<A>) | null,
      onrejected?: ((reason: unknown) => B | PromiseLike<B>) | null
    ): PromiseLike<A | B> {
      return Promise.resolve(outcome.tables.get(this.table) ?? outcome.list).then(onfulfilled, onrejected);
    }

    private track(method: string, args: unknown[]): this {
      calls.push([method, ...args]);
      return this;
    }
  }

  const from = (table: string) => {
    calls.push(['from', table]);
    return new QueryStub(table);
  };

  return { calls, outcome, createClient: vi.fn(() => ({ from })) };
});

vi.mock('@supabase/supabase-js', () => ({ createClient: supabase.createClient }));

import { SupabaseRecordStore } from '../src/infra/repositories/SupabaseRecordStore';
import { UpstreamUnavailableError } from '../src/domain/errors';

const TRADE_SELECT =
  'base_asset, quote_asset, unit_price, base_quantity::text, quote_quantity::text, ' +
  'base_quantity_normalized, quote_quantity_normalized, block_index, block_time';

const tradeRow = {
  base_asset: 'XCP',
  quote_asset: 'PEPE',
  unit_price: 2.5,
  base_quantity: '9007199254740993',
  quote_quantity: '500000000',
  base_quantity_normalized: 90071992.54740993,
  quote_quantity_normalized: 5,
  block_index: 812000,
  block_time: 1700000000000,
};

describe('SupabaseRecordStore', () => {
  let store: SupabaseRecordStore;

  beforeEach(() => {
    supabase.calls.length = 0;
    supabase.outcome.list = { data: [], error: null };
    supabase.outcome.single = { data: null, error: null };
    supabase.outcome.tables.clear();
    store = new SupabaseRecordStore('http://localhost:54321', 'test-secret', 'missing-schema.sql');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates a client without a persisted session', () => {
    expect(supabase.createClient).toHaveBeenLastCalledWith('http://localhost:54321', 'test-secret', {
      auth: { persistSession: false },
    });
  });

  it('chains trade filters, order and limit', async () => {
    supabase.outcome.list = { data: [tradeRow], error: null };

    const trades = await store.findTrades({
      base_asset: 'XCP',
      quote_asset: 'PEPE',
      since: 1000,
      until: 2000,
      order: 'desc',
      limit: 6,
    });

    expect(supabase.calls).toEqual([
      ['from', 'trades'],
      ['select', TRADE_SELECT],
      ['eq', 'base_asset', 'XCP'],
      ['eq', 'quote_asset', 'PEPE'],
      ['gte', 'block_time', 1000],
      ['lte', 'block_time', 2000],
      ['order', 'block_time', { ascending: false }],
      ['order', 'block_index', { ascending: false }],
      ['limit', 6],
    ]);
    expect(trades).toEqual([tradeRow]);
  });

  it('omits filters the query leaves open', async () => {
    await store.findTrades({ order: 'asc' });

    expect(supabase.calls).toEqual([
      ['from', 'trades'],
      ['select', TRADE_SELECT],
      ['order', 'block_time', { ascending: true }],
      ['order', 'block_index', { ascending: true }],
    ]);
  });

  it('returns null when maybeSingle finds no asset', async () => {
    expect(await store.findAsset('NOPE')).toBeNull();
    expect(supabase.calls.slice(2)).toEqual([
      ['eq', 'asset', 'NOPE'],
      ['maybeSingle'],
    ]);
  });

  it('reads a block time through maybeSingle', async () => {
    supabase.outcome.single = { data: { block_index: 5, block_time: 1700000000000 }, error: null };

    expect(await store.getBlockTime(5)).toBe(1_700_000_000_000);
    expect(supabase.calls).toEqual([
      ['from', 'processed_blocks'],
      ['select', 'block_index, block_time'],
      ['eq', 'block_index', 5],
      ['maybeSingle'],
    ]);
  });

  it('looks up owned assets by name', async () => {
    await store.findAssetsByOwner(['owner-a']);

    expect(supabase.calls.slice(2)).toEqual([
      ['in', 'owner', ['owner-a']],
      ['order', 'asset', { ascending: true }],
    ]);
  });

  it('reads balance changes for one address, oldest first', async () => {
    supabase.outcome.list = {
      data: [
        {
          address: 'addr-1',
          asset: 'PEPE',
          block_index: 700,
          block_time: 1700000000000,
          quantity: '100000000',
          new_balance: '300000000',
          new_balance_normalized: 3,
        },
      ],
      error: null,
    };

    const changes = await store.findBalanceChanges({ asset: 'PEPE', address: 'addr-1', since: 10, until: 20 });

    expect(supabase.calls.slice(2)).toEqual([
      ['eq', 'address', 'addr-1'],
      ['eq', 'asset', 'PEPE'],
      ['gte', 'block_time', 10],
      ['lte', 'block_time', 20],
      ['order', 'block_time', { ascending: true }],
      ['order', 'block_index', { ascending: true }],
    ]);
    expect(changes[0].new_balance).toBe('300000000');
  });

  it('wraps PostgREST errors', async () => {
    supabase.outcome.single = { data: null, error: { message: 'JWT expired' } };

    const failure = store.findAsset('PEPE');

    await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(failure).rejects.toThrow('record-store unavailable: findAsset: JWT expired');
  });

  it('reports a missing table on init', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    supabase.outcome.tables.set('trades', {
      data: null,
      error: { message: 'relation "public.trades" does not exist', code: '42P01' },
    });

    await expect(store.init()).rejects.toBeInstanceOf(UpstreamUnavailableError);
    expect(error).toHaveBeenCalledWith('[SupabaseRecordStore] Table "trades" does not exist!');
    expect(error).toHaveBeenCalledWith('missing-schema.sql');
    expect(supabase.calls).toEqual([
      ['from', 'tracked_assets'],
      ['select', '*'],
      ['limit', 1],
      ['from', 'trades'],
      ['select', '*'],
      ['limit', 1],
    ]);
  });
});
