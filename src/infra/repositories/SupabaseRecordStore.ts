import { createClient, SupabaseClient } from '@supabase/supabase-js';
import fs from 'fs';
import { AssetRecord, BalanceChange, BalanceChangeQuery, RecordStore, Trade, TradeQuery } from '../../domain/types';
import { UpstreamUnavailableError } from '../../domain/errors';
import { AssetRowSchema, BalanceChangeRowSchema, BlockRowSchema, TradeRowSchema, parseRows } from './rows';

// BIGINT quantities are cast to text: PostgREST sends numbers, and JSON.parse rounds past 2^53
const ASSET_SELECT =
  'asset, owner, description, divisible, locked, total_issued::text, total_issued_normalized, ' +
  'change_type, at_block, at_block_time, history';
const TRADE_SELECT =
  'base_asset, quote_asset, unit_price, base_quantity::text, quote_quantity::text, ' +
  'base_quantity_normalized, quote_quantity_normalized, block_index, block_time';
const BALANCE_CHANGE_SELECT =
  'address, asset, block_index, block_time, quantity::text, new_balance::text, new_balance_normalized';

interface PostgrestFailure {
  message: string;
  code?: string;
}

export class SupabaseRecordStore implements RecordStore {
  private client: SupabaseClient;
  private initialized = false;

  constructor(url: string, key: string, private readonly schemaPath: string) {
    this.client = createClient(url, key, { auth: { persistSession: false } });
  }

  /**
   * Checks that the replicated tables are reachable
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    for (const table of ['tracked_assets', 'trades', 'processed_blocks', 'balance_changes']) {
      const { error } = await this.client.from(table).select('*').limit(1);
      if (error?.code === '42P01') {
        console.error(`[SupabaseRecordStore] Table "${table}" does not exist!`);
        console.error('Please create it in the Supabase Dashboard with this SQL:');
        console.error(fs.existsSync(this.schemaPath) ? fs.readFileSync(this.schemaPath, 'utf8') : this.schemaPath);
      }
      this.check(`select ${table}`, error);
    }

    this.initialized = true;
    console.log('[SupabaseRecordStore] Initialized');
  }

  async findAsset(asset: string): Promise<AssetRecord | null> {
    const { data, error } = await this.client.from('tracked_assets').select(ASSET_SELECT).eq('asset', asset).maybeSingle();
    this.check('findAsset', error);
    if (!data) return null;
    const [record] = parseRows(AssetRowSchema, 'tracked_assets', [data]);
    return record ?? null;
  }

  async findAssetsByOwner(owners: string[]): Promise<AssetRecord[]> {
    const { data, error } = await this.client
      .from('tracked_assets')
      .select(ASSET_SELECT)
      .in('owner', owners)
      .order('asset', { ascending: true });
    this.check('findAssetsByOwner', error);
    const rows: unknown[] = data ?? [];
    return parseRows(AssetRowSchema, 'tracked_assets', rows);
  }

  async findTrades(q: TradeQuery): Promise<Trade[]> {
    let query = this.client.from('trades').select(TRADE_SELECT);
    if (q.base_asset !== undefined) query = query.eq('base_asset', q.base_asset);
    if (q.quote_asset !== undefined) query = query.eq('quote_asset', q.quote_asset);
    if (q.since !== undefined) query = query.gte('block_time', q.since);
    if (q.until !== undefined) query = query.lte('block_time', q.until);

    const ascending = q.order === 'asc';
    query = query.order('block_time', { ascending }).order('block_index', { ascending });
    if (q.limit !== undefined) query = query.limit(q.limit);

    const { data, error } = await query;
    this.check('findTrades', error);
    const rows: unknown[] = data ?? [];
    return parseRows(TradeRowSchema, 'trades', rows);
  }

  async findBalanceChanges(q: BalanceChangeQuery): Promise<BalanceChange[]> {
    const { data, error } = await this.client
      .from('balance_changes')
      .select(BALANCE_CHANGE_SELECT)
      .eq('address', q.address)
      .eq('asset', q.asset)
      .gte('block_time', q.since)
      .lte('block_time', q.until)
      .order('block_time', { ascending: true })
      .order('block_index', { ascending: true });
    this.check('findBalanceChanges', error);
    const rows: unknown[] = data ?? [];
    return parseRows(BalanceChangeRowSchema, 'balance_changes', rows);
  }

  async getBlockTime(blockIndex: number): Promise<number | null> {
    const { data, error } = await this.client
      .from('processed_blocks')
      .select('block_index, block_time')
      .eq('block_index', blockIndex)
      .maybeSingle();
    this.check('getBlockTime', error);
    if (!data) return null;
    const [block] = parseRows(BlockRowSchema, 'processed_blocks', [data]);
    return block?.block_time ?? null;
  }

  async shutdown(): Promise<void> {
    this.initialized = false;
    console.log('[SupabaseRecordStore] Shutdown complete');
  }

  private check(operation: string, error: PostgrestFailure | null): void {
    if (error) {
      throw new UpstreamUnavailableError('record-store', `${operation}: ${error.message}`, error);
    }
  }
}
