import { AssetPair, AssetRecord, LedgerService, RawQuantity, RecordStore, Trade } from '../domain/types';
import { AnyAssetEvent } from '../domain/events';
import { PairCanonicalizer } from '../domain/AssetPairs';
import { InvalidAssetError, InvalidParameterError } from '../domain/errors';
import { PriceSummary, PriceSynthesizer } from '../core/PriceSynthesizer';
import { OhlcAggregator } from '../core/OhlcAggregator';
import { FeePreference, OrderBook, OrderBookBuilder } from '../core/OrderBookBuilder';
import { MarketInfo, MarketInfoComposer } from '../core/MarketInfoComposer';
import { AssetHistoryReconstructor } from '../core/AssetHistoryReconstructor';
import { ReferenceSupply } from '../core/ReferenceSupply';

export const DEFAULT_RANGE_SECS = 30 * 24 * 60 * 60;
export const MAX_TRADE_HISTORY = 500;
export const MAX_ADDRESSES = 100;

// [block_time, open, high, low, close, vol, count, block_index]
export type PriceHistoryRow = [number, number, number, number, number, number, number, number];

export interface PriceHistoryEntry {
  block_time: number;
  block_index: number;
  open: number;
  high: number;
  low: number;
  close: number;
  vol: number;
  count: number;
}

/** Balance of one address over time: [block_time ms, balance] points, oldest first. */
export interface BalanceSeries {
  name: string;
  data: Array<[number, number | RawQuantity]>;
}

export interface BaseQuoteAsset extends AssetPair {
  pair_name: string;
}

export interface MarketDataServiceOptions {
  nativeAsset: string;
  feeAsset: string;
  now?: () => number;
}

/**
 * Entry point for every market-data query. Owns the derivation components
 * and the record store / ledger they read from.
 */
export class MarketDataService {
  private readonly pairs: PairCanonicalizer;
  private readonly prices: PriceSynthesizer;
  private readonly books: OrderBookBuilder;
  private readonly markets: MarketInfoComposer;
  private readonly histories: AssetHistoryReconstructor;
  private readonly now: () => number;

  constructor(
    private readonly store: RecordStore,
    ledger: LedgerService,
    options: MarketDataServiceOptions
  ) {
    this.now = options.now ?? Date.now;
    this.pairs = new PairCanonicalizer(options.nativeAsset, options.feeAsset);
    this.prices = new PriceSynthesizer(store, this.pairs, this.now);
    this.books = new OrderBookBuilder(store, ledger, this.pairs);
    this.markets = new MarketInfoComposer(
      store,
      this.pairs,
      this.prices,
      new ReferenceSupply(ledger, this.pairs),
      this.now
    );
    this.histories = new AssetHistoryReconstructor(store, ledger);
  }

  public async getBaseQuoteAsset(asset1: string, asset2: string): Promise<BaseQuoteAsset> {
    const pair = await this.pairs.resolve(asset1, asset2, (asset) => this.store.findAsset(asset));
    return { base_asset: pair.base_asset, quote_asset: pair.quote_asset, pair_name: pair.pair_name };
  }

  public getMarketPriceSummary(asset1: string, asset2: string, withLastTrades = 0): Promise<PriceSummary | null> {
    return this.prices.summarize(asset1, asset2, withLastTrades);
  }

  public getMarketInfo(assets: string[]): Promise<Record<string, MarketInfo>> {
    return this.markets.compose(assets);
  }

  public getOrderBook(buyAsset: string, sellAsset: string, fees: FeePreference = {}): Promise<OrderBook> {
    return this.books.build(buyAsset, sellAsset, fees);
  }

  public getAssetHistory(asset: string, reverse = false): Promise<AnyAssetEvent[]> {
    return this.histories.history(asset, reverse);
  }

  /** Block-by-block OHLC for a pair between two epoch-second timestamps. */
  public async getMarketPriceHistory(
    asset1: string,
    asset2: string,
    startTs?: number,
    endTs?: number
  ): Promise<PriceHistoryEntry[]> {
    const pair = this.pairs.canonicalize(asset1, asset2);
    const range = this.range(startTs, endTs);
    const trades = await this.store.findTrades({ ...pair, ...range, order: 'asc' });

    return OhlcAggregator.perBlock()
      .aggregate(trades)
      .map((b) => ({
        block_time: b.period_key,
        block_index: b.block_index,
        open: b.open,
        high: b.high,
        low: b.low,
        close: b.close,
        vol: b.volume,
        count: b.trade_count,
      }));
  }

  public async getMarketPriceHistoryRows(
    asset1: string,
    asset2: string,
    startTs?: number,
    endTs?: number
  ): Promise<PriceHistoryRow[]> {
    const entries = await this.getMarketPriceHistory(asset1, asset2, startTs, endTs);
    return entries.map((e): PriceHistoryRow => [
      e.block_time,
      e.open,
      e.high,
      e.low,
      e.close,
      e.vol,
      e.count,
      e.block_index,
    ]);
  }

  /** Most recent trades of a pair, newest first; null when there are none. */
  public async getTradeHistory(asset1: string, asset2: string, lastTrades = 50): Promise<Trade[] | null> {
    this.checkLimit('last_trades', lastTrades);
    const pair = this.pairs.canonicalize(asset1, asset2);
    const trades = await this.store.findTrades({ ...pair, order: 'desc', limit: lastTrades });
    return trades.length ? trades : null;
  }

  public async getTradeHistoryWithinDates(
    asset1: string,
    asset2: string,
    startTs?: number,
    endTs?: number,
    limit = 50
  ): Promise<Trade[] | null> {
    this.checkLimit('limit', limit);
    const pair = this.pairs.canonicalize(asset1, asset2);
    const trades = await this.store.findTrades({ ...pair, ...this.range(startTs, endTs), order: 'desc', limit });
    return trades.length ? trades : null;
  }

  public async getOwnedAssets(addresses: string[]): Promise<AssetRecord[]> {
    this.checkAddresses(addresses);
    return this.store.findAssetsByOwner(addresses);
  }

  /**
   * Balance series of an asset for each address, in request order. Raw
   * balances are returned as strings when `normalize` is off.
   */
  public async getBalanceHistory(
    asset: string,
    addresses: string[],
    normalize = true,
    startTs?: number,
    endTs?: number
  ): Promise<BalanceSeries[]> {
    this.checkAddresses(addresses);
    const record = await this.store.findAsset(asset);
    if (!record) throw new InvalidAssetError(asset);
    const range = this.range(startTs, endTs);

    return Promise.all(
      addresses.map(async (address): Promise<BalanceSeries> => {
        const changes = await this.store.findBalanceChanges({ asset: record.asset, address, ...range });
        return {
          name: address,
          data: changes.map((c): [number, number | RawQuantity] => [
            c.block_time,
            normalize ? c.new_balance_normalized : c.new_balance,
          ]),
        };
      })
    );
  }

  // epoch seconds in, epoch ms out; defaults to the 30 days up to now
  private range(startTs?: number, endTs?: number): { since: number; until: number } {
    const end = endTs ?? Math.floor(this.now() / 1000);
    const start = startTs ?? end - DEFAULT_RANGE_SECS;
    if (start > end) {
      throw new InvalidParameterError('start_ts', 'must not be after end_ts');
    }
    return { since: start * 1000, until: end * 1000 };
  }

  private checkAddresses(addresses: string[]): void {
    if (addresses.length < 1 || addresses.length > MAX_ADDRESSES) {
      throw new InvalidParameterError('addresses', `must list between 1 and ${MAX_ADDRESSES} addresses`);
    }
  }

  private checkLimit(param: string, value: number): void {
    if (!Number.isInteger(value) || value < 1 || value > MAX_TRADE_HISTORY) {
      throw new InvalidParameterError(param, `must be an integer between 1 and ${MAX_TRADE_HISTORY}`);
    }
  }
}
