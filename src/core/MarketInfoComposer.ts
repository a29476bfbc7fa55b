import { AssetPair, AssetRecord, RecordStore, Trade, TradeQuery } from '../domain/types';
import { AssetLookup, PairCanonicalizer } from '../domain/AssetPairs';
import { InvalidAssetError, InvalidParameterError } from '../domain/errors';
import { MAX_LAST_TRADES, PriceSynthesizer } from './PriceSynthesizer';
import { DAY_MS, OhlcAggregator, OhlcBucket, VolumeSummary, invertBucket, totalVolume } from './OhlcAggregator';
import { ReferenceSupply } from './ReferenceSupply';
import { dec, inverse, mean, percentChange, ratio } from './decimal';

export const MAX_MARKET_INFO_ASSETS = 100;

export interface OhlcSummary {
  open: number;
  high: number;
  low: number;
  close: number;
  vol: number;
  count: number;
}

export type HistoryPoint = [number, number]; // [hour start ms, average price]

/**
 * Wire shape of one asset's market snapshot. `xcp` keys are quoted in the
 * native reference asset, `btc` keys in the fee-bearing one.
 */
export interface MarketInfo {
  price_in_xcp: number | null;
  price_in_btc: number | null;
  price_as_xcp: number | null;
  price_as_btc: number | null;
  aggregated_price_in_xcp: number | null;
  aggregated_price_in_btc: number | null;
  aggregated_price_as_xcp: number | null;
  aggregated_price_as_btc: number | null;
  total_supply: number;
  market_cap_in_xcp: number | null;
  market_cap_in_btc: number | null;
  '24h_summary': VolumeSummary;
  '24h_ohlc_in_xcp': OhlcSummary | null;
  '24h_ohlc_in_btc': OhlcSummary | null;
  '24h_change_in_xcp': number | null;
  '24h_change_in_btc': number | null;
  '7d_history_in_xcp': HistoryPoint[];
  '7d_history_in_btc': HistoryPoint[];
}

interface ReferenceView {
  price_in: number | null;
  aggregated_price_in: number | null;
  ohlc: OhlcBucket | null;
  history: HistoryPoint[];
}

/**
 * Lookups made while answering one request. Never outlives the call that
 * created it.
 */
export class RequestScope {
  private readonly assets = new Map<string, Promise<AssetRecord | null>>();
  private readonly trades = new Map<string, Promise<Trade[]>>();

  constructor(private readonly store: RecordStore) {}

  public readonly lookup: AssetLookup = (asset) => {
    let pending = this.assets.get(asset);
    if (!pending) {
      pending = this.store.findAsset(asset);
      this.assets.set(asset, pending);
    }
    return pending;
  };

  public findTrades(query: TradeQuery): Promise<Trade[]> {
    const key = JSON.stringify(query);
    let pending = this.trades.get(key);
    if (!pending) {
      pending = this.store.findTrades(query);
      this.trades.set(key, pending);
    }
    return pending;
  }
}

// Zero prices carry no usable ratio
const usable = (v: number | null): v is number => v !== null && v !== 0;

export class MarketInfoComposer {
  constructor(
    private readonly store: RecordStore,
    private readonly pairs: PairCanonicalizer,
    private readonly prices: PriceSynthesizer,
    private readonly supply: ReferenceSupply,
    private readonly now: () => number = Date.now
  ) {}

  public async compose(assets: string[]): Promise<Record<string, MarketInfo>> {
    if (!assets.length || assets.length > MAX_MARKET_INFO_ASSETS) {
      throw new InvalidParameterError('assets', `expected 1 to ${MAX_MARKET_INFO_ASSETS} assets`);
    }

    const scope = new RequestScope(this.store);
    const now = this.now();

    // native/fee cross rate: computed once, shared by every asset below
    const cross = await this.prices.summarize(
      this.pairs.nativeAsset,
      this.pairs.feeAsset,
      MAX_LAST_TRADES,
      scope.lookup
    );
    const feePerNative = cross?.market_price ?? null;
    const nativePerFee = usable(feePerNative) ? inverse(feePerNative) : null;

    const result: Record<string, MarketInfo> = {};
    for (const asset of assets) {
      result[asset] = await this.composeOne(asset, scope, now, feePerNative, nativePerFee);
    }
    return result;
  }

  private async composeOne(
    asset: string,
    scope: RequestScope,
    now: number,
    feePerNative: number | null,
    nativePerFee: number | null
  ): Promise<MarketInfo> {
    const info = await scope.lookup(asset);
    if (!info) throw new InvalidAssetError(asset);

    const { nativeAsset, feeAsset } = this.pairs;
    const totalSupply = (await this.supply.supplyOf(asset)) ?? info.total_issued_normalized;

    let inNative: number | null;
    let inFee: number | null;
    let aggNative: number | null;
    let aggFee: number | null;

    if (asset === nativeAsset) {
      inNative = 1;
      inFee = nativePerFee;
      aggNative = 1;
      aggFee = nativePerFee;
    } else if (asset === feeAsset) {
      inNative = feePerNative;
      inFee = 1;
      aggNative = feePerNative;
      aggFee = 1;
    } else {
      const [native, fee] = await Promise.all([
        this.prices.summarize(asset, nativeAsset, MAX_LAST_TRADES, scope.lookup),
        this.prices.summarize(asset, feeAsset, MAX_LAST_TRADES, scope.lookup),
      ]);
      inNative = native?.market_price ?? null;
      inFee = fee?.market_price ?? null;
      // each side averaged with the price routed through the other reference asset
      aggNative =
        inNative !== null && inFee !== null && feePerNative !== null
          ? mean(inNative, dec(inFee).times(feePerNative))
          : null;
      aggFee =
        inFee !== null && inNative !== null && nativePerFee !== null
          ? mean(inFee, dec(inNative).times(nativePerFee))
          : null;
    }

    const since1d = now - DAY_MS;
    const since7d = now - 7 * DAY_MS;
    const [asBase, asQuote, ohlcNative, ohlcFee, historyNative, historyFee] = await Promise.all([
      scope.findTrades({ base_asset: asset, since: since1d, order: 'asc' }),
      scope.findTrades({ quote_asset: asset, since: since1d, order: 'asc' }),
      this.ohlc24h(nativeAsset, asset, scope, since1d),
      this.ohlc24h(feeAsset, asset, scope, since1d),
      this.history7d(nativeAsset, asset, scope, since7d),
      this.history7d(feeAsset, asset, scope, since7d),
    ]);

    const native: ReferenceView = {
      price_in: inNative,
      aggregated_price_in: aggNative,
      ohlc: ohlcNative,
      history: historyNative,
    };
    const fee: ReferenceView = { price_in: inFee, aggregated_price_in: aggFee, ohlc: ohlcFee, history: historyFee };

    return {
      price_in_xcp: native.price_in,
      price_in_btc: fee.price_in,
      price_as_xcp: usable(native.price_in) ? inverse(native.price_in) : null,
      price_as_btc: usable(fee.price_in) ? inverse(fee.price_in) : null,
      aggregated_price_in_xcp: native.aggregated_price_in,
      aggregated_price_in_btc: fee.aggregated_price_in,
      aggregated_price_as_xcp: usable(native.aggregated_price_in) ? inverse(native.aggregated_price_in) : null,
      aggregated_price_as_btc: usable(fee.aggregated_price_in) ? inverse(fee.aggregated_price_in) : null,
      total_supply: totalSupply,
      market_cap_in_xcp: usable(native.price_in) ? ratio(totalSupply, native.price_in) : null,
      market_cap_in_btc: usable(fee.price_in) ? ratio(totalSupply, fee.price_in) : null,
      '24h_summary': totalVolume(asBase, asQuote),
      '24h_ohlc_in_xcp': native.ohlc ? toOhlcSummary(native.ohlc) : null,
      '24h_ohlc_in_btc': fee.ohlc ? toOhlcSummary(fee.ohlc) : null,
      '24h_change_in_xcp': native.ohlc ? percentChange(native.ohlc.open, native.ohlc.close) : null,
      '24h_change_in_btc': fee.ohlc ? percentChange(fee.ohlc.open, fee.ohlc.close) : null,
      '7d_history_in_xcp': native.history,
      '7d_history_in_btc': fee.history,
    };
  }

  /**
   * 24h bucket of `asset` quoted in `reference`. The one pair whose
   * canonical order runs the other way is read canonically and inverted.
   */
  private async ohlc24h(
    reference: string,
    asset: string,
    scope: RequestScope,
    since: number
  ): Promise<OhlcBucket | null> {
    if (reference === asset) return null;
    const pair = this.pairs.canonicalize(reference, asset);
    const bucket = OhlcAggregator.summarize(await scope.findTrades({ ...pair, since, order: 'asc' }));
    if (!bucket) return null;
    return pair.base_asset === reference ? bucket : invertBucket(bucket);
  }

  // Both reference assets chart the native/fee market itself
  private async history7d(
    reference: string,
    asset: string,
    scope: RequestScope,
    since: number
  ): Promise<HistoryPoint[]> {
    const market: AssetPair = this.pairs.isReferenceAsset(asset)
      ? { base_asset: this.pairs.nativeAsset, quote_asset: this.pairs.feeAsset }
      : this.pairs.canonicalize(reference, asset);

    const buckets = OhlcAggregator.hourly().aggregate(await scope.findTrades({ ...market, since, order: 'asc' }));
    const invert = market.base_asset !== reference;
    return buckets.map((b): HistoryPoint => [b.period_key, invert ? inverse(b.average) : b.average]);
  }
}

function toOhlcSummary(bucket: OhlcBucket): OhlcSummary {
  return {
    open: bucket.open,
    high: bucket.high,
    low: bucket.low,
    close: bucket.close,
    vol: bucket.volume,
    count: bucket.trade_count,
  };
}
