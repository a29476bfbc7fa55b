import { AssetPair, RecordStore, Trade } from '../domain/types';
import { AssetLookup, PairCanonicalizer } from '../domain/AssetPairs';
import { InvalidParameterError } from '../domain/errors';
import { inverse, round8, weightedAverage } from './decimal';

// Oldest of the selected trades weighs most. Kept as the ledger's
// wallets have always computed it.
export const MARKET_PRICE_DERIVE_WEIGHTS = [1, 0.9, 0.72, 0.6, 0.4, 0.3] as const;
export const MARKET_PRICE_DERIVE_NUMLAST = MARKET_PRICE_DERIVE_WEIGHTS.length;
export const MARKET_PRICE_LOOKBACK_MS = 10 * 24 * 60 * 60 * 1000;
export const MAX_LAST_TRADES = 30;

// [block_time, unit_price, base_quantity_normalized, quote_quantity_normalized, block_index]
export type LastTrade = [number, number, number, number, number];

export interface PriceSummary extends AssetPair {
  market_price: number;
  last_trades?: LastTrade[];
}

/** Weighted market price over trades ordered oldest -> newest. */
export function synthesizePrice(tradesOldestFirst: ReadonlyArray<Pick<Trade, 'unit_price'>>): number | null {
  const n = Math.min(tradesOldestFirst.length, MARKET_PRICE_DERIVE_NUMLAST);
  if (n === 0) return null;

  const inputs: Array<[number, number]> = [];
  for (let i = 0; i < n; i++) {
    inputs.push([tradesOldestFirst[i].unit_price, MARKET_PRICE_DERIVE_WEIGHTS[i]]);
  }
  return round8(weightedAverage(inputs));
}

/**
 * Re-expresses a summary in the opposite direction: price inverted, base
 * and quote quantities swapped.
 */
export function invertSummary(summary: PriceSummary): PriceSummary {
  const inverted: PriceSummary = {
    market_price: inverse(summary.market_price),
    base_asset: summary.quote_asset,
    quote_asset: summary.base_asset,
  };
  if (summary.last_trades) {
    inverted.last_trades = summary.last_trades.map(
      ([blockTime, unitPrice, baseQty, quoteQty, blockIndex]): LastTrade => [
        blockTime,
        inverse(unitPrice),
        quoteQty,
        baseQty,
        blockIndex,
      ]
    );
  }
  return inverted;
}

export function validateLastTrades(withLastTrades: number): void {
  if (!Number.isInteger(withLastTrades) || withLastTrades < 0 || withLastTrades > MAX_LAST_TRADES) {
    throw new InvalidParameterError('with_last_trades', `must be an integer between 0 and ${MAX_LAST_TRADES}`);
  }
}

export class PriceSynthesizer {
  constructor(
    private readonly store: RecordStore,
    private readonly pairs: PairCanonicalizer,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Market price for a pair from its most recent trades, or null when the
   * lookback window holds no trades.
   */
  public async summarize(
    asset1: string,
    asset2: string,
    withLastTrades = 0,
    lookup: AssetLookup = (asset) => this.store.findAsset(asset)
  ): Promise<PriceSummary | null> {
    validateLastTrades(withLastTrades);
    const pair = await this.pairs.resolve(asset1, asset2, lookup);

    const newestFirst = await this.store.findTrades({
      base_asset: pair.base_asset,
      quote_asset: pair.quote_asset,
      since: this.now() - MARKET_PRICE_LOOKBACK_MS,
      order: 'desc',
      limit: Math.max(MARKET_PRICE_DERIVE_NUMLAST, withLastTrades),
    });
    const trades = [...newestFirst].reverse();

    const marketPrice = synthesizePrice(trades);
    if (marketPrice === null) return null;

    const summary: PriceSummary = {
      market_price: marketPrice,
      base_asset: pair.base_asset,
      quote_asset: pair.quote_asset,
    };
    if (withLastTrades) {
      summary.last_trades = trades.map((t): LastTrade => [
        t.block_time,
        t.unit_price,
        t.base_quantity_normalized,
        t.quote_quantity_normalized,
        t.block_index,
      ]);
    }
    return summary;
  }
}
