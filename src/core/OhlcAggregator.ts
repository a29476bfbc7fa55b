import Decimal from 'decimal.js';
import { Trade } from '../domain/types';
import { dec, inverse, round8 } from './decimal';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export interface OhlcBucket {
  period_key: number;   // bucket start (epoch ms); block time for block buckets
  block_index: number;  // block of the closing trade
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;       // Σ base_quantity_normalized
  quote_volume: number; // Σ quote_quantity_normalized
  average: number;      // mean unit_price
  trade_count: number;
}

export interface VolumeSummary {
  vol: number;
  count: number;
}

type Grain = 'hour' | 'window' | 'block';

interface Bucket {
  row: OhlcBucket;
  priceSum: Decimal;
  volume: Decimal;
  quoteVolume: Decimal;
}

const byTime = (a: Trade, b: Trade) => a.block_time - b.block_time || a.block_index - b.block_index;

/**
 * Rolls trades of one pair up into OHLC buckets. Trades may arrive in any
 * order; open and close follow block time.
 */
export class OhlcAggregator {
  constructor(private readonly grain: Grain) {}

  static hourly(): OhlcAggregator {
    return new OhlcAggregator('hour');
  }

  static window(): OhlcAggregator {
    return new OhlcAggregator('window');
  }

  static perBlock(): OhlcAggregator {
    return new OhlcAggregator('block');
  }

  public aggregate(trades: ReadonlyArray<Trade>): OhlcBucket[] {
    const buckets = new Map<string, Bucket>();

    for (const t of [...trades].sort(byTime)) {
      const key = this.keyOf(t);
      const bucket = buckets.get(key);
      if (!bucket) {
        buckets.set(key, this.createFrom(t));
      } else {
        this.merge(bucket, t);
      }
    }

    return [...buckets.values()].map((b) => this.finalize(b));
  }

  /** Single bucket over every trade given, null when there are none. */
  static summarize(trades: ReadonlyArray<Trade>): OhlcBucket | null {
    const [bucket] = OhlcAggregator.window().aggregate(trades);
    return bucket ?? null;
  }

  private keyOf(t: Trade): string {
    switch (this.grain) {
      case 'hour':
        return String(this.align(t.block_time));
      case 'window':
        return 'window';
      case 'block':
        return `${t.block_time}:${t.block_index}`;
    }
  }

  private align(ts: number): number {
    return Math.floor(ts / HOUR_MS) * HOUR_MS;
  }

  private createFrom(t: Trade): Bucket {
    return {
      row: {
        period_key: this.grain === 'hour' ? this.align(t.block_time) : t.block_time,
        block_index: t.block_index,
        open: t.unit_price,
        high: t.unit_price,
        low: t.unit_price,
        close: t.unit_price,
        volume: 0,
        quote_volume: 0,
        average: 0,
        trade_count: 1,
      },
      priceSum: dec(t.unit_price),
      volume: dec(t.base_quantity_normalized),
      quoteVolume: dec(t.quote_quantity_normalized),
    };
  }

  private merge(bucket: Bucket, t: Trade) {
    const dst = bucket.row;

    dst.high = Math.max(dst.high, t.unit_price);
    dst.low = Math.min(dst.low, t.unit_price);
    dst.close = t.unit_price;
    dst.block_index = t.block_index;
    dst.trade_count += 1;

    bucket.priceSum = bucket.priceSum.plus(t.unit_price);
    bucket.volume = bucket.volume.plus(t.base_quantity_normalized);
    bucket.quoteVolume = bucket.quoteVolume.plus(t.quote_quantity_normalized);
  }

  private finalize(bucket: Bucket): OhlcBucket {
    return {
      ...bucket.row,
      volume: round8(bucket.volume),
      quote_volume: round8(bucket.quoteVolume),
      average: round8(bucket.priceSum.div(bucket.row.trade_count)),
    };
  }
}

/**
 * The same bucket seen from the other side of the pair: prices invert
 * (so high and low trade places) and the two volumes swap.
 */
export function invertBucket(bucket: OhlcBucket): OhlcBucket {
  return {
    ...bucket,
    open: inverse(bucket.open),
    high: inverse(bucket.low),
    low: inverse(bucket.high),
    close: inverse(bucket.close),
    average: inverse(bucket.average),
    volume: bucket.quote_volume,
    quote_volume: bucket.volume,
  };
}

/**
 * Traded volume of one asset across every market: base quantities where it
 * is the base, quote quantities where it is the quote.
 */
export function totalVolume(asBase: ReadonlyArray<Trade>, asQuote: ReadonlyArray<Trade>): VolumeSummary {
  let vol = dec(0);
  for (const t of asBase) vol = vol.plus(t.base_quantity_normalized);
  for (const t of asQuote) vol = vol.plus(t.quote_quantity_normalized);
  return { vol: round8(vol), count: asBase.length + asQuote.length };
}
