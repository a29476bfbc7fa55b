import { describe, expect, it } from 'vitest';
import { OhlcAggregator, invertBucket, totalVolume } from '../src/core/OhlcAggregator';
import { HOUR, trade } from './helpers/fixtures';

// hour boundary: 472222 · 3600000
const H0 = 1_699_999_200_000;

describe('OhlcAggregator', () => {
  const trades = [
    trade('XCP', 'PEPE', 3, { at: H0 + HOUR + 5 * 60_000, baseQty: 2, block: 3 }),
    trade('XCP', 'PEPE', 4, { at: H0 + 50 * 60_000, baseQty: 3, block: 2 }),
    trade('XCP', 'PEPE', 2, { at: H0 + 10 * 60_000, baseQty: 1, block: 1 }),
  ];

  it('rolls trades into hour buckets in time order', () => {
    const buckets = OhlcAggregator.hourly().aggregate(trades);

    expect(buckets).toEqual([
      {
        period_key: H0,
        block_index: 2,
        open: 2,
        high: 4,
        low: 2,
        close: 4,
        volume: 4,
        quote_volume: 14,
        average: 3,
        trade_count: 2,
      },
      {
        period_key: H0 + HOUR,
        block_index: 3,
        open: 3,
        high: 3,
        low: 3,
        close: 3,
        volume: 2,
        quote_volume: 6,
        average: 3,
        trade_count: 1,
      },
    ]);
  });

  it('summarizes a whole window', () => {
    const bucket = OhlcAggregator.summarize(trades);

    expect(bucket).toMatchObject({ open: 2, high: 4, low: 2, close: 3, volume: 6, trade_count: 3 });
    expect(OhlcAggregator.summarize([])).toBeNull();
  });

  it('keeps one bucket per block', () => {
    const sameBlock = [
      trade('XCP', 'PEPE', 1, { at: H0, block: 7 }),
      trade('XCP', 'PEPE', 5, { at: H0, block: 7 }),
      trade('XCP', 'PEPE', 2, { at: H0 + 600_000, block: 8 }),
    ];

    const buckets = OhlcAggregator.perBlock().aggregate(sameBlock);

    expect(buckets.map((b) => [b.period_key, b.block_index, b.open, b.close, b.trade_count])).toEqual([
      [H0, 7, 1, 5, 2],
      [H0 + 600_000, 8, 2, 2, 1],
    ]);
  });

  it('inverts a bucket', () => {
    const [bucket] = OhlcAggregator.hourly().aggregate(trades);

    expect(invertBucket(bucket)).toMatchObject({
      open: 0.5,
      high: 0.5,
      low: 0.25,
      close: 0.25,
      average: 0.33333333,
      volume: 14,
      quote_volume: 4,
    });
  });

  it('totals base volume where the asset is base and quote volume where it is quote', () => {
    const asBase = [trade('PEPE', 'ZZZ', 2, { baseQty: 3 })];
    const asQuote = [trade('XCP', 'PEPE', 10, { baseQty: 2 }), trade('BTC', 'PEPE', 5, { baseQty: 1 })];

    expect(totalVolume(asBase, asQuote)).toEqual({ vol: 28, count: 3 });
  });
});
