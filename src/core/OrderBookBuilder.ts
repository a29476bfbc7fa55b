import Decimal from 'decimal.js';
import {
  AssetRecord,
  LedgerService,
  Order,
  OrderFilter,
  OrderQuery,
  RecordStore,
  TimedOrder,
} from '../domain/types';
import { PairCanonicalizer } from '../domain/AssetPairs';
import { dec, denormalizeQuantity, normalizeExact, ratio, round8 } from './decimal';

/** Caller's fee stance, in normalized units of the fee-bearing asset. */
export interface FeePreference {
  fee_provided?: number;
  fee_required?: number;
}

export interface BookLevel {
  unit_price: number;
  quantity: number;   // base units outstanding
  count: number;      // orders at this price
  cumulative_depth: number; // quantity from the best price through this level
}

export interface OrderBook {
  base_asset: string;
  quote_asset: string;
  bid_levels: BookLevel[];
  ask_levels: BookLevel[];
  bid_depth: number;
  ask_depth: number;
  spread: number;
  median: number;
  raw_orders: TimedOrder[];
  open_counter_orders: TimedOrder[];
}

interface SideFilters {
  bid: OrderFilter[];
  ask: OrderFilter[];
}

/**
 * Narrows both sides of the book to the orders that compete with, or can
 * fill, the caller when the fee-bearing asset is part of the pair.
 */
export function feeFilters(
  pair: { base_asset: string; quote_asset: string },
  buyAsset: string,
  feeAsset: string,
  fees: FeePreference,
  feeDivisible = true
): SideFilters {
  const out: SideFilters = { bid: [], ask: [] };
  const baseIsFee = pair.base_asset === feeAsset;
  if (!baseIsFee && pair.quote_asset !== feeAsset) return out;

  const buysFee = buyAsset === feeAsset;
  const callerFee = buysFee ? fees.fee_required : fees.fee_provided;
  if (callerFee === undefined) return out;
  const value = denormalizeQuantity(callerFee, feeDivisible);

  if (baseIsFee) {
    if (buysFee) {
      out.bid.push({ field: 'fee_required', op: '>=', value });
      out.ask.push({ field: 'fee_provided', op: '>=', value });
    } else {
      out.bid.push({ field: 'fee_required', op: '<=', value });
      out.ask.push({ field: 'fee_provided', op: '>=', value });
    }
  } else {
    if (buysFee) {
      out.bid.push({ field: 'fee_provided', op: '>=', value });
      out.ask.push({ field: 'fee_required', op: '>=', value });
    } else {
      out.bid.push({ field: 'fee_provided', op: '>=', value });
      out.ask.push({ field: 'fee_required', op: '<=', value });
    }
  }
  return out;
}

/**
 * Merges orders into price levels, best price first: bids descending,
 * asks ascending. Depth accumulates outward from the best level.
 */
export function makeBook(
  orders: ReadonlyArray<Order>,
  base: AssetRecord,
  quote: AssetRecord,
  isBidBook: boolean
): { levels: BookLevel[]; depth: number } {
  const book = new Map<string, { unit_price: number; quantity: Decimal; count: number }>();

  for (const o of orders) {
    let unitPrice: number;
    let remaining: Decimal;
    if (o.give_asset === base.asset) {
      unitPrice = ratio(o.get_quantity, o.give_quantity);
      remaining = normalizeExact(o.give_remaining, base.divisible);
    } else {
      unitPrice = ratio(o.give_quantity, o.get_quantity);
      remaining = normalizeExact(o.get_remaining, base.divisible);
    }

    const id = `${base.asset}_${quote.asset}_${unitPrice}`;
    const level = book.get(id) ?? { unit_price: unitPrice, quantity: dec(0), count: 0 };
    level.quantity = level.quantity.plus(remaining);
    level.count += 1;
    book.set(id, level);
  }

  const sorted = [...book.values()].sort((a, b) =>
    isBidBook ? b.unit_price - a.unit_price : a.unit_price - b.unit_price
  );

  let depth = dec(0);
  const levels = sorted.map((l): BookLevel => {
    depth = depth.plus(l.quantity);
    return {
      unit_price: l.unit_price,
      quantity: round8(l.quantity),
      count: l.count,
      cumulative_depth: round8(depth),
    };
  });

  return { levels, depth: round8(depth) };
}

export class OrderBookBuilder {
  constructor(
    private readonly store: RecordStore,
    private readonly ledger: LedgerService,
    private readonly pairs: PairCanonicalizer
  ) {}

  public async build(buyAsset: string, sellAsset: string, fees: FeePreference = {}): Promise<OrderBook> {
    const pair = await this.pairs.resolve(buyAsset, sellAsset, (asset) => this.store.findAsset(asset));
    const feeDivisible = pair.base_asset === this.pairs.feeAsset ? pair.base.divisible : pair.quote.divisible;
    const extra = feeFilters(pair, buyAsset, this.pairs.feeAsset, fees, feeDivisible);

    const [bidOrders, askOrders, counterOrders] = await Promise.all([
      this.ledger.getOrders(this.openOrders(pair.quote_asset, pair.base_asset, extra.bid)),
      this.ledger.getOrders(this.openOrders(pair.base_asset, pair.quote_asset, extra.ask)),
      this.ledger.getOrders(this.openOrders(buyAsset, sellAsset, [])),
    ]);

    const bids = makeBook(bidOrders, pair.base, pair.quote, true);
    const asks = makeBook(askOrders, pair.base, pair.quote, false);
    const { spread, median } = spreadAndMedian(bids.levels, asks.levels);

    const blockTimes = new Map<number, Promise<number | null>>();
    const withTime = (orders: Order[]) => this.attachBlockTimes(orders, blockTimes);

    return {
      base_asset: pair.base_asset,
      quote_asset: pair.quote_asset,
      bid_levels: bids.levels,
      ask_levels: asks.levels,
      bid_depth: bids.depth,
      ask_depth: asks.depth,
      spread,
      median,
      raw_orders: await withTime([...bidOrders, ...askOrders]),
      open_counter_orders: await withTime(counterOrders),
    };
  }

  private openOrders(giveAsset: string, getAsset: string, extra: OrderFilter[]): OrderQuery {
    return {
      filters: [
        { field: 'give_asset', op: '==', value: giveAsset },
        { field: 'get_asset', op: '==', value: getAsset },
        { field: 'give_remaining', op: '!=', value: 0 },
        ...extra,
      ],
      show_expired: false,
      order_by: 'block_index',
      order_dir: 'asc',
    };
  }

  private async attachBlockTimes(
    orders: Order[],
    cache: Map<number, Promise<number | null>>
  ): Promise<TimedOrder[]> {
    return Promise.all(
      orders.map(async (o) => {
        let pending = cache.get(o.block_index);
        if (!pending) {
          pending = this.store.getBlockTime(o.block_index);
          cache.set(o.block_index, pending);
        }
        return { ...o, block_time: await pending };
      })
    );
  }
}

export function spreadAndMedian(
  bidLevels: ReadonlyArray<BookLevel>,
  askLevels: ReadonlyArray<BookLevel>
): { spread: number; median: number } {
  const bestBid = bidLevels[0];
  const bestAsk = askLevels[0];
  const spread = bestBid && bestAsk ? round8(dec(bestAsk.unit_price).minus(bestBid.unit_price)) : 0;
  const median = bestAsk ? round8(dec(bestAsk.unit_price).minus(dec(spread).div(2))) : 0;
  return { spread, median };
}

