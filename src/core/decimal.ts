import Decimal from 'decimal.js';

// Every monetary value leaves the service through round8
const D = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_EVEN });

export const UNIT = 100_000_000;
export const PRICE_PLACES = 8;

export type Numeric = Decimal.Value;

export function dec(value: Numeric): Decimal {
  return new D(value);
}

export function round8(value: Numeric): number {
  return new D(value).toDecimalPlaces(PRICE_PLACES, Decimal.ROUND_HALF_EVEN).toNumber();
}

export function inverse(value: Numeric): number {
  return round8(new D(1).div(value));
}

export function ratio(numerator: Numeric, denominator: Numeric): number {
  return round8(new D(numerator).div(denominator));
}

export function mean(a: Numeric, b: Numeric): number {
  return round8(new D(a).plus(b).div(2));
}

/** Σ(value·weight) / Σweight, unrounded */
export function weightedAverage(inputs: ReadonlyArray<readonly [Numeric, Numeric]>): Decimal {
  let num = new D(0);
  let den = new D(0);
  for (const [value, weight] of inputs) {
    num = num.plus(new D(value).times(weight));
    den = den.plus(weight);
  }
  return num.div(den);
}

/** 100·(close − open)/open */
export function percentChange(open: Numeric, close: Numeric): number {
  return round8(new D(100).times(new D(close).minus(open)).div(open));
}

/** Raw ledger quantity to display units, kept exact. */
export function normalizeExact(quantity: Numeric, divisible = true): Decimal {
  return divisible ? new D(quantity).div(UNIT) : new D(quantity);
}

export function normalizeQuantity(quantity: Numeric, divisible = true): number {
  return normalizeExact(quantity, divisible).toNumber();
}

export function denormalizeQuantity(quantity: number, divisible = true): number {
  if (!divisible) return Math.trunc(quantity);
  return new D(quantity).times(UNIT).trunc().toNumber();
}
