import { describe, expect, it } from 'vitest';
import { ReferenceSupply, feeAssetSupplyAt } from '../src/core/ReferenceSupply';
import { PairCanonicalizer } from '../src/domain/AssetPairs';
import { FakeLedger } from './helpers/FakeLedger';

describe('feeAssetSupplyAt', () => {
  it('follows the halving schedule', () => {
    expect(feeAssetSupplyAt(0)).toBe(0);
    expect(feeAssetSupplyAt(1)).toBe(50);
    expect(feeAssetSupplyAt(210_000)).toBe(10_500_000);
    expect(feeAssetSupplyAt(210_001)).toBe(10_500_025);
    expect(feeAssetSupplyAt(630_000)).toBe(18_375_000);
  });
});

describe('ReferenceSupply', () => {
  const ledger = new FakeLedger();
  ledger.nativeSupply = '123456789';
  ledger.runningInfo = { ...ledger.runningInfo, last_block: { block_index: 2 } };
  const supply = new ReferenceSupply(ledger, new PairCanonicalizer('XCP', 'BTC'));

  it('normalizes the native supply', async () => {
    expect(await supply.supplyOf('XCP')).toBe(1.23456789);
  });

  it('derives the fee asset supply from the last block', async () => {
    expect(await supply.supplyOf('BTC')).toBe(100);
  });

  it('leaves other assets to the registry', async () => {
    expect(await supply.supplyOf('PEPE')).toBeNull();
  });
});
