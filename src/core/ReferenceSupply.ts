import { LedgerService } from '../domain/types';
import { PairCanonicalizer } from '../domain/AssetPairs';
import { dec, normalizeQuantity, round8 } from './decimal';

const HALVING_INTERVAL = 210_000;
const INITIAL_SUBSIDY = 50;

/** Fee-asset coins mined up to and including `blockCount` blocks, normalized. */
export function feeAssetSupplyAt(blockCount: number): number {
  let remaining = Math.max(0, Math.floor(blockCount));
  let reward = dec(INITIAL_SUBSIDY);
  let total = dec(0);

  while (remaining > 0) {
    const blocks = Math.min(remaining, HALVING_INTERVAL);
    total = total.plus(reward.times(blocks));
    remaining -= blocks;
    reward = reward.div(2);
  }
  return round8(total);
}

/**
 * Ledger-wide issuance of the two reference assets. The asset registry's
 * own issuance fields do not track them.
 */
export class ReferenceSupply {
  constructor(
    private readonly ledger: LedgerService,
    private readonly pairs: PairCanonicalizer
  ) {}

  public async supplyOf(asset: string): Promise<number | null> {
    if (asset === this.pairs.nativeAsset) {
      return normalizeQuantity(await this.ledger.getNativeSupply());
    }
    if (asset === this.pairs.feeAsset) {
      const info = await this.ledger.getRunningInfo();
      return feeAssetSupplyAt(info.last_block?.block_index ?? 0);
    }
    return null;
  }
}
