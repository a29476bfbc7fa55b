import { AssetPair, AssetRecord, ResolvedPair } from './types';
import { InvalidAssetError, InvalidPairError } from './errors';

export type AssetLookup = (asset: string) => Promise<AssetRecord | null>;

/**
 * Maps an unordered asset pair onto (base, quote). The native reference
 * asset is always the base, then the fee-bearing one; any other pair is
 * ordered by name.
 */
export class PairCanonicalizer {
  constructor(
    public readonly nativeAsset: string,
    public readonly feeAsset: string
  ) {}

  public canonicalize(asset1: string, asset2: string): AssetPair {
    if (!asset1 || !asset2 || asset1 === asset2) {
      throw new InvalidPairError(asset1, asset2);
    }

    for (const ref of [this.nativeAsset, this.feeAsset]) {
      if (asset1 === ref) return { base_asset: asset1, quote_asset: asset2 };
      if (asset2 === ref) return { base_asset: asset2, quote_asset: asset1 };
    }

    return asset1 < asset2
      ? { base_asset: asset1, quote_asset: asset2 }
      : { base_asset: asset2, quote_asset: asset1 };
  }

  public isReferenceAsset(asset: string): boolean {
    return asset === this.nativeAsset || asset === this.feeAsset;
  }

  public pairName(pair: AssetPair): string {
    return `${pair.base_asset}/${pair.quote_asset}`;
  }

  public async resolve(asset1: string, asset2: string, lookup: AssetLookup): Promise<ResolvedPair> {
    const pair = this.canonicalize(asset1, asset2);
    const [base, quote] = await Promise.all([lookup(pair.base_asset), lookup(pair.quote_asset)]);
    if (!base) throw new InvalidAssetError(pair.base_asset);
    if (!quote) throw new InvalidAssetError(pair.quote_asset);

    return { ...pair, pair_name: this.pairName(pair), base, quote };
  }
}
