import { AssetRecord, AssetSnapshot, CallbackEvent, LedgerService, RecordStore } from '../domain/types';
import { AnyAssetEvent, CalledBackEvent } from '../domain/events';
import { DataIntegrityFault, InvalidAssetError } from '../domain/errors';
import { dec, normalizeExact, round8 } from './decimal';

/**
 * Diffs consecutive snapshots of an asset into typed change events.
 * A snapshot whose tag does not match its diff is a data fault; nothing
 * is emitted for it.
 */
export function replaySnapshots(asset: string, snapshots: ReadonlyArray<AssetSnapshot>): AnyAssetEvent[] {
  const events: AnyAssetEvent[] = [];
  let prev: AssetSnapshot | null = null;

  for (const cur of snapshots) {
    const at = { at_block: cur.at_block, at_block_time: cur.at_block_time };

    if (!prev) {
      if (cur.change_type !== 'created') {
        throw new DataIntegrityFault(`first snapshot is tagged '${cur.change_type}', expected 'created'`, asset);
      }
      events.push({
        type: 'created',
        ...at,
        owner: cur.owner,
        description: cur.description,
        divisible: cur.divisible,
        locked: cur.locked,
        total_issued: cur.total_issued,
        total_issued_normalized: cur.total_issued_normalized,
      });
      prev = cur;
      continue;
    }

    if (prev.at_block > cur.at_block) {
      throw new DataIntegrityFault(`snapshot at block ${cur.at_block} follows block ${prev.at_block}`, asset);
    }

    switch (cur.change_type) {
      case 'locked':
        if (prev.locked === cur.locked) {
          throw new DataIntegrityFault(`'locked' at block ${cur.at_block} leaves the lock unchanged`, asset);
        }
        events.push({ type: 'locked', ...at });
        break;
      case 'transferred':
        if (prev.owner === cur.owner) {
          throw new DataIntegrityFault(`'transferred' at block ${cur.at_block} keeps owner ${cur.owner}`, asset);
        }
        events.push({ type: 'transferred', ...at, prev_owner: prev.owner, new_owner: cur.owner });
        break;
      case 'changed_description':
        if (prev.description === cur.description) {
          throw new DataIntegrityFault(`'changed_description' at block ${cur.at_block} keeps the description`, asset);
        }
        events.push({
          type: 'changed_description',
          ...at,
          prev_description: prev.description,
          new_description: cur.description,
        });
        break;
      default: {
        // any other tag records an issuance
        const additional = dec(cur.total_issued).minus(prev.total_issued);
        if (additional.lte(0)) {
          throw new DataIntegrityFault(
            `'${cur.change_type}' at block ${cur.at_block} does not increase issuance (${prev.total_issued} -> ${cur.total_issued})`,
            asset
          );
        }
        events.push({
          type: 'issued_more',
          ...at,
          additional: additional.toFixed(),
          additional_normalized: round8(normalizeExact(additional, cur.divisible)),
          total_issued: cur.total_issued,
          total_issued_normalized: cur.total_issued_normalized,
        });
      }
    }
    prev = cur;
  }

  return events;
}

/**
 * Splices callbacks into a block-ordered timeline: a callback goes ahead of
 * the first event at a strictly later block; the rest trail at the end.
 */
export function mergeCallbacks(
  events: ReadonlyArray<AnyAssetEvent>,
  callbacks: ReadonlyArray<CalledBackEvent>
): AnyAssetEvent[] {
  const pending = [...callbacks].sort((a, b) => a.at_block - b.at_block);
  const merged: AnyAssetEvent[] = [];
  let next = 0;

  for (const e of events) {
    while (next < pending.length && pending[next].at_block < e.at_block) {
      merged.push(pending[next++]);
    }
    merged.push(e);
  }
  while (next < pending.length) merged.push(pending[next++]);
  return merged;
}

export class AssetHistoryReconstructor {
  constructor(
    private readonly store: RecordStore,
    private readonly ledger: LedgerService
  ) {}

  public async history(assetName: string, reverse = false): Promise<AnyAssetEvent[]> {
    const asset = await this.store.findAsset(assetName);
    if (!asset) throw new InvalidAssetError(assetName);

    const events = replaySnapshots(asset.asset, this.snapshotsOf(asset));
    const callbacks = await this.calledBack(asset.asset, await this.ledger.getCallbacks(asset.asset));

    const timeline = mergeCallbacks(events, callbacks);
    return reverse ? timeline.reverse() : timeline;
  }

  // the current state is the newest snapshot
  private snapshotsOf(asset: AssetRecord): AssetSnapshot[] {
    const { asset: _name, history, ...current } = asset;
    return [...history, current];
  }

  private async calledBack(asset: string, callbacks: CallbackEvent[]): Promise<CalledBackEvent[]> {
    return Promise.all(
      callbacks.map(async (cb): Promise<CalledBackEvent> => {
        const blockTime = await this.store.getBlockTime(cb.block_index);
        if (blockTime === null) {
          throw new DataIntegrityFault(`no block time for callback at block ${cb.block_index}`, asset);
        }
        return {
          type: 'called_back',
          at_block: cb.block_index,
          at_block_time: blockTime,
          percentage: round8(dec(cb.fraction).times(100)),
        };
      })
    );
  }
}
