// Raw ledger quantity: an exact base-10 integer string. Values pass 2^53.
export type RawQuantity = string;

export interface Trade {
  base_asset: string;
  quote_asset: string;
  unit_price: number;              // quote per base, normalized quantities
  base_quantity: RawQuantity;
  quote_quantity: RawQuantity;
  base_quantity_normalized: number;
  quote_quantity_normalized: number;
  block_index: number;
  block_time: number;              // epoch ms
}

export interface Order {
  tx_index: number;
  tx_hash: string;
  source: string;
  give_asset: string;
  give_quantity: RawQuantity;
  give_remaining: RawQuantity;
  get_asset: string;
  get_quantity: RawQuantity;
  get_remaining: RawQuantity;
  fee_required: RawQuantity;       // units of the fee asset
  fee_provided: RawQuantity;
  block_index: number;
  expiration: number;
  expire_index: number;
  status: string;
}

/** Order as returned to callers, with the block time resolved from the record store. */
export interface TimedOrder extends Order {
  block_time: number | null;
}

export interface AssetState {
  owner: string;
  description: string;
  divisible: boolean;
  locked: boolean;
  total_issued: RawQuantity;
  total_issued_normalized: number;
}

export interface AssetSnapshot extends AssetState {
  change_type: string;             // 'created' for the first entry
  at_block: number;
  at_block_time: number;           // epoch ms
}

export interface AssetRecord extends AssetSnapshot {
  asset: string;
  history: AssetSnapshot[];        // oldest -> newest, excludes the current state
}

export interface CallbackEvent {
  asset: string;
  fraction: number;                // (0, 1]
  block_index: number;
}

export interface AssetPair {
  base_asset: string;
  quote_asset: string;
}

export interface ResolvedPair extends AssetPair {
  pair_name: string;
  base: AssetRecord;
  quote: AssetRecord;
}

export interface TradeQuery {
  base_asset?: string;
  quote_asset?: string;
  since?: number;                  // epoch ms, inclusive
  until?: number;                  // epoch ms, inclusive
  order: 'asc' | 'desc';           // by block_time, then block_index
  limit?: number;
}

/** One credit or debit of an address's balance, as replicated from the ledger. */
export interface BalanceChange {
  address: string;
  asset: string;
  block_index: number;
  block_time: number;              // epoch ms
  quantity: RawQuantity;           // signed
  new_balance: RawQuantity;
  new_balance_normalized: number;
}

export interface BalanceChangeQuery {
  asset: string;
  address: string;
  since: number;                   // epoch ms, inclusive
  until: number;                   // epoch ms, inclusive
}

export interface RecordStore {
  init(): Promise<void>;
  findAsset(asset: string): Promise<AssetRecord | null>;
  findAssetsByOwner(owners: string[]): Promise<AssetRecord[]>;   // by asset name
  findTrades(query: TradeQuery): Promise<Trade[]>;
  findBalanceChanges(query: BalanceChangeQuery): Promise<BalanceChange[]>; // oldest first
  getBlockTime(blockIndex: number): Promise<number | null>;
  shutdown(): Promise<void>;
}

export type FilterOp = '==' | '!=' | '>' | '<' | '>=' | '<=';

export interface OrderFilter {
  field: keyof Order;
  op: FilterOp;
  value: string | number;
}

export interface OrderQuery {
  filters: OrderFilter[];
  show_expired: boolean;
  order_by: keyof Order;
  order_dir: 'asc' | 'desc';
}

export interface RunningInfo {
  db_caught_up: boolean;
  last_block: { block_index: number } | null;
  last_message_index: number;
  running_testnet: boolean;
}

export interface LedgerService {
  getOrders(query: OrderQuery): Promise<Order[]>;
  getCallbacks(asset: string): Promise<CallbackEvent[]>;
  getNativeSupply(): Promise<RawQuantity>;
  getRunningInfo(): Promise<RunningInfo>;
}
