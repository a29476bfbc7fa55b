import { z } from 'zod';
import { DataIntegrityFault, MarketDataError, UpstreamUnavailableError } from '../domain/errors';
import { MarketDataService } from '../service/MarketDataService';
import { ReadinessSource } from '../service/Readiness';

export const RPC_ERRORS = {
  PARSE: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL: -32603,
} as const;

export interface RpcError {
  code: number;
  message: string;
  data?: unknown;
}

export type RpcId = string | number | null;

export type RpcResponse =
  | { jsonrpc: '2.0'; id: RpcId; result: unknown }
  | { jsonrpc: '2.0'; id: RpcId; error: RpcError };

const asset = z.string().min(1);
const timestamp = z.number().int().nonnegative();
const addresses = z.array(z.string().min(1));

interface MethodDef<S extends z.ZodTypeAny> {
  // positional parameter order, for callers passing an array
  keys: string[];
  schema: S;
  run: (params: z.infer<S>) => Promise<unknown> | unknown;
}

type AnyMethod = MethodDef<z.ZodTypeAny>;

const method = <S extends z.ZodTypeAny>(def: MethodDef<S>): AnyMethod => ({
  keys: def.keys,
  schema: def.schema,
  run: (params) => def.run(def.schema.parse(params)),
});

export function buildMethods(service: MarketDataService, readiness: ReadinessSource): Map<string, AnyMethod> {
  return new Map<string, AnyMethod>([
    [
      'is_ready',
      method({
        keys: [],
        schema: z.object({}),
        run: () => {
          const { caught_up, last_message_index, testnet } = readiness.current();
          return { caught_up, last_message_index, testnet };
        },
      }),
    ],
    [
      'get_base_quote_asset',
      method({
        keys: ['asset1', 'asset2'],
        schema: z.object({ asset1: asset, asset2: asset }),
        run: (p) => service.getBaseQuoteAsset(p.asset1, p.asset2),
      }),
    ],
    [
      'get_market_price_summary',
      method({
        keys: ['asset1', 'asset2', 'with_last_trades'],
        schema: z.object({
          asset1: asset,
          asset2: asset,
          with_last_trades: z.number().int().optional(),
        }),
        run: (p) => service.getMarketPriceSummary(p.asset1, p.asset2, p.with_last_trades ?? 0),
      }),
    ],
    [
      'get_market_info',
      method({
        keys: ['assets'],
        schema: z.object({ assets: z.array(asset) }),
        run: (p) => service.getMarketInfo(p.assets),
      }),
    ],
    [
      'get_market_price_history',
      method({
        keys: ['asset1', 'asset2', 'start_ts', 'end_ts', 'as_dict'],
        schema: z.object({
          asset1: asset,
          asset2: asset,
          start_ts: timestamp.optional(),
          end_ts: timestamp.optional(),
          as_dict: z.boolean().optional(),
        }),
        run: (p) =>
          p.as_dict
            ? service.getMarketPriceHistory(p.asset1, p.asset2, p.start_ts, p.end_ts)
            : service.getMarketPriceHistoryRows(p.asset1, p.asset2, p.start_ts, p.end_ts),
      }),
    ],
    [
      'get_trade_history',
      method({
        keys: ['asset1', 'asset2', 'last_trades'],
        schema: z.object({ asset1: asset, asset2: asset, last_trades: z.number().int().optional() }),
        run: (p) => service.getTradeHistory(p.asset1, p.asset2, p.last_trades ?? 50),
      }),
    ],
    [
      'get_trade_history_within_dates',
      method({
        keys: ['asset1', 'asset2', 'start_ts', 'end_ts', 'limit'],
        schema: z.object({
          asset1: asset,
          asset2: asset,
          start_ts: timestamp.optional(),
          end_ts: timestamp.optional(),
          limit: z.number().int().optional(),
        }),
        run: (p) => service.getTradeHistoryWithinDates(p.asset1, p.asset2, p.start_ts, p.end_ts, p.limit ?? 50),
      }),
    ],
    [
      'get_order_book',
      method({
        keys: ['buy_asset', 'sell_asset', 'normalized_fee_provided', 'normalized_fee_required'],
        schema: z.object({
          buy_asset: asset,
          sell_asset: asset,
          normalized_fee_provided: z.number().nonnegative().nullish(),
          normalized_fee_required: z.number().nonnegative().nullish(),
        }),
        run: (p) =>
          service.getOrderBook(p.buy_asset, p.sell_asset, {
            fee_provided: p.normalized_fee_provided ?? undefined,
            fee_required: p.normalized_fee_required ?? undefined,
          }),
      }),
    ],
    [
      'get_asset_history',
      method({
        keys: ['asset', 'reverse'],
        schema: z.object({ asset, reverse: z.boolean().optional() }),
        run: (p) => service.getAssetHistory(p.asset, p.reverse ?? false),
      }),
    ],
    [
      'get_owned_assets',
      method({
        keys: ['addresses'],
        schema: z.object({ addresses }),
        run: (p) => service.getOwnedAssets(p.addresses),
      }),
    ],
    [
      'get_balance_history',
      method({
        keys: ['asset', 'addresses', 'normalize', 'start_ts', 'end_ts'],
        schema: z.object({
          asset,
          addresses,
          normalize: z.boolean().optional(),
          start_ts: timestamp.optional(),
          end_ts: timestamp.optional(),
        }),
        run: (p) => service.getBalanceHistory(p.asset, p.addresses, p.normalize ?? true, p.start_ts, p.end_ts),
      }),
    ],
  ]);
}

const RequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string(),
  params: z.union([z.record(z.unknown()), z.array(z.unknown())]).optional(),
});

function namedParams(keys: string[], params: Record<string, unknown> | unknown[] | undefined): unknown {
  if (params === undefined) return {};
  if (!Array.isArray(params)) return params;
  if (params.length > keys.length) return params;
  const named: Record<string, unknown> = {};
  params.forEach((value, i) => {
    named[keys[i]] = value;
  });
  return named;
}

export function toRpcError(e: unknown): RpcError {
  if (e instanceof z.ZodError) {
    return {
      code: RPC_ERRORS.INVALID_PARAMS,
      message: 'Invalid params',
      data: e.issues.map((i) => `${i.path.join('.') || 'params'}: ${i.message}`),
    };
  }
  if (e instanceof MarketDataError) {
    return { code: e.code, message: e.message, data: { type: e.name } };
  }
  return { code: RPC_ERRORS.INTERNAL, message: 'Internal error' };
}

/**
 * Dispatches one JSON-RPC 2.0 request. Never throws: failures become error responses.
 */
export class RpcDispatcher {
  private readonly methods: Map<string, AnyMethod>;

  constructor(service: MarketDataService, readiness: ReadinessSource) {
    this.methods = buildMethods(service, readiness);
  }

  public async handle(body: unknown): Promise<RpcResponse> {
    const request = RequestSchema.safeParse(body);
    if (!request.success) {
      return this.fail(null, { code: RPC_ERRORS.INVALID_REQUEST, message: 'Invalid Request' });
    }

    const id = request.data.id ?? null;
    const target = this.methods.get(request.data.method);
    if (!target) {
      return this.fail(id, { code: RPC_ERRORS.METHOD_NOT_FOUND, message: `Method not found: ${request.data.method}` });
    }

    try {
      const result = await target.run(namedParams(target.keys, request.data.params));
      return { jsonrpc: '2.0', id, result: result ?? null };
    } catch (e) {
      const error = toRpcError(e);
      if (error.code === RPC_ERRORS.INTERNAL) {
        console.error(`[RpcDispatcher] ${request.data.method} failed:`, e);
      } else if (e instanceof DataIntegrityFault || e instanceof UpstreamUnavailableError) {
        console.warn(`[RpcDispatcher] ${request.data.method}: ${error.message}`);
      }
      return this.fail(id, error);
    }
  }

  private fail(id: RpcId, error: RpcError): RpcResponse {
    return { jsonrpc: '2.0', id, error };
  }
}
