import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import { z } from 'zod';
import { CallbackEvent, LedgerService, Order, OrderQuery, RawQuantity, RunningInfo } from '../domain/types';
import { UpstreamUnavailableError } from '../domain/errors';
import { CallbackSchema, OrderSchema, RunningInfoSchema, parseLedgerBody, rawQuantity } from './wire';

export interface LedgerClientOptions {
  url: string;
  user: string;
  password: string;
  timeoutMs: number;
  useRateLimiter: boolean;
  maxReqSec: number;
}

const ResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.object({ message: z.string().optional() }).passthrough().nullish(),
    })
    .optional(),
});

type LedgerResult<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * JSON-RPC client for the ledger daemon.
 */
export class LedgerClient implements LedgerService {
  private axios: AxiosInstance;
  private queue: PQueue | null = null;
  private requestId = 0;

  constructor(private readonly options: LedgerClientOptions) {
    this.axios = axios.create({
      baseURL: options.url,
      httpAgent: new http.Agent({ keepAlive: true, maxSockets: options.maxReqSec + 15 }),
      httpsAgent: new https.Agent({ keepAlive: true, maxSockets: options.maxReqSec + 15 }),
      timeout: options.timeoutMs,
      auth: { username: options.user, password: options.password },
      headers: { 'Content-Type': 'application/json' },
      // raw quantities may exceed 2^53; parse them into strings
      responseType: 'text',
      transformResponse: [(data: unknown) => (typeof data === 'string' ? parseLedgerBody(data) : data)],
    });

    if (options.useRateLimiter) {
      this.queue = new PQueue({ interval: 1000, intervalCap: options.maxReqSec });
      console.log(`[LedgerClient] Rate limiter ENABLED (${options.maxReqSec} req/sec)`);
    }
  }

  public getOrders(query: OrderQuery): Promise<Order[]> {
    return this.call('get_orders', query, z.array(OrderSchema));
  }

  public getCallbacks(asset: string): Promise<CallbackEvent[]> {
    return this.call(
      'get_callbacks',
      { filters: [{ field: 'asset', op: '==', value: asset }] },
      z.array(CallbackSchema)
    );
  }

  public getNativeSupply(): Promise<RawQuantity> {
    return this.call('get_xcp_supply', [], rawQuantity);
  }

  public getRunningInfo(): Promise<RunningInfo> {
    return this.call('get_running_info', [], RunningInfoSchema);
  }

  private call<T>(method: string, params: unknown, schema: LedgerResult<T>): Promise<T> {
    const task = () => this.post(method, params, schema);
    return this.queue ? this.queue.add(task) : task();
  }

  private async post<T>(method: string, params: unknown, schema: LedgerResult<T>): Promise<T> {
    const id = ++this.requestId;
    let data: unknown;
    try {
      const res = await this.axios.post<unknown>('', { jsonrpc: '2.0', id, method, params });
      data = res.data;
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new UpstreamUnavailableError('ledger', `${method}: ${message}`, e);
    }

    const body = ResponseSchema.safeParse(data);
    if (!body.success) {
      throw new UpstreamUnavailableError('ledger', `${method}: malformed response`, body.error);
    }
    if (body.data.error) {
      const message = body.data.error.data?.message ?? body.data.error.message;
      throw new UpstreamUnavailableError('ledger', `${method}: ${message}`, body.data.error);
    }
    if (body.data.result === undefined) {
      throw new UpstreamUnavailableError('ledger', `${method}: response carries no result`);
    }

    const result = schema.safeParse(body.data.result);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
      throw new UpstreamUnavailableError('ledger', `${method}: unexpected result (${where})`, result.error);
    }
    return result.data;
  }
}
