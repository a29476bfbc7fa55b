import { Pool, PoolClient, PoolConfig } from 'pg';
import fs from 'fs';
import { AssetRecord, BalanceChange, BalanceChangeQuery, RecordStore, Trade, TradeQuery } from '../../domain/types';
import { UpstreamUnavailableError } from '../../domain/errors';
import {
  AssetRowSchema,
  BALANCE_CHANGE_COLUMNS,
  BalanceChangeRowSchema,
  BlockRowSchema,
  TRADE_COLUMNS,
  TradeRowSchema,
  parseRows,
} from './rows';

const REQUIRED_TABLES = ['tracked_assets', 'trades', 'processed_blocks', 'balance_changes'];
const ASSET_COLUMNS =
  'asset, owner, description, divisible, locked, total_issued, total_issued_normalized, change_type, at_block, at_block_time, history';

type Param = string | number | string[];
const UNDEFINED_TABLE = '42P01';

const pgCode = (e: unknown): string | undefined =>
  typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string' ? e.code : undefined;

/**
 * Record store over a Postgres-compatible database (Postgres, CockroachDB).
 * Read-only: the replicator owns the tables.
 */
export class PostgresRecordStore implements RecordStore {
  private pool: Pool;
  private initialized = false;

  constructor(
    connectionString: string,
    certPath: string,
    private readonly schemaPath: string
  ) {
    const config: PoolConfig = { connectionString };
    if (certPath) {
      if (!fs.existsSync(certPath)) {
        throw new Error(`SSL certificate not found at: ${certPath}`);
      }
      config.ssl = { rejectUnauthorized: true, ca: fs.readFileSync(certPath).toString() };
    }
    this.pool = new Pool(config);
  }

  /**
   * Checks that the replicated tables exist
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    for (const table of REQUIRED_TABLES) {
      try {
        await this.query(`SELECT 1 FROM ${table} LIMIT 1`);
      } catch (error) {
        if (error instanceof UpstreamUnavailableError && pgCode(error.originalError) === UNDEFINED_TABLE) {
          console.error(`[PostgresRecordStore] Table "${table}" does not exist!`);
          console.error('Create the schema with this SQL:');
          console.error(fs.existsSync(this.schemaPath) ? fs.readFileSync(this.schemaPath, 'utf8') : this.schemaPath);
        }
        throw error;
      }
    }

    this.initialized = true;
    console.log('[PostgresRecordStore] Initialized');
  }

  async findAsset(asset: string): Promise<AssetRecord | null> {
    const rows = await this.query(`SELECT ${ASSET_COLUMNS} FROM tracked_assets WHERE asset = $1`, [asset]);
    const [record] = parseRows(AssetRowSchema, 'tracked_assets', rows);
    return record ?? null;
  }

  async findAssetsByOwner(owners: string[]): Promise<AssetRecord[]> {
    const rows = await this.query(
      `SELECT ${ASSET_COLUMNS} FROM tracked_assets WHERE owner = ANY($1) ORDER BY asset ASC`,
      [owners]
    );
    return parseRows(AssetRowSchema, 'tracked_assets', rows);
  }

  async findTrades(q: TradeQuery): Promise<Trade[]> {
    const where: string[] = [];
    const params: Param[] = [];
    const bind = (clause: string, value: string | number) => {
      params.push(value);
      where.push(`${clause} $${params.length}`);
    };

    if (q.base_asset !== undefined) bind('base_asset =', q.base_asset);
    if (q.quote_asset !== undefined) bind('quote_asset =', q.quote_asset);
    if (q.since !== undefined) bind('block_time >=', q.since);
    if (q.until !== undefined) bind('block_time <=', q.until);

    const dir = q.order === 'desc' ? 'DESC' : 'ASC';
    let sql = `SELECT ${TRADE_COLUMNS} FROM trades`;
    if (where.length) sql += ` WHERE ${where.join(' AND ')}`;
    sql += ` ORDER BY block_time ${dir}, block_index ${dir}`;
    if (q.limit !== undefined) {
      params.push(q.limit);
      sql += ` LIMIT $${params.length}`;
    }

    return parseRows(TradeRowSchema, 'trades', await this.query(sql, params));
  }

  async findBalanceChanges(q: BalanceChangeQuery): Promise<BalanceChange[]> {
    const rows = await this.query(
      `SELECT ${BALANCE_CHANGE_COLUMNS} FROM balance_changes
        WHERE address = $1 AND asset = $2 AND block_time >= $3 AND block_time <= $4
        ORDER BY block_time ASC, block_index ASC`,
      [q.address, q.asset, q.since, q.until]
    );
    return parseRows(BalanceChangeRowSchema, 'balance_changes', rows);
  }

  async getBlockTime(blockIndex: number): Promise<number | null> {
    const rows = await this.query('SELECT block_index, block_time FROM processed_blocks WHERE block_index = $1', [
      blockIndex,
    ]);
    const [block] = parseRows(BlockRowSchema, 'processed_blocks', rows);
    return block?.block_time ?? null;
  }

  async shutdown(): Promise<void> {
    await this.pool.end();
    console.log('[PostgresRecordStore] Shutdown complete');
  }

  private async query(sql: string, params: Param[] = []): Promise<unknown[]> {
    let client: PoolClient | null = null;
    try {
      client = await this.pool.connect();
      const result = await client.query(sql, params);
      return result.rows;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamUnavailableError('record-store', message, error);
    } finally {
      if (client) client.release();
    }
  }
}
