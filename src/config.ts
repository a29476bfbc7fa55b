import 'dotenv/config';
import path from 'path';

const num = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && value !== '' && Number.isFinite(parsed) ? parsed : fallback;
};

export const CONFIG = {
  PORT: num(process.env.PORT, 4100),
  DB: {
    USE_POSTGRES: process.env.USE_POSTGRES === 'true',
    POSTGRES_CONN: process.env.POSTGRES_CONNECTION_STRING ?? '',
    // CA bundle for TLS; plain connection when empty
    POSTGRES_CERT: process.env.POSTGRES_CERT_PATH ?? '',
    SUPABASE_URL: process.env.SUPABASE_URL ?? '',
    SUPABASE_KEY: process.env.SUPABASE_KEY ?? '',
    SCHEMA_PATH: process.env.DB_SCHEMA_PATH || path.resolve(process.cwd(), 'sql/schema.sql'),
  },
  LEDGER: {
    RPC_URL: process.env.LEDGER_RPC_URL || 'http://localhost:4000/api/',
    RPC_USER: process.env.LEDGER_RPC_USER || 'rpc',
    RPC_PASSWORD: process.env.LEDGER_RPC_PASSWORD ?? '',
    TIMEOUT_MS: num(process.env.LEDGER_TIMEOUT_MS, 10_000),
    USE_RATE_LIMITER: process.env.USE_RATE_LIMITER === 'true',
    MAX_REQ_SEC: num(process.env.MAX_REQ_SEC, 35),
    READINESS_POLL_MS: num(process.env.READINESS_POLL_MS, 5_000),
    TESTNET: process.env.TESTNET === 'true',
  },
  MARKET: {
    NATIVE_ASSET: (process.env.NATIVE_ASSET || 'XCP').toUpperCase(),
    FEE_ASSET: (process.env.FEE_ASSET || 'BTC').toUpperCase(),
  },
};

export type AppConfig = typeof CONFIG;
