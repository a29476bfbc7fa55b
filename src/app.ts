import http from 'http';
import { CONFIG } from './config';
import { RecordStore } from './domain/types';
import { PostgresRecordStore } from './infra/repositories/PostgresRecordStore';
import { SupabaseRecordStore } from './infra/repositories/SupabaseRecordStore';
import { LedgerClient } from './infra/LedgerClient';
import { MarketDataService } from './service/MarketDataService';
import { ReadinessMonitor } from './service/Readiness';
import { createApp } from './api/server';

async function main() {
  // 1. Init record store
  const store: RecordStore = CONFIG.DB.USE_POSTGRES
    ? new PostgresRecordStore(CONFIG.DB.POSTGRES_CONN, CONFIG.DB.POSTGRES_CERT, CONFIG.DB.SCHEMA_PATH)
    : new SupabaseRecordStore(CONFIG.DB.SUPABASE_URL, CONFIG.DB.SUPABASE_KEY, CONFIG.DB.SCHEMA_PATH);
  await store.init();

  // 2. Ledger daemon + readiness poll
  const ledger = new LedgerClient({
    url: CONFIG.LEDGER.RPC_URL,
    user: CONFIG.LEDGER.RPC_USER,
    password: CONFIG.LEDGER.RPC_PASSWORD,
    timeoutMs: CONFIG.LEDGER.TIMEOUT_MS,
    useRateLimiter: CONFIG.LEDGER.USE_RATE_LIMITER,
    maxReqSec: CONFIG.LEDGER.MAX_REQ_SEC,
  });
  const readiness = new ReadinessMonitor(ledger, CONFIG.LEDGER.READINESS_POLL_MS, CONFIG.LEDGER.TESTNET);
  readiness.start();

  // 3. API
  const service = new MarketDataService(store, ledger, {
    nativeAsset: CONFIG.MARKET.NATIVE_ASSET,
    feeAsset: CONFIG.MARKET.FEE_ASSET,
  });
  const server = http.createServer(createApp({ service, readiness }));
  server.listen(CONFIG.PORT, () => console.log(`Market data API running on ${CONFIG.PORT}`));

  // Graceful Shutdown
  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    console.log('Stopping...');
    readiness.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await store.shutdown();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((e) => {
      console.error('Shutdown failed:', e);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
