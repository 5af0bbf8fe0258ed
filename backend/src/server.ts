/**
 * Regime Allocator backend entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { env } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { HttpMarketDataProvider, MarketDataService } from './modules/market-data/index.js';
import {
  InMemoryWeightOverrideRepo,
  MongoWeightOverrideRepo,
  WeightsService,
  type WeightOverrideRepo,
} from './modules/weights/index.js';

async function main(): Promise<void> {
  let repo: WeightOverrideRepo;
  if (env.MONGO_URL) {
    await connectMongo(env.MONGO_URL, env.DB_NAME);
    repo = new MongoWeightOverrideRepo();
  } else {
    console.log('[Boot] MONGO_URL not set, saved weights are kept in memory');
    repo = new InMemoryWeightOverrideRepo();
  }

  const market = new MarketDataService(new HttpMarketDataProvider(), {
    proxyTicker: env.MARKET_PROXY_TICKER,
    vixTicker: env.VIX_TICKER,
    spreadSeries: env.FRED_SPREAD_SERIES,
    historyRange: env.HISTORY_RANGE,
    fredApiKey: env.FRED_API_KEY,
    cacheTtlMs: env.MARKET_CACHE_TTL_MIN * 60 * 1000,
  });

  if (!env.FRED_API_KEY) {
    console.log('[Boot] FRED_API_KEY not set, credit spread is estimated from VIX');
  }

  const app = buildApp(env, { market, weights: new WeightsService(repo) });

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[Boot] Received ${signal}, shutting down...`);
    await app.close();
    await disconnectMongo();
    console.log('[Boot] Shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        console.error('[Boot] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log('═══════════════════════════════════════════════════════════════');
  console.log(`  ✅ Regime Allocator started on port ${env.PORT}`);
  console.log('═══════════════════════════════════════════════════════════════');
}

main().catch((err) => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
