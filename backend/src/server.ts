/**
 * WildVision Observations - Entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import 'dotenv/config';
import { env } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongodb.js';
import { buildApp } from './app.js';
import { MongoObservationRepo } from './modules/observation/index.js';

async function main(): Promise<void> {
  console.log(`[BOOT] Starting in ${env.NODE_ENV} mode`);

  const db = await connectMongo({
    uri: env.MONGO_URI,
    dbName: env.MONGO_DB,
    timeoutMs: env.MONGO_TIMEOUT_MS,
  });

  const store = new MongoObservationRepo(db, env.MONGO_COLLECTION);
  const app = buildApp({ store, config: env });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[BOOT] Received ${signal}, shutting down...`);
    try {
      await app.close();
      await disconnectMongo();
      console.log('[BOOT] Shutdown complete');
      process.exit(0);
    } catch (err) {
      console.error('[BOOT] Shutdown failed:', err);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[BOOT] Observations backend listening on ${env.HOST}:${env.PORT}`);
}

main().catch(async (err) => {
  console.error('[BOOT] Fatal error:', err);
  await disconnectMongo().catch((closeErr: unknown) => {
    console.error('[BOOT] Failed to close MongoDB client:', closeErr);
  });
  process.exit(1);
});
