/**
 * HTTP entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main(): Promise<void> {
  const app = buildApp();

  // Graceful shutdown
  const shutdown = (signal: string) => {
    app.log.info(`Received ${signal}, shutting down...`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      },
    );
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: '0.0.0.0' });
  app.log.info(`ETF dip advisor started on port ${env.PORT} (mode ${env.DATA_MODE})`);
}

main().catch((err) => {
  console.error('[Server] Fatal error:', err);
  process.exit(1);
});
