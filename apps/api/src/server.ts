import 'dotenv/config';
import { assertRecordSchema, closePool, getPool } from '@field-visit/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { buildContainer } from './container.js';
import { loadServerConfig } from './config/server-config.js';
import { loadTrackingConfig } from './config/tracking-config.js';
import { createLogger } from './lib/logger.js';

const log = createLogger('server');

async function main() {
  const config = loadServerConfig();
  if (config.RECORD_STORE === 'postgres') getPool({ connectionString: config.DATABASE_URL });
  const container = buildContainer({ server: config, tracking: loadTrackingConfig() });

  if (config.RECORD_STORE === 'postgres') {
    await assertRecordSchema();
    log.info('database connected');
  }

  await container.feed.start();
  container.synchronizer.start();

  // Full sweep on startup, then deltas since the previous sweep began.
  let watermark = new Date(0);
  let sweeping = false;
  const sweep = async () => {
    if (sweeping) return;
    sweeping = true;
    try {
      const startedAt = await container.clock.now();
      await container.synchronizer.reconcile(watermark);
      watermark = startedAt;
    } finally {
      sweeping = false;
    }
  };
  await sweep();
  const reconcileTimer = setInterval(() => {
    sweep().catch((err: unknown) => {
      log.warn('reconcile sweep failed (non-fatal)', err);
    });
  }, config.RECONCILE_INTERVAL_MS);

  const app = buildApp(container, { corsOrigin: config.CORS_ORIGIN });
  const { httpServer, wsGateway } = buildHttpServer(app, container);

  httpServer.listen(config.PORT, () => {
    log.info(`listening on http://0.0.0.0:${config.PORT} (store: ${config.RECORD_STORE})`);
  });

  const shutdown = async () => {
    log.info('shutting down...');
    clearInterval(reconcileTimer);
    container.tracking.shutdown();
    container.synchronizer.stop();
    await container.feed.close();
    await wsGateway.close();
    httpServer.close();
    if (config.RECORD_STORE === 'postgres') await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      log.error('shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
