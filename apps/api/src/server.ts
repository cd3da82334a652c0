import { buildApp, buildHttpServer } from './app.js';
import { closePool } from '@fleet-ledger/adapters';
import { loadConfig } from './config/app-config.js';
import { createRecordStore } from './services/record-store.factory.js';

async function main() {
  const config = loadConfig();
  const { store, kind } = await createRecordStore(config);

  const app = buildApp({ store, storeKind: kind }, config);
  const httpServer = buildHttpServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port} (store: ${kind})`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] error during shutdown', err);
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
