import { createServer } from 'http';
import { applySchema, closePool, getPool } from '@traffic-vault/adapters';
import { buildApp } from './app.js';
import { createRepositories, getStoreBackend } from './config/store-backend.js';
import { SecureDomainService } from './services/secure-domain/secure-domain.service.js';
import { preloadDataset } from './services/dataset-loader.js';

const PORT = parseInt(process.env['PORT'] ?? '3001', 10);

async function main() {
  const backend = getStoreBackend();
  if (backend === 'postgres') {
    await getPool().query('SELECT 1');
    await applySchema();
    console.log('[server] database connected, schema applied');
  } else {
    console.log('[server] using in-memory store; datasets are lost on restart');
  }

  const { datasets, requests } = createRepositories(backend);
  const domain = new SecureDomainService(datasets, requests);

  const seedFile = process.env['SEED_DATASET_FILE'];
  if (seedFile) {
    const dataset = await preloadDataset(domain, seedFile);
    console.log(`[server] preloaded ${seedFile} as dataset ${dataset.id}`);
  }

  const app = buildApp({ domain, store: backend });
  const httpServer = createServer(app);

  httpServer.listen(PORT, () => {
    console.log(`[server] listening on http://0.0.0.0:${PORT}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    if (backend === 'postgres') await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
