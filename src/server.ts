import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createPool } from './db.js';
import { ensureSchema, hasSalesData } from './schema.js';
import { createPgSalesQueries } from './services/sales-queries.js';
import { createPgSalesStore } from './services/sales-store.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.postgres);

  await ensureSchema(pool);
  if (await hasSalesData(pool)) {
    console.log('[db] existing sales data found; ready for queries');
  } else {
    console.log('[db] database is empty; upload a monthly workbook to populate it');
  }

  const app = createApp({
    store: createPgSalesStore(pool),
    queries: createPgSalesQueries(pool),
    upload: config.upload,
  });

  app.listen(config.port, () => {
    console.log(`[api] up on :${config.port} (row error policy: ${config.upload.policy})`);
  });
}

main().catch((error: unknown) => {
  console.error('[api] failed to start', error);
  process.exit(1);
});
