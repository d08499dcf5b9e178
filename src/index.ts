import 'dotenv/config';
import { createServer } from './http/server.js';
import { config } from './config/index.js';
import { getDb } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import { LocalFileStorage } from './services/file-storage.js';

async function main() {
  // 1. Init database
  const d = await getDb();
  console.log('Database connected');

  // 2. Bring the schema up to date
  const applied = await runMigrations(d);
  console.log(applied.length > 0 ? `Applied ${applied.length} migration(s)` : 'Schema up to date');

  // 3. Start HTTP server
  const server = createServer(new LocalFileStorage());
  server.listen(config.PORT, () => {
    console.log(`Chat store listening on port ${config.PORT}`);
  });
}

main().catch((err: unknown) => {
  console.error('[startup] fatal:', err);
  process.exit(1);
});
