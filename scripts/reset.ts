// ──────────────────────────────────────────
// Script: Reset — roll back every migration and re-run them
// ──────────────────────────────────────────

import { getDb, closeDb } from '../src/db/connection';
import { migrateLatest, migrateRollbackAll } from '../src/db/migration-source';

async function reset() {
  const db = getDb();
  console.log('[Reset] Rolling back all migrations...');
  await migrateRollbackAll(db);

  console.log('[Reset] Running migrations...');
  const applied = await migrateLatest(db);

  console.log(`[Reset] Done: ${applied.join(', ')}`);
  await closeDb();
  process.exit(0);
}

reset().catch((err) => {
  console.error('[Reset] Error:', err);
  process.exit(1);
});
