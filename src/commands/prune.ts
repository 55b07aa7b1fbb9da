import { resolveDatabasePath } from '../config.js';
import { openDb } from '../db.js';
import { SqliteSessionStore } from '../auth/session.js';
import { purgeExpiredTokens } from '../auth/tokens.js';
import { c } from '../utils.js';

export interface PruneOptions {
  db?: string;
}

/** Drop expired sessions plus expired or consumed verification tokens. */
export function pruneCommand(opts: PruneOptions = {}): void {
  const db = openDb(resolveDatabasePath(opts.db));
  try {
    // ttl is irrelevant when only purging
    const sessions = new SqliteSessionStore(db, { ttlMs: 1 }).purgeExpired();
    const tokens = purgeExpiredTokens(db);
    console.log(`${c.green}✓${c.reset} Pruned ${c.bold}${sessions}${c.reset} session${sessions === 1 ? '' : 's'} and ${c.bold}${tokens}${c.reset} token${tokens === 1 ? '' : 's'}`);
  } finally {
    db.close();
  }
}
