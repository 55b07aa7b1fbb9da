import { resolveDatabasePath } from '../config.js';
import { openDb } from '../db.js';
import { getIdentities, listUsers } from '../auth/user-store.js';
import { c, formatDate, padRight, truncate } from '../utils.js';

export interface UsersOptions {
  db?: string;
  json?: boolean;
}

export function usersCommand(opts: UsersOptions = {}): void {
  const db = openDb(resolveDatabasePath(opts.db));
  try {
    const users = listUsers(db);

    if (opts.json) {
      const rows = users.map((u) => ({
        id: u.id,
        email: u.email,
        username: u.username,
        verified: u.is_verified,
        hasPassword: u.password_hash !== null,
        providers: getIdentities(db, u.id).map((i) => i.provider),
        createdAt: u.created_at,
        lastLoginAt: u.last_login_at,
      }));
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    if (users.length === 0) {
      console.log(`${c.dim}No users yet${c.reset}`);
      return;
    }

    console.log(`${c.bold}${users.length} user${users.length === 1 ? '' : 's'}${c.reset}\n`);
    for (const u of users) {
      const status = u.is_verified ? `${c.green}verified${c.reset}` : `${c.yellow}pending${c.reset}`;
      const logins = [
        ...(u.password_hash !== null ? ['password'] : []),
        ...getIdentities(db, u.id).map((i) => i.provider),
      ];
      const lastSeen = u.last_login_at ? formatDate(u.last_login_at) : 'never';
      console.log(
        `  ${c.dim}${padRight(u.id, 18)}${c.reset}` +
        ` ${padRight(truncate(u.username, 20), 20)}` +
        ` ${padRight(truncate(u.email, 32), 32)}` +
        ` ${padRight(status, 10)}` +
        ` ${c.cyan}${padRight(logins.join(',') || '-', 22)}${c.reset}` +
        ` ${c.dim}${lastSeen}${c.reset}`,
      );
    }
  } finally {
    db.close();
  }
}
