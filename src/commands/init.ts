import fs from 'fs';
import path from 'path';
import { resolveDatabasePath } from '../config.js';
import { openDb } from '../db.js';
import { c } from '../utils.js';

export interface InitOptions {
  db?: string;
}

export function initCommand(opts: InitOptions = {}): void {
  const dbPath = resolveDatabasePath(opts.db);
  const existed = fs.existsSync(dbPath);

  const db = openDb(dbPath);
  db.close();

  const shown = path.resolve(dbPath);
  if (existed) {
    console.log(`${c.yellow}⚠ Database already exists at ${shown}${c.reset} ${c.dim}(schema checked)${c.reset}`);
    return;
  }
  console.log(`${c.green}✓${c.reset} Initialized auth database at ${c.dim}${shown}${c.reset}`);
}
