import { loadConfig } from '../config.js';
import type { AuthConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { startServer } from '../server.js';
import { c, log } from '../utils.js';

export interface ServeOptions {
  port?: string;
  db?: string;
}

export async function serveCommand(opts: ServeOptions = {}): Promise<void> {
  let config: AuthConfig;
  try {
    config = loadConfig({
      ...process.env,
      ...(opts.port ? { PORT: opts.port } : {}),
      ...(opts.db ? { DATABASE_PATH: opts.db } : {}),
    });
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`${c.red}✗ ${err.message}${c.reset}`);
      console.error(`${c.dim}Run "trainlog config check" to see every variable.${c.reset}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const running = await startServer(config);

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    log.info('server_stopping', { signal });
    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error('server_stop_failed', { reason: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}
