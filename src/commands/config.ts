import { CONFIG_VARIABLES, getConfiguredProviders, loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { c, maskSecret, padRight } from '../utils.js';

type Env = Record<string, string | undefined>;

/**
 * Print every recognised variable (secrets masked) and validate the lot.
 * Returns false when the configuration would not start a server.
 */
export function configCheckCommand(env: Env = process.env): boolean {
  console.log(`${c.bold}Environment:${c.reset}\n`);
  for (const variable of CONFIG_VARIABLES) {
    const raw = env[variable.name]?.trim();
    let shown: string;
    if (!raw) {
      shown = variable.required ? `${c.red}(missing)${c.reset}` : `${c.dim}(not set)${c.reset}`;
    } else {
      shown = variable.secret ? maskSecret(raw) : raw;
    }
    console.log(`  ${padRight(`${c.bold}${variable.name}${c.reset}`, 32)} ${shown}`);
  }
  console.log('');

  try {
    const config = loadConfig(env);
    const providers = getConfiguredProviders(config);
    console.log(`${c.green}✓${c.reset} Configuration is valid`);
    console.log(`  ${c.dim}app url:   ${config.appUrl}${c.reset}`);
    console.log(`  ${c.dim}database:  ${config.databasePath}${c.reset}`);
    console.log(`  ${c.dim}providers: ${providers.length ? providers.join(', ') : 'none'}${c.reset}`);
    console.log(`  ${c.dim}mail:      ${config.smtp ? `smtp ${config.smtp.host}:${config.smtp.port}` : 'console (SMTP_HOST not set)'}${c.reset}`);
    return true;
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`${c.red}✗ ${err.message}${c.reset}`);
      return false;
    }
    throw err;
  }
}
