import crypto from 'crypto';

// ANSI helpers (blank when NO_COLOR is set)
const plain = 'NO_COLOR' in process.env;
const ansi = (code: string): string => (plain ? '' : code);

export const c = {
  reset: ansi('\x1b[0m'),
  bold: ansi('\x1b[1m'),
  dim: ansi('\x1b[2m'),
  red: ansi('\x1b[31m'),
  green: ansi('\x1b[32m'),
  yellow: ansi('\x1b[33m'),
  blue: ansi('\x1b[34m'),
  magenta: ansi('\x1b[35m'),
  cyan: ansi('\x1b[36m'),
  gray: ansi('\x1b[90m'),
};

export function generateUserId(): string {
  return `user-${crypto.randomBytes(6).toString('hex')}`;
}

/** URL-safe random string carrying `bytes` bytes of entropy. */
export function randomToken(bytes: number = 32): string {
  return crypto.randomBytes(bytes).toString('base64url');
}

export function formatDate(iso: string): string {
  const d = new Date(iso.includes('T') ? iso : `${iso.replace(' ', 'T')}Z`);
  const now = new Date();
  const diffMs = now.getTime() - d.getTime();
  const diffMins = Math.floor(diffMs / 60000);
  const diffHours = Math.floor(diffMs / 3600000);
  const diffDays = Math.floor(diffMs / 86400000);

  if (diffMins < 1) return 'just now';
  if (diffMins < 60) return `${diffMins}m ago`;
  if (diffHours < 24) return `${diffHours}h ago`;
  if (diffDays < 7) return `${diffDays}d ago`;
  return d.toISOString().split('T')[0];
}

export function truncate(s: string, len: number): string {
  if (s.length <= len) return s;
  return s.slice(0, len - 1) + '…';
}

export function padRight(s: string, len: number): string {
  // Account for ANSI codes in length calculation
  const visible = s.replace(/\x1b\[[0-9;]*m/g, '');
  if (visible.length >= len) return s;
  return s + ' '.repeat(len - visible.length);
}

/** Show the first few characters of a secret, never the whole thing. */
export function maskSecret(value: string, visible: number = 4): string {
  if (value.length <= visible) return '*'.repeat(value.length);
  return `${value.slice(0, visible)}…`;
}

// ─── Logging ─────────────────────────────────────────────

type LogFields = Record<string, string | number | boolean | null | undefined>;

function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
    .join(' ');
}

function emit(color: string, level: string, event: string, fields: LogFields): void {
  if (process.env.TRAINLOG_LOG === 'silent') return;
  const line = `${c.gray}${new Date().toISOString()}${c.reset} ${color}${level}${c.reset} ${c.bold}${event}${c.reset} ${formatFields(fields)}`.trimEnd();
  if (level === 'error') console.error(line);
  else console.log(line);
}

/**
 * Event-style logger. Callers pass an event name and flat fields;
 * never pass passwords, token values or session ids.
 */
export const log = {
  info: (event: string, fields: LogFields = {}): void => emit(c.cyan, 'info', event, fields),
  warn: (event: string, fields: LogFields = {}): void => emit(c.yellow, 'warn', event, fields),
  error: (event: string, fields: LogFields = {}): void => emit(c.red, 'error', event, fields),
};
