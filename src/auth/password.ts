import bcrypt from 'bcryptjs';
import { AuthError } from '../errors.js';

// bcrypt only looks at the first 72 bytes
export const MAX_PASSWORD_BYTES = 72;

export function validatePassword(password: string): void {
  if (password.length === 0) {
    throw new AuthError('InvalidInput', 'Password is required');
  }
  if (Buffer.byteLength(password, 'utf8') > MAX_PASSWORD_BYTES) {
    throw new AuthError('InvalidInput', `Password must be at most ${MAX_PASSWORD_BYTES} bytes`);
  }
}

/** Salted bcrypt hash */
export async function hashPassword(password: string, rounds: number): Promise<string> {
  return bcrypt.hash(password, rounds);
}

export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}
