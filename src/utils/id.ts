import { randomBytes } from 'crypto';

/**
 * Generate a prefixed, roughly time-ordered id, e.g. `evt_lx3k2a9f_8c1e0d4b2a`.
 */
export function generateId(prefix: string): string {
  const time = Date.now().toString(36);
  const rand = randomBytes(5).toString('hex');
  return `${prefix}_${time}_${rand}`;
}
