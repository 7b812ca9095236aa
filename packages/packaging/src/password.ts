import { randomInt } from 'node:crypto';

/**
 * Fresh 4-digit numeric archive password
 */
export function generateArchivePassword(): string {
  return String(randomInt(1000, 10000));
}
