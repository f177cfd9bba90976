import { createHmac } from 'node:crypto';
import type { ClientKey } from './types.ts';

// Rate-limit bucket key. The raw address and agent never leave this function.
export function deriveClientKey(
  address: string | undefined,
  userAgent: string | null | undefined,
  salt: string,
): ClientKey {
  return createHmac('sha256', salt)
    .update(`${address || 'unknown'}|${userAgent || 'unknown'}`)
    .digest('hex');
}

/** Stable, non-reversible stand-in for a subject identifier in log lines. */
export function pseudonymize(subject: string, salt: string): string {
  return createHmac('sha256', salt).update(subject).digest('hex').slice(0, 16);
}
