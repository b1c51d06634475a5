import { randomBytes } from 'crypto';

/**
 * Generate a random lowercase hex string
 */
export function randomHex(length: number = 16): string {
  return randomBytes(Math.ceil(length / 2))
    .toString('hex')
    .substring(0, length);
}

/** Identifier for events and spans */
export function shortId(): string {
  return randomHex(12);
}

/** Identifier for traces */
export function traceId(): string {
  return randomHex(16);
}
