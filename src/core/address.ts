// core/address.ts: Canonical (lowercase) account and market identifiers

import { isAddress } from 'ethers';
import { ConfigurationError } from './errors.js';

/**
 * Validate an 0x-prefixed 20-byte address and return its lowercase form.
 * Every map in the engine is keyed by the lowercase form.
 */
export function normalizeAddress(address: string): string {
  if (!isAddress(address)) {
    throw new ConfigurationError(
      'InvalidInput',
      `Invalid address: "${address}". Expected 0x-prefixed 40-character hex address.`,
      { address }
    );
  }
  return address.toLowerCase();
}

export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
