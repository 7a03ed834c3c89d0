import { getAddress, isAddress, ZeroAddress } from 'ethers';

/**
 * Returns the checksummed form of `value`, or null when it is not a
 * 20-byte hex address. The zero address is returned as-is; callers decide
 * whether it is acceptable.
 */
export function normalizeAddress(value: string): string | null {
  if (!isAddress(value)) {
    return null;
  }
  return getAddress(value);
}

export function isZeroAddress(address: string): boolean {
  return address === ZeroAddress;
}
