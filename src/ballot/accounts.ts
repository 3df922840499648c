import { getAddress, isAddress } from 'ethers';
import { AccountId } from './types';

/**
 * Canonical form of an account identifier used as a roster key.
 * Ethereum addresses are checksummed so that casing never splits one account into two;
 * any other identifier is kept as given, minus surrounding whitespace.
 * @param account - The account identifier supplied by the host
 * @returns The canonical identifier
 */
export function normalizeAccount(account: AccountId): AccountId {
  const trimmed = account.trim();
  if (isAddress(trimmed)) {
    return getAddress(trimmed);
  }
  return trimmed;
}

/**
 * Checks that an account identifier is a non-empty string.
 */
export function isValidAccount(account: unknown): account is AccountId {
  return typeof account === 'string' && account.trim().length > 0;
}

/**
 * Compares two account identifiers after normalization.
 */
export function sameAccount(a: AccountId, b: AccountId): boolean {
  return normalizeAccount(a) === normalizeAccount(b);
}
