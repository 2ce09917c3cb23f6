import type { Account } from '../contracts.js';

export type AccountLookupResult = Readonly<{ account: Account } | { error: string }>;

/**
 * First account whose `from_address` equals `address` exactly.
 */
export function findAccount(address: string, accounts: readonly Account[]): Account | undefined {
  return accounts.find((account) => account.fromAddress === address);
}

/**
 * Resolve the sending account or return a human-friendly error message.
 */
export function findAccountOrError(
  address: string,
  accounts: readonly Account[],
): AccountLookupResult {
  const account = findAccount(address, accounts);
  if (account) {
    return { account };
  }

  if (accounts.length === 0) {
    return { error: `No account matches sender '${address}'. No accounts are configured.` };
  }
  return {
    error: [
      `No account matches sender '${address}'.`,
      'Configured senders:',
      ...accounts.map((entry) => `- ${entry.fromAddress} (account.${entry.name})`),
    ].join('\n'),
  };
}
