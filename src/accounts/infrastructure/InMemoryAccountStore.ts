// src/accounts/infrastructure/InMemoryAccountStore.ts

import type { Account, AccountStore } from '../domain/Account';

/**
 * Process-local AccountStore. Returns copies so callers cannot mutate stored state.
 */
export class InMemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<number, Account>();

  public async findById(id: number): Promise<Account | null> {
    const account = this.accounts.get(id);
    return account ? cloneAccount(account) : null;
  }

  public async save(account: Account): Promise<void> {
    this.accounts.set(account.id, cloneAccount(account));
  }

  public clear(): void {
    this.accounts.clear();
  }
}

function cloneAccount(account: Account): Account {
  return {
    ...account,
    nicknames: [...account.nicknames],
    ...(account.avatar ? { avatar: { ...account.avatar } } : {}),
  };
}
