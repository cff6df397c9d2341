// src/accounts/domain/Account.ts

/**
 * Account
 *
 * Demo resource updated through validated request parameters.
 */

export type AvatarMeta = {
  filename: string;
  contentType: string;
  sizeBytes: number;
  caption?: string;
  uploadedAt: string;
};

export interface Account {
  id: number;
  username: string;
  age: number;
  nicknames: string[];
  /**
   * Days until the password expires; fractional values allowed.
   */
  passwordExpiry: number;
  isAdmin: boolean;
  avatar?: AvatarMeta;
  updatedAt: string;
}

export type AccountUpdate = Omit<Account, 'avatar' | 'updatedAt'>;

/**
 * Persistence port. Implementations live in infrastructure/.
 */
export interface AccountStore {
  findById(id: number): Promise<Account | null>;
  save(account: Account): Promise<void>;
}

export class AccountNotFoundError extends Error {
  public readonly accountId: number;

  public constructor(accountId: number) {
    super(`Account ${accountId} not found`);
    this.name = 'AccountNotFoundError';
    this.accountId = accountId;
  }
}
