// src/accounts/application/AccountService.ts

/**
 * AccountService
 * --------------
 * Application service behind the account routes. Receives already validated values;
 * it does not re-check request input.
 */

import type { Account, AccountStore, AccountUpdate, AvatarMeta } from '../domain/Account';
import { AccountNotFoundError } from '../domain/Account';

export type AvatarUpload = {
  filename: string;
  contentType: string;
  sizeBytes: number;
  caption?: string;
};

export type AccountServiceOptions = {
  now?: () => Date;
};

export class AccountService {
  private readonly now: () => Date;

  public constructor(
    private readonly store: AccountStore,
    options: AccountServiceOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Creates or replaces the account fields; an existing avatar is kept.
   */
  public async updateAccount(update: AccountUpdate): Promise<Account> {
    const existing = await this.store.findById(update.id);

    const account: Account = {
      ...update,
      nicknames: [...update.nicknames],
      ...(existing?.avatar ? { avatar: existing.avatar } : {}),
      updatedAt: this.now().toISOString(),
    };

    await this.store.save(account);
    return account;
  }

  public async getAccount(id: number): Promise<Account> {
    const account = await this.store.findById(id);
    if (!account) {
      throw new AccountNotFoundError(id);
    }
    return account;
  }

  public async attachAvatar(id: number, upload: AvatarUpload): Promise<AvatarMeta> {
    const account = await this.getAccount(id);
    const timestamp = this.now().toISOString();

    const avatar: AvatarMeta = {
      filename: upload.filename,
      contentType: upload.contentType,
      sizeBytes: upload.sizeBytes,
      ...(upload.caption ? { caption: upload.caption } : {}),
      uploadedAt: timestamp,
    };

    await this.store.save({ ...account, avatar, updatedAt: timestamp });
    return avatar;
  }
}
