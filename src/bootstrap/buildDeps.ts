// src/bootstrap/buildDeps.ts

/**
 * Composition Root
 * ----------------
 * The only place that wires infrastructure + application services.
 * app.ts depends on the route ports, not on concrete infrastructure.
 */

import type { AppDeps } from '../app';
import { config } from '../shared/config/Config';

import { InMemoryAccountStore } from '../accounts/infrastructure/InMemoryAccountStore';
import { AccountService } from '../accounts/application/AccountService';

export type RuntimeDeps = AppDeps & {
  /**
   * Called during graceful shutdown to release stores, flush buffers, etc.
   */
  shutdown: () => Promise<void>;
};

export function buildRuntimeDeps(): RuntimeDeps {
  // Infrastructure
  const accountStore = new InMemoryAccountStore();

  // Application services
  const accountService = new AccountService(accountStore);

  return {
    accountService,
    validationPolicy: config.validationPolicy,
    maxUploadBytes: config.maxUploadBytes,
    shutdown: async () => {
      accountStore.clear();
    },
  };
}
