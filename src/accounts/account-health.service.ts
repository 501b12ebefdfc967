import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ACCOUNT_STORE, AccountStore } from '../storage/interfaces';
import {
  Account,
  AccountHealthSummary,
  AccountPublicInfo,
  AccountStatus,
  AccountStatusListener,
  AccountStatusResponse,
} from './interfaces';

function byPriorityThenLastUsed(a: Account, b: Account): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  // never used accounts go first
  return (a.lastUsedAt ?? 0) - (b.lastUsedAt ?? 0);
}

@Injectable()
export class AccountHealthService implements OnModuleInit {
  private readonly logger = new Logger(AccountHealthService.name);
  private readonly accounts = new Map<string, Account>();
  private readonly listeners = new Set<AccountStatusListener>();

  constructor(@Inject(ACCOUNT_STORE) private readonly store: AccountStore) {}

  async onModuleInit(): Promise<void> {
    await this.loadAccounts();
  }

  async loadAccounts(): Promise<void> {
    const accounts = await this.store.loadAccounts();
    this.accounts.clear();
    accounts.forEach((account) => this.accounts.set(account.id, { ...account }));

    if (accounts.length === 0) {
      this.logger.warn(
        'No accounts configured. Add TG_ACCOUNTS_<n> entries to enroll sessions.',
      );
      return;
    }

    this.logger.log(`Loaded ${accounts.length} account(s)`);
  }

  hasAccounts(): boolean {
    return this.accounts.size > 0;
  }

  getAccountCount(): number {
    return this.accounts.size;
  }

  getAccountById(accountId: string): Account | undefined {
    const account = this.accounts.get(accountId);
    return account ? { ...account } : undefined;
  }

  isBanned(accountId: string): boolean {
    return this.accounts.get(accountId)?.status === 'banned';
  }

  /**
   * Registers a listener for status transitions.
   *
   * @returns A function that removes the listener
   */
  onStatusChange(listener: AccountStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Gets the accounts that may run an operation right now, best first.
   * Flood waits that have run out are cleared on the way.
   *
   * @param limit - Maximum number of accounts; all eligible when omitted
   */
  async selectEligible(limit?: number): Promise<Account[]> {
    await this.expireFloodWaits(Date.now());

    const eligible = Array.from(this.accounts.values())
      .filter((account) => account.status === 'active')
      .sort(byPriorityThenLastUsed);

    const selected =
      limit === undefined ? eligible : eligible.slice(0, Math.max(0, limit));
    return selected.map((account) => ({ ...account }));
  }

  /**
   * Returns the account when it is eligible, clearing an expired flood wait.
   */
  async ensureEligible(accountId: string): Promise<Account | null> {
    const state = this.accounts.get(accountId);
    if (!state) {
      return null;
    }
    if (this.floodWaitExpired(state, Date.now())) {
      await this.clearFloodWait(state);
    }
    return state.status === 'active' ? { ...state } : null;
  }

  /**
   * Puts an account into flood wait for the platform-supplied duration.
   *
   * @returns The time the wait ends, or null when the account cannot wait
   */
  async markFloodWait(
    accountId: string,
    seconds: number,
  ): Promise<number | null> {
    const state = this.accounts.get(accountId);
    if (!state || state.status === 'banned' || state.status === 'inactive') {
      return null;
    }

    const until = Math.max(
      Date.now() + seconds * 1000,
      state.floodWaitUntil ?? 0,
    );
    this.transition(state, 'flood_wait', until);

    this.logger.warn(
      `Account ${accountId} (${state.displayName}) in flood wait until ${new Date(until).toISOString()}`,
    );
    await this.store.updateAccountStatus(accountId, 'flood_wait', until);
    await this.store.appendAuditLog({
      type: 'flood_wait',
      accountId,
      message: `Flood wait: ${seconds}s for ${state.displayName}`,
    });
    return until;
  }

  async markBanned(accountId: string, reason: string): Promise<void> {
    const state = this.accounts.get(accountId);
    if (!state || state.status === 'banned') {
      return;
    }

    this.transition(state, 'banned');
    this.logger.error(
      `Account ${accountId} (${state.displayName}) banned: ${reason}`,
    );
    await this.store.updateAccountStatus(accountId, 'banned');
    await this.store.appendAuditLog({
      type: 'ban',
      accountId,
      message: `Account ${state.displayName} banned: ${reason}`,
    });
  }

  async markInactive(accountId: string, reason: string): Promise<void> {
    const state = this.accounts.get(accountId);
    if (!state || state.status === 'banned' || state.status === 'inactive') {
      return;
    }

    this.transition(state, 'inactive');
    this.logger.warn(
      `Account ${accountId} (${state.displayName}) marked inactive: ${reason}`,
    );
    await this.store.updateAccountStatus(accountId, 'inactive');
    await this.store.appendAuditLog({
      type: 'inactive',
      accountId,
      message: `Session for ${state.displayName} is no longer valid: ${reason}`,
    });
  }

  /**
   * Returns an inactive account to rotation after its session was renewed.
   *
   * @returns False when the account is unknown or not inactive
   */
  async reactivate(accountId: string): Promise<boolean> {
    const state = this.accounts.get(accountId);
    if (!state || state.status !== 'inactive') {
      return false;
    }

    this.transition(state, 'active');
    this.logger.log(`Account ${accountId} (${state.displayName}) reactivated`);
    await this.store.updateAccountStatus(accountId, 'active');
    return true;
  }

  async recordFailure(accountId: string, message: string): Promise<void> {
    const state = this.accounts.get(accountId);
    if (!state) {
      return;
    }

    state.failedAttemptCount++;
    await this.store.incrementFailedAttempts(accountId);
    await this.store.appendAuditLog({
      type: 'error',
      accountId,
      message: `${state.displayName}: ${message}`,
    });
  }

  recordSuccess(accountId: string): void {
    const state = this.accounts.get(accountId);
    if (state) {
      state.lastUsedAt = Date.now();
    }
  }

  getHealthSummary(): AccountHealthSummary {
    const now = Date.now();
    const summary: AccountHealthSummary = {
      total: this.accounts.size,
      active: 0,
      floodWait: 0,
      banned: 0,
      inactive: 0,
    };

    for (const account of this.accounts.values()) {
      switch (this.effectiveStatus(account, now)) {
        case 'active':
          summary.active++;
          break;
        case 'flood_wait':
          summary.floodWait++;
          break;
        case 'banned':
          summary.banned++;
          break;
        case 'inactive':
          summary.inactive++;
          break;
      }
    }

    return summary;
  }

  getStatus(): AccountStatusResponse {
    const now = Date.now();
    const accounts: AccountPublicInfo[] = Array.from(
      this.accounts.values(),
    ).map((account) => ({
      id: account.id,
      displayName: account.displayName,
      status: this.effectiveStatus(account, now),
      floodWaitUntil: this.floodWaitExpired(account, now)
        ? undefined
        : account.floodWaitUntil,
      failedAttemptCount: account.failedAttemptCount,
      priority: account.priority,
      lastUsedAt: account.lastUsedAt,
    }));

    return { ...this.getHealthSummary(), accounts };
  }

  private effectiveStatus(account: Account, now: number): AccountStatus {
    return this.floodWaitExpired(account, now) ? 'active' : account.status;
  }

  private floodWaitExpired(account: Account, now: number): boolean {
    return (
      account.status === 'flood_wait' &&
      (account.floodWaitUntil === undefined || account.floodWaitUntil <= now)
    );
  }

  private async expireFloodWaits(now: number): Promise<void> {
    const expired = Array.from(this.accounts.values()).filter((account) =>
      this.floodWaitExpired(account, now),
    );
    for (const account of expired) {
      await this.clearFloodWait(account);
    }
  }

  private async clearFloodWait(account: Account): Promise<void> {
    this.transition(account, 'active');
    this.logger.debug(
      `Account ${account.id} flood wait expired, marking as active`,
    );
    await this.store.updateAccountStatus(account.id, 'active');
  }

  private transition(
    account: Account,
    status: AccountStatus,
    floodWaitUntil?: number,
  ): void {
    const previous = account.status;
    account.status = status;
    account.floodWaitUntil = status === 'flood_wait' ? floodWaitUntil : undefined;

    if (previous === status) {
      return;
    }

    for (const listener of this.listeners) {
      try {
        listener({ ...account }, previous);
      } catch (error) {
        const errorMessage =
          error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(
          `Status listener failed for ${account.id}: ${errorMessage}`,
        );
      }
    }
  }
}
