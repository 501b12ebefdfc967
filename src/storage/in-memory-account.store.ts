import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AccountSeed } from '../config/configuration';
import { Account, AccountStatus } from '../accounts/interfaces';
import { AccountStore, AuditEntry } from './interfaces';

/**
 * Account store seeded from `TG_ACCOUNTS_<n>` environment entries. State lives
 * for the lifetime of the process; the audit log keeps the newest entries only.
 */
@Injectable()
export class InMemoryAccountStore implements AccountStore {
  private readonly logger = new Logger(InMemoryAccountStore.name);
  private readonly accounts = new Map<string, Account>();
  private readonly auditLog: AuditEntry[] = [];
  private readonly auditLogSize: number;

  constructor(private readonly configService: ConfigService) {
    this.auditLogSize =
      this.configService.get<number>('accounts.auditLogSize') || 1000;

    const seeds = this.configService.get<AccountSeed[]>('accounts.list') || [];
    seeds.forEach((seed, index) => {
      const id = `account-${index + 1}`;
      this.accounts.set(id, {
        id,
        credentialRef: seed.session,
        displayName: seed.displayName,
        status: 'active',
        failedAttemptCount: 0,
        priority: seed.priority ?? 1,
      });
    });
  }

  loadAccounts(): Promise<Account[]> {
    return Promise.resolve(
      Array.from(this.accounts.values()).map((account) => ({ ...account })),
    );
  }

  updateAccountStatus(
    accountId: string,
    status: AccountStatus,
    floodWaitUntil?: number,
  ): Promise<void> {
    const account = this.accounts.get(accountId);
    if (account) {
      account.status = status;
      account.floodWaitUntil =
        status === 'flood_wait' ? floodWaitUntil : undefined;
    } else {
      this.logger.warn(`Status update for unknown account ${accountId}`);
    }
    return Promise.resolve();
  }

  incrementFailedAttempts(accountId: string): Promise<void> {
    const account = this.accounts.get(accountId);
    if (account) {
      account.failedAttemptCount++;
    }
    return Promise.resolve();
  }

  appendAuditLog(entry: Omit<AuditEntry, 'createdAt'>): Promise<void> {
    this.auditLog.push({ ...entry, createdAt: new Date().toISOString() });
    if (this.auditLog.length > this.auditLogSize) {
      this.auditLog.splice(0, this.auditLog.length - this.auditLogSize);
    }
    return Promise.resolve();
  }

  getAuditLog(limit: number): Promise<AuditEntry[]> {
    return Promise.resolve(this.auditLog.slice(-limit).reverse());
  }
}
