import { Account, AccountStatus } from '../../accounts/interfaces';

export type AuditType =
  | 'join'
  | 'view'
  | 'react'
  | 'vote'
  | 'live_join'
  | 'flood_wait'
  | 'ban'
  | 'inactive'
  | 'error'
  | 'retry_alert';

export interface AuditEntry {
  type: AuditType;
  accountId?: string;
  message: string;
  createdAt: string;
}

export interface AccountStore {
  loadAccounts(): Promise<Account[]>;
  updateAccountStatus(
    accountId: string,
    status: AccountStatus,
    floodWaitUntil?: number,
  ): Promise<void>;
  incrementFailedAttempts(accountId: string): Promise<void>;
  appendAuditLog(entry: Omit<AuditEntry, 'createdAt'>): Promise<void>;
  getAuditLog(limit: number): Promise<AuditEntry[]>;
}

export const ACCOUNT_STORE = Symbol('ACCOUNT_STORE');
