export type AccountStatus = 'active' | 'flood_wait' | 'banned' | 'inactive';

export interface Account {
  id: string;
  credentialRef: string;
  displayName: string;
  status: AccountStatus;
  floodWaitUntil?: number;
  failedAttemptCount: number;
  priority: number;
  lastUsedAt?: number;
}

export type AccountStatusListener = (
  account: Account,
  previous: AccountStatus,
) => void;

export interface AccountPublicInfo {
  id: string;
  displayName: string;
  status: AccountStatus;
  floodWaitUntil?: number;
  failedAttemptCount: number;
  priority: number;
  lastUsedAt?: number;
}

export interface AccountHealthSummary {
  total: number;
  active: number;
  floodWait: number;
  banned: number;
  inactive: number;
}

export interface AccountStatusResponse extends AccountHealthSummary {
  accounts: AccountPublicInfo[];
}
