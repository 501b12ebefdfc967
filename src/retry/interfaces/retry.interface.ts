import { PlatformOperation } from '../../platform/interfaces';

export interface RetryTask {
  id: string;
  accountId: string;
  operation: PlatformOperation;
  attemptCount: number;
  /** Epoch ms; never moves backwards. */
  nextRetryAt: number;
  maxRetries: number;
  createdAt: number;
  lastError?: string;
  alerted: boolean;
}

export interface RetryQueueInfo {
  accountId: string;
  queued: number;
  running: boolean;
  nextRetryAt?: number;
}

export interface RetryQueueStatus {
  workers: number;
  totalQueued: number;
  queues: RetryQueueInfo[];
  haltedAccounts: string[];
}
