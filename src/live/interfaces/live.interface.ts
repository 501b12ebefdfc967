import { BroadcastResult } from '../../broadcast/interfaces';
import { LiveEvent } from '../../platform/interfaces';

export interface Monitor {
  target: string;
  /** Accounts to join with; null means every eligible account. */
  breadth: number | null;
  addedAt: string;
  lastCheckedAt?: string;
  detectionCount: number;
  lastEventId?: string;
  lastError?: string;
}

export interface LiveCheckResult {
  target: string;
  event: LiveEvent | null;
  /** The event was joined or ruled out on an earlier check. */
  alreadyHandled: boolean;
  broadcast?: BroadcastResult;
  error?: string;
}

export interface LiveWatcherStatus {
  running: boolean;
  pollIntervalSeconds: number;
  handledEvents: number;
  monitors: Monitor[];
}
