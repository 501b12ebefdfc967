import { PlatformSession } from '../../platform/interfaces';
import { Mutex } from '../../common/utils';

export interface PooledSession {
  accountId: string;
  session: PlatformSession;
  lock: Mutex;
  openedAt: number;
  lastUsedAt: number;
  /** Callers currently holding the session; a pinned session is never evicted. */
  users: number;
  retired: boolean;
}

export type SessionWorkResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'unavailable' };

export interface SessionRegistryStats {
  active: number;
  busy: number;
  connecting: number;
  waitingForCapacity: number;
  capacity: number;
}
