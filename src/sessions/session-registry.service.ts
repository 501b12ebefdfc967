import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccountHealthService } from '../accounts/account-health.service';
import { Mutex } from '../common/utils';
import {
  PLATFORM_CLIENT,
  PlatformClient,
  PlatformSession,
} from '../platform/interfaces';
import { AuthError } from '../platform/platform.errors';
import {
  PooledSession,
  SessionRegistryStats,
  SessionWorkResult,
} from './interfaces';

type Reservation =
  | { reserved: true; evicted?: PooledSession }
  | { reserved: false };

/**
 * Bounded pool of live platform sessions, at most one per account.
 *
 * Map insertion order doubles as recency order: a session is moved to the end
 * whenever it is handed out or released, so the first idle entry is the least
 * recently used one.
 */
@Injectable()
export class SessionRegistryService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SessionRegistryService.name);
  private readonly sessions = new Map<string, PooledSession>();
  private readonly connecting = new Map<string, Promise<PooledSession | null>>();
  private readonly registryLock = new Mutex();
  private capacityWaiters: Array<() => void> = [];
  private reservations = 0;
  private closed = false;

  private readonly maxActive: number;
  private readonly idleEvictMs: number;
  private readonly reaperIntervalMs: number;
  private reaperTimer?: NodeJS.Timeout;
  private unsubscribe?: () => void;

  constructor(
    private readonly configService: ConfigService,
    @Inject(PLATFORM_CLIENT) private readonly platformClient: PlatformClient,
    private readonly accountHealth: AccountHealthService,
  ) {
    this.maxActive = this.configService.get<number>('sessions.maxActive') || 100;
    this.idleEvictMs =
      (this.configService.get<number>('sessions.idleEvictSeconds') || 600) *
      1000;
    this.reaperIntervalMs =
      (this.configService.get<number>('sessions.reaperIntervalSeconds') || 60) *
      1000;
  }

  onModuleInit(): void {
    this.closed = false;
    this.unsubscribe = this.accountHealth.onStatusChange((account) => {
      if (account.status !== 'active') {
        this.retire(account.id).catch((error: unknown) => {
          const errorMessage =
            error instanceof Error ? error.message : 'Unknown error';
          this.logger.error(
            `Failed to retire session for ${account.id}: ${errorMessage}`,
          );
        });
      }
    });

    this.reaperTimer = setInterval(() => {
      this.reapIdle().catch((error: unknown) => {
        const errorMessage =
          error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Session reaper failed: ${errorMessage}`);
      });
    }, this.reaperIntervalMs);
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  /**
   * Returns the account's live session, connecting it on first use.
   *
   * @returns The session, or null when the account cannot hold one
   */
  async acquire(accountId: string): Promise<PlatformSession | null> {
    const entry = await this.obtain(accountId);
    return entry?.session ?? null;
  }

  /**
   * Runs `work` with exclusive use of the account's session. The session is
   * pinned for the duration and cannot be evicted.
   */
  async withSession<T>(
    accountId: string,
    work: (session: PlatformSession) => Promise<T>,
  ): Promise<SessionWorkResult<T>> {
    const entry = await this.pin(accountId);
    if (!entry) {
      return { status: 'unavailable' };
    }

    try {
      const value = await entry.lock.runExclusive(() => work(entry.session));
      return { status: 'ok', value };
    } finally {
      await this.release(entry);
    }
  }

  /**
   * Disconnects sessions left unused for longer than the idle limit.
   *
   * @returns Number of sessions evicted
   */
  async reapIdle(): Promise<number> {
    const now = Date.now();
    const stale = await this.registryLock.runExclusive(() => {
      const idle = Array.from(this.sessions.values()).filter(
        (entry) => entry.users === 0 && now - entry.lastUsedAt > this.idleEvictMs,
      );
      idle.forEach((entry) => this.sessions.delete(entry.accountId));
      return idle;
    });

    for (const entry of stale) {
      await this.disconnect(entry, 'idle');
    }
    if (stale.length > 0) {
      this.logger.log(`Evicted ${stale.length} idle session(s)`);
      this.notifyCapacity();
    }
    return stale.length;
  }

  getStats(): SessionRegistryStats {
    const entries = Array.from(this.sessions.values());
    return {
      active: entries.length,
      busy: entries.filter((entry) => entry.users > 0).length,
      connecting: this.connecting.size,
      waitingForCapacity: this.capacityWaiters.length,
      capacity: this.maxActive,
    };
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    if (this.reaperTimer) {
      clearInterval(this.reaperTimer);
      this.reaperTimer = undefined;
    }
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    this.notifyCapacity();

    const entries = Array.from(this.sessions.values());
    this.sessions.clear();
    await Promise.all(entries.map((entry) => this.disconnect(entry, 'shutdown')));

    if (entries.length > 0) {
      this.logger.log(`Closed ${entries.length} session(s)`);
    }
  }

  private async obtain(accountId: string): Promise<PooledSession | null> {
    if (this.closed) {
      return null;
    }

    const existing = this.sessions.get(accountId);
    if (existing) {
      if (existing.retired) {
        return null;
      }
      this.touch(existing);
      return existing;
    }

    // concurrent callers share one connection attempt
    const inFlight = this.connecting.get(accountId);
    if (inFlight) {
      return inFlight;
    }

    const creation = this.create(accountId).finally(() => {
      this.connecting.delete(accountId);
    });
    this.connecting.set(accountId, creation);
    return creation;
  }

  private async pin(accountId: string): Promise<PooledSession | null> {
    while (true) {
      const entry = await this.obtain(accountId);
      if (!entry) {
        return null;
      }
      if (this.sessions.get(accountId) === entry) {
        entry.users++;
        return entry;
      }
      // evicted between creation and pinning; connect again
    }
  }

  private async release(entry: PooledSession): Promise<void> {
    entry.users--;
    entry.lastUsedAt = Date.now();
    if (entry.users > 0) {
      return;
    }

    if (entry.retired) {
      await this.remove(entry, 'retired');
      return;
    }
    this.touch(entry);
    this.notifyCapacity();
  }

  private async create(accountId: string): Promise<PooledSession | null> {
    const account = await this.accountHealth.ensureEligible(accountId);
    if (!account) {
      return null;
    }

    if (!(await this.reserveSlot())) {
      return null;
    }

    let session: PlatformSession;
    try {
      session = await this.platformClient.authenticate({
        accountId,
        credentialRef: account.credentialRef,
      });
    } catch (error) {
      this.releaseReservation();
      await this.handleConnectFailure(accountId, error);
      return null;
    }

    this.releaseReservation();

    if (
      this.closed ||
      this.accountHealth.getAccountById(accountId)?.status !== 'active'
    ) {
      await this.closeSession(session, accountId, 'account left rotation');
      return null;
    }

    const now = Date.now();
    const entry: PooledSession = {
      accountId,
      session,
      lock: new Mutex(),
      openedAt: now,
      lastUsedAt: now,
      users: 0,
      retired: false,
    };
    this.sessions.set(accountId, entry);
    this.logger.log(
      `Session opened for ${account.displayName} (${this.sessions.size}/${this.maxActive})`,
    );
    return entry;
  }

  private async handleConnectFailure(
    accountId: string,
    error: unknown,
  ): Promise<void> {
    if (error instanceof AuthError) {
      this.logger.warn(error.message);
      await this.accountHealth.markInactive(accountId, error.message);
      return;
    }

    const errorMessage =
      error instanceof Error ? error.message : 'Unknown error';
    this.logger.error(`Failed to connect session for ${accountId}: ${errorMessage}`);
    await this.accountHealth.recordFailure(
      accountId,
      `Session connect failed: ${errorMessage}`,
    );
  }

  /**
   * Claims a slot for a new session, evicting the least recently used idle
   * session at capacity. Waits for a release when every session is busy.
   *
   * @returns False when the registry shut down while waiting
   */
  private async reserveSlot(): Promise<boolean> {
    while (!this.closed) {
      const reservation = await this.registryLock.runExclusive(
        (): Reservation => {
          if (this.sessions.size + this.reservations < this.maxActive) {
            this.reservations++;
            return { reserved: true };
          }

          const idle = this.leastRecentlyUsedIdle();
          if (idle) {
            this.sessions.delete(idle.accountId);
            this.reservations++;
            return { reserved: true, evicted: idle };
          }
          return { reserved: false };
        },
      );

      if (reservation.reserved) {
        if (reservation.evicted) {
          await this.disconnect(reservation.evicted, 'evicted for capacity');
        }
        return true;
      }

      await new Promise<void>((resolve) => this.capacityWaiters.push(resolve));
    }
    return false;
  }

  private releaseReservation(): void {
    this.reservations--;
    this.notifyCapacity();
  }

  private leastRecentlyUsedIdle(): PooledSession | undefined {
    for (const entry of this.sessions.values()) {
      if (entry.users === 0) {
        return entry;
      }
    }
    return undefined;
  }

  private notifyCapacity(): void {
    const waiters = this.capacityWaiters;
    this.capacityWaiters = [];
    waiters.forEach((wake) => wake());
  }

  private touch(entry: PooledSession): void {
    if (this.sessions.get(entry.accountId) === entry) {
      this.sessions.delete(entry.accountId);
      this.sessions.set(entry.accountId, entry);
    }
  }

  private async retire(accountId: string): Promise<void> {
    const entry = this.sessions.get(accountId);
    if (!entry) {
      return;
    }

    entry.retired = true;
    if (entry.users === 0) {
      await this.remove(entry, 'retired');
    }
  }

  private async remove(entry: PooledSession, reason: string): Promise<void> {
    if (this.sessions.get(entry.accountId) !== entry) {
      return;
    }
    this.sessions.delete(entry.accountId);
    await this.disconnect(entry, reason);
    this.notifyCapacity();
  }

  private async disconnect(entry: PooledSession, reason: string): Promise<void> {
    await this.closeSession(entry.session, entry.accountId, reason);
  }

  private async closeSession(
    session: PlatformSession,
    accountId: string,
    reason: string,
  ): Promise<void> {
    try {
      await session.disconnect();
      this.logger.debug(`Session for ${accountId} closed (${reason})`);
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(
        `Error closing session for ${accountId}: ${errorMessage}`,
      );
    }
  }
}
