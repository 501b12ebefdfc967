import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccountHealthService } from '../accounts/account-health.service';
import { BroadcastService } from '../broadcast/broadcast.service';
import { Mutex, sleep, SleepAbortedError } from '../common/utils';
import { InvalidBroadcastError } from '../operations/operation.errors';
import { LiveEvent } from '../platform/interfaces';
import { PlatformError } from '../platform/platform.errors';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { SessionRegistryService } from '../sessions/session-registry.service';
import { LiveCheckResult, LiveWatcherStatus, Monitor } from './interfaces';

const PROBE_ACCOUNTS = 3;

/**
 * Polls monitored targets for live events and joins each new event once.
 */
@Injectable()
export class LiveWatcherService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LiveWatcherService.name);
  private readonly monitors = new Map<string, Monitor>();
  // target -> id of the event that was joined or ruled out
  private readonly handledEvents = new Map<string, string>();
  // one check at a time per target
  private readonly checkLocks = new Map<string, Mutex>();
  private readonly pollIntervalMs: number;
  private readonly defaultBreadth: number | null;
  private readonly autostart: boolean;
  private loop?: Promise<void>;
  private controller?: AbortController;

  constructor(
    private readonly configService: ConfigService,
    private readonly accountHealth: AccountHealthService,
    private readonly rateLimiter: RateLimiterService,
    private readonly sessions: SessionRegistryService,
    private readonly broadcastService: BroadcastService,
  ) {
    this.pollIntervalMs =
      (this.configService.get<number>('watcher.pollIntervalSeconds') || 15) *
      1000;
    const breadth = this.configService.get<number>('watcher.defaultBreadth') || 0;
    this.defaultBreadth = breadth > 0 ? breadth : null;
    this.autostart = this.configService.get<boolean>('watcher.autostart') === true;
  }

  onModuleInit(): void {
    if (this.autostart) {
      this.startWatcher();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.stopWatcher();
  }

  addMonitor(target: string, breadth?: number | null): Monitor {
    const key = target.trim();
    if (!key) {
      throw new InvalidBroadcastError('Target must not be empty');
    }

    const existing = this.monitors.get(key);
    if (existing) {
      existing.breadth = breadth ?? existing.breadth;
      return { ...existing };
    }

    const monitor: Monitor = {
      target: key,
      breadth: breadth ?? this.defaultBreadth,
      addedAt: new Date().toISOString(),
      detectionCount: 0,
    };
    this.monitors.set(key, monitor);
    this.logger.log(`Watching ${key} for live events`);
    return { ...monitor };
  }

  removeMonitor(target: string): boolean {
    const key = target.trim();
    const removed = this.monitors.delete(key);
    this.handledEvents.delete(key);
    this.checkLocks.delete(key);
    if (removed) {
      this.logger.log(`Stopped watching ${key}`);
    }
    return removed;
  }

  listMonitors(): Monitor[] {
    return Array.from(this.monitors.values()).map((monitor) => ({
      ...monitor,
    }));
  }

  isRunning(): boolean {
    return this.loop !== undefined;
  }

  /**
   * @returns False when the watcher was already running
   */
  startWatcher(): boolean {
    if (this.loop) {
      return false;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal)
      .catch((error: unknown) => {
        const errorMessage =
          error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Live watcher stopped unexpectedly: ${errorMessage}`);
      })
      .finally(() => {
        this.loop = undefined;
        this.controller = undefined;
      });

    this.logger.log(
      `Live watcher started (every ${this.pollIntervalMs / 1000}s, ${this.monitors.size} target(s))`,
    );
    return true;
  }

  /**
   * Stops the loop and waits for the current pass to wind down.
   *
   * @returns False when the watcher was not running
   */
  async stopWatcher(): Promise<boolean> {
    const loop = this.loop;
    if (!loop) {
      return false;
    }

    this.controller?.abort();
    await loop;
    this.logger.log('Live watcher stopped');
    return true;
  }

  /**
   * Checks every monitor once. A failing target never stops the others.
   */
  async pollOnce(signal?: AbortSignal): Promise<LiveCheckResult[]> {
    const results: LiveCheckResult[] = [];
    for (const monitor of Array.from(this.monitors.values())) {
      if (signal?.aborted) break;
      results.push(await this.checkIsolated(monitor, signal));
    }
    return results;
  }

  /**
   * @returns Null when the target is not monitored
   */
  async checkNow(target: string): Promise<LiveCheckResult | null> {
    const monitor = this.monitors.get(target.trim());
    return monitor ? this.checkIsolated(monitor) : null;
  }

  getStatus(): LiveWatcherStatus {
    return {
      running: this.isRunning(),
      pollIntervalSeconds: this.pollIntervalMs / 1000,
      handledEvents: this.handledEvents.size,
      monitors: this.listMonitors(),
    };
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.pollOnce(signal);
      try {
        await sleep(this.pollIntervalMs, signal);
      } catch (error) {
        if (error instanceof SleepAbortedError) {
          return;
        }
        throw error;
      }
    }
  }

  private async checkIsolated(
    monitor: Monitor,
    signal?: AbortSignal,
  ): Promise<LiveCheckResult> {
    try {
      const result = await this.lockFor(monitor.target).runExclusive(() =>
        this.check(monitor, signal),
      );
      monitor.lastError = undefined;
      return result;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      if (!(error instanceof SleepAbortedError)) {
        monitor.lastError = errorMessage;
        this.logger.warn(`Live check for ${monitor.target} failed: ${errorMessage}`);
      }
      return {
        target: monitor.target,
        event: null,
        alreadyHandled: false,
        error: errorMessage,
      };
    }
  }

  private async check(
    monitor: Monitor,
    signal?: AbortSignal,
  ): Promise<LiveCheckResult> {
    const { target } = monitor;
    monitor.lastCheckedAt = new Date().toISOString();
    const event = await this.probe(target, signal);

    if (!event) {
      return { target, event: null, alreadyHandled: false };
    }

    if (this.handledEvents.get(target) === event.id) {
      return { target, event, alreadyHandled: true };
    }

    if (monitor.lastEventId !== event.id) {
      this.handledEvents.delete(target);
      monitor.detectionCount++;
      monitor.lastEventId = event.id;
      this.logger.log(
        `Live event ${event.id} detected in ${target}${event.title ? ` (${event.title})` : ''}`,
      );
    }

    const broadcast = await this.broadcastService.startBroadcast(
      {
        target,
        operation: 'joinLive',
        breadth: monitor.breadth,
        payload: { eventId: event.id },
      },
      signal,
    );

    // a cancelled join is retried on the next pass
    if (
      broadcast.successCount > 0 ||
      (broadcast.aborted && broadcast.reason !== 'cancelled')
    ) {
      this.handledEvents.set(target, event.id);
    }

    return { target, event, alreadyHandled: false, broadcast };
  }

  private lockFor(target: string): Mutex {
    let lock = this.checkLocks.get(target);
    if (!lock) {
      lock = new Mutex();
      this.checkLocks.set(target, lock);
    }
    return lock;
  }

  /**
   * Looks for a running live event through the first eligible account that
   * can hold a session.
   */
  private async probe(
    target: string,
    signal?: AbortSignal,
  ): Promise<LiveEvent | null> {
    const accounts = await this.accountHealth.selectEligible(PROBE_ACCOUNTS);

    for (const account of accounts) {
      await this.rateLimiter.acquire(account.id, signal);
      try {
        const result = await this.sessions.withSession(account.id, (session) =>
          session.detectLiveEvent(target),
        );
        if (result.status === 'ok') {
          return result.value;
        }
      } catch (error) {
        if (error instanceof PlatformError && error.failure.type === 'throttled') {
          await this.accountHealth.markFloodWait(
            account.id,
            error.failure.seconds,
          );
          continue;
        }
        throw error;
      }
    }

    throw new Error('No account available to check for live events');
  }
}
