import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { sleep } from '../common/utils';
import { RateLimitStatus, WindowSpec } from './interfaces';
import { SlidingWindow } from './sliding-window';

export const GLOBAL_RATE_KEY = 'global';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

/**
 * Admission control for platform calls. Callers are delayed, never rejected:
 * a per-account window and a global window must both have room before a call
 * is recorded.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly windows = new Map<string, SlidingWindow[]>();
  private readonly accountSpecs: WindowSpec[];
  private readonly globalSpecs: WindowSpec[];

  constructor(private readonly configService: ConfigService) {
    this.accountSpecs = [
      {
        label: 'minute',
        limit: this.configService.get<number>('rateLimit.perAccountPerMinute', 20),
        windowMs: MINUTE_MS,
      },
      {
        label: 'hour',
        limit: this.configService.get<number>('rateLimit.perAccountPerHour', 0),
        windowMs: HOUR_MS,
      },
    ];
    this.globalSpecs = [
      {
        label: 'minute',
        limit: this.configService.get<number>('rateLimit.globalPerMinute', 150),
        windowMs: MINUTE_MS,
      },
      {
        label: 'hour',
        limit: this.configService.get<number>('rateLimit.globalPerHour', 0),
        windowMs: HOUR_MS,
      },
    ];
  }

  /**
   * Waits for an account permit, then a global permit.
   *
   * @param signal - Aborts the wait with SleepAbortedError
   */
  async acquire(accountId: string, signal?: AbortSignal): Promise<void> {
    const admittedAt = await this.admit(accountId, this.accountSpecs, signal);
    try {
      await this.admit(GLOBAL_RATE_KEY, this.globalSpecs, signal);
    } catch (error) {
      // no call was made, so the account permit goes back
      this.windows
        .get(accountId)
        ?.forEach((window) => window.withdraw(admittedAt));
      throw error;
    }
  }

  getStatus(key: string): RateLimitStatus {
    const specs = key === GLOBAL_RATE_KEY ? this.globalSpecs : this.accountSpecs;
    const now = Date.now();
    return {
      key,
      windows: this.windowsFor(key, specs).map((window) => window.usage(now)),
    };
  }

  forget(accountId: string): void {
    this.windows.delete(accountId);
  }

  private async admit(
    key: string,
    specs: WindowSpec[],
    signal?: AbortSignal,
  ): Promise<number> {
    const windows = this.windowsFor(key, specs);

    // re-check after every wait: another caller may have taken the freed slot
    while (true) {
      const now = Date.now();
      const wait = Math.max(0, ...windows.map((window) => window.waitTime(now)));

      if (wait === 0) {
        windows.forEach((window) => window.record(now));
        return now;
      }

      this.logger.debug(
        `Rate limit reached for ${key}, waiting ${(wait / 1000).toFixed(1)}s`,
      );
      await sleep(wait, signal);
    }
  }

  private windowsFor(key: string, specs: WindowSpec[]): SlidingWindow[] {
    let windows = this.windows.get(key);
    if (!windows) {
      windows = specs.map((spec) => new SlidingWindow(spec));
      this.windows.set(key, windows);
    }
    return windows;
  }
}
