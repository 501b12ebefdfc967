import { Inject, Injectable, Logger } from '@nestjs/common';
import { AccountHealthService } from '../accounts/account-health.service';
import { Account } from '../accounts/interfaces';
import { PlatformOperation } from '../platform/interfaces';
import { PlatformError } from '../platform/platform.errors';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { SessionRegistryService } from '../sessions/session-registry.service';
import { ACCOUNT_STORE, AccountStore } from '../storage/interfaces';
import { AccountOutcome, RunOptions } from './interfaces';
import {
  auditTypeOf,
  describeOperation,
  preconditionHolds,
} from './operation-handlers';

type AccountRef = Pick<Account, 'id' | 'displayName'>;

/**
 * Runs one operation for one account: rate permits, session, platform call,
 * then folds the outcome into account health and the audit log.
 */
@Injectable()
export class AccountOperationService {
  private readonly logger = new Logger(AccountOperationService.name);

  constructor(
    private readonly rateLimiter: RateLimiterService,
    private readonly sessions: SessionRegistryService,
    private readonly accountHealth: AccountHealthService,
    @Inject(ACCOUNT_STORE) private readonly store: AccountStore,
  ) {}

  /**
   * @throws SleepAbortedError when `options.signal` aborts a rate-limit wait
   */
  async run(
    account: AccountRef,
    operation: PlatformOperation,
    options: RunOptions = {},
  ): Promise<AccountOutcome> {
    await this.rateLimiter.acquire(account.id, options.signal);

    try {
      const result = await this.sessions.withSession(
        account.id,
        async (session) => {
          if (
            options.checkPrecondition &&
            !(await preconditionHolds(operation, session))
          ) {
            return 'stale' as const;
          }
          await session.call(operation);
          return 'done' as const;
        },
      );

      if (result.status === 'unavailable') {
        return { type: 'unavailable' };
      }
      if (result.value === 'stale') {
        this.logger.debug(
          `Skipping ${operation.kind} on ${operation.target} for ${account.id}: no longer applicable`,
        );
        return { type: 'stale' };
      }

      await this.recordSuccess(account, operation);
      return { type: 'success', alreadyMember: false };
    } catch (error) {
      return this.classify(account, operation, error);
    }
  }

  private async classify(
    account: AccountRef,
    operation: PlatformOperation,
    error: unknown,
  ): Promise<AccountOutcome> {
    if (!(error instanceof PlatformError)) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `${operation.kind} failed for ${account.displayName}: ${errorMessage}`,
      );
      await this.accountHealth.recordFailure(account.id, errorMessage);
      return { type: 'failed', message: errorMessage };
    }

    const failure = error.failure;
    switch (failure.type) {
      case 'throttled': {
        const until = await this.accountHealth.markFloodWait(
          account.id,
          failure.seconds,
        );
        return { type: 'throttled', seconds: failure.seconds, until };
      }
      case 'alreadyMember':
        await this.recordSuccess(account, operation);
        return { type: 'success', alreadyMember: true };
      case 'bannedOnTarget':
        await this.accountHealth.markBanned(account.id, failure.message);
        this.rateLimiter.forget(account.id);
        return { type: 'banned', message: failure.message };
      case 'targetInaccessible':
        this.logger.warn(
          `${operation.target} is not reachable (${failure.message})`,
        );
        return { type: 'targetInaccessible', message: failure.message };
      case 'other':
        this.logger.warn(
          `${operation.kind} failed for ${account.displayName}: ${failure.message}`,
        );
        await this.accountHealth.recordFailure(account.id, failure.message);
        return { type: 'failed', message: failure.message };
    }
  }

  private async recordSuccess(
    account: AccountRef,
    operation: PlatformOperation,
  ): Promise<void> {
    this.accountHealth.recordSuccess(account.id);
    await this.store.appendAuditLog({
      type: auditTypeOf(operation),
      accountId: account.id,
      message: `${account.displayName}: ${describeOperation(operation)}`,
    });
  }
}
