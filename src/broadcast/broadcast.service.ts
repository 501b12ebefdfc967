import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { AccountHealthService } from '../accounts/account-health.service';
import { Account } from '../accounts/interfaces';
import { randomBetween, sleep, SleepAbortedError } from '../common/utils';
import { AccountOperationService } from '../operations/account-operation.service';
import { AccountOutcome } from '../operations/interfaces';
import { buildOperation } from '../operations/operation-handlers';
import { InvalidBroadcastError } from '../operations/operation.errors';
import { PlatformOperation } from '../platform/interfaces';
import { RetryQueueService } from '../retry/retry-queue.service';
import {
  BroadcastFailure,
  BroadcastRequest,
  BroadcastResult,
} from './interfaces';

interface BroadcastRun {
  operation: PlatformOperation;
  retryThrottled: boolean;
  controller: AbortController;
  successCount: number;
  attempted: number;
  failures: BroadcastFailure[];
  abortReason?: string;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Fans one operation out over many accounts. Account-level failures are
 * collected in the result; only invalid input throws.
 */
@Injectable()
export class BroadcastService {
  private readonly logger = new Logger(BroadcastService.name);
  private readonly batchSize: number;
  private readonly cooldownMinMs: number;
  private readonly cooldownMaxMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly accountHealth: AccountHealthService,
    private readonly operations: AccountOperationService,
    private readonly retryQueue: RetryQueueService,
  ) {
    this.batchSize = this.configService.get<number>('broadcast.batchSize') || 10;
    this.cooldownMinMs =
      this.configService.get<number>('broadcast.cooldownMinMs') ?? 2000;
    this.cooldownMaxMs =
      this.configService.get<number>('broadcast.cooldownMaxMs') ?? 5000;
  }

  /**
   * Runs `request.operation` on up to `request.breadth` eligible accounts.
   *
   * @param signal - Cancels the broadcast between accounts
   * @throws InvalidBroadcastError for an empty target, an unknown operation
   * or a payload that does not fit the operation
   */
  async startBroadcast(
    request: BroadcastRequest,
    signal?: AbortSignal,
  ): Promise<BroadcastResult> {
    const operation = buildOperation(
      request.operation,
      request.target,
      request.payload,
    );
    const breadth = request.breadth ?? undefined;
    if (breadth !== undefined && !isPositiveInteger(breadth)) {
      throw new InvalidBroadcastError('Breadth must be a positive integer');
    }
    if (
      request.maxConcurrency !== undefined &&
      !isPositiveInteger(request.maxConcurrency)
    ) {
      throw new InvalidBroadcastError(
        'Max concurrency must be a positive integer',
      );
    }

    const broadcastId = uuidv4();
    const startedAt = new Date().toISOString();
    const accounts = await this.accountHealth.selectEligible(breadth);
    const batchSize = Math.min(
      request.maxConcurrency ?? this.batchSize,
      this.batchSize,
    );

    this.logger.log(
      `Broadcast ${broadcastId}: ${operation.kind} on ${operation.target} with ${accounts.length} account(s)` +
        (breadth !== undefined ? ` (requested ${breadth})` : ''),
    );

    const run: BroadcastRun = {
      operation,
      retryThrottled: request.retryThrottled ?? true,
      controller: new AbortController(),
      successCount: 0,
      attempted: 0,
      failures: [],
    };
    const onCancel = () => this.abort(run, 'cancelled');
    signal?.addEventListener('abort', onCancel, { once: true });
    if (signal?.aborted) {
      onCancel();
    }

    const [lead, ...rest] = accounts;
    try {
      // the lead account runs alone so an unreachable target costs one call
      if (lead) {
        await this.runAccount(run, lead);
      }
      for (let i = 0; i < rest.length; i += batchSize) {
        if (run.abortReason !== undefined) break;
        if (i > 0 && !(await this.cooldown(run))) break;

        const batch = rest.slice(i, i + batchSize);
        await Promise.all(batch.map((account) => this.runAccount(run, account)));
      }
    } finally {
      signal?.removeEventListener('abort', onCancel);
    }

    const result: BroadcastResult = {
      broadcastId,
      target: operation.target,
      operation: operation.kind,
      requested: breadth ?? accounts.length,
      attempted: run.attempted,
      successCount: run.successCount,
      failures: run.failures,
      aborted: run.abortReason !== undefined,
      reason: run.abortReason,
      success: run.successCount > 0,
      startedAt,
      finishedAt: new Date().toISOString(),
    };

    const summary = `Broadcast ${broadcastId} finished: ${result.successCount}/${result.attempted} succeeded, ${result.failures.length} failed`;
    if (result.aborted) {
      this.logger.warn(`${summary}, aborted (${result.reason ?? 'unknown'})`);
    } else {
      this.logger.log(summary);
    }
    return result;
  }

  private async runAccount(run: BroadcastRun, account: Account): Promise<void> {
    if (run.abortReason !== undefined) {
      return;
    }

    const { operation } = run;
    let outcome: AccountOutcome;
    try {
      outcome = await this.operations.run(account, operation, {
        signal: run.controller.signal,
      });
    } catch (error) {
      if (error instanceof SleepAbortedError) {
        // cancelled while waiting for a rate permit; never reached the platform
        return;
      }
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      run.attempted++;
      this.fail(run, account, 'error', errorMessage);
      return;
    }

    run.attempted++;
    switch (outcome.type) {
      case 'success':
      case 'stale':
        run.successCount++;
        return;
      case 'throttled': {
        const message = `Flood wait ${outcome.seconds}s`;
        this.fail(run, account, 'throttled', message);
        if (run.retryThrottled) {
          this.retryQueue.enqueue(account.id, operation, {
            floodWaitUntil: outcome.until,
            lastError: message,
          });
        }
        return;
      }
      case 'banned':
        this.fail(run, account, 'banned', outcome.message);
        return;
      case 'targetInaccessible':
        this.fail(run, account, 'target_inaccessible', outcome.message);
        this.abort(run, `Target inaccessible: ${outcome.message}`);
        return;
      case 'failed':
        this.fail(run, account, 'error', outcome.message);
        return;
      case 'unavailable':
        this.fail(run, account, 'session_unavailable');
        return;
    }
  }

  private fail(
    run: BroadcastRun,
    account: Account,
    reason: BroadcastFailure['reason'],
    message?: string,
  ): void {
    run.failures.push({
      accountId: account.id,
      displayName: account.displayName,
      reason,
      ...(message !== undefined ? { message } : {}),
    });
  }

  private abort(run: BroadcastRun, reason: string): void {
    if (run.abortReason !== undefined) {
      return;
    }
    run.abortReason = reason;
    run.controller.abort();
  }

  /** @returns False when the broadcast was aborted during the pause */
  private async cooldown(run: BroadcastRun): Promise<boolean> {
    if (this.cooldownMaxMs <= 0) {
      return true;
    }

    const ms = randomBetween(this.cooldownMinMs, this.cooldownMaxMs);
    try {
      await sleep(ms, run.controller.signal);
      return true;
    } catch (error) {
      if (error instanceof SleepAbortedError) {
        return false;
      }
      throw error;
    }
  }
}
