import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { AccountHealthService } from '../accounts/account-health.service';
import { AlertService } from '../alerts/alert.service';
import { sleep, SleepAbortedError } from '../common/utils';
import { AccountOperationService } from '../operations/account-operation.service';
import { AccountOutcome } from '../operations/interfaces';
import { PlatformOperation } from '../platform/interfaces';
import { ACCOUNT_STORE, AccountStore } from '../storage/interfaces';
import { RetryQueueStatus, RetryTask } from './interfaces';

const SUPERVISOR_BACKOFF_MS = 5000;

interface AccountQueue {
  accountId: string;
  tasks: RetryTask[];
  current?: RetryTask;
  worker?: Promise<void>;
  controller?: AbortController;
}

export interface EnqueueOptions {
  floodWaitUntil?: number | null;
  lastError?: string;
}

@Injectable()
export class RetryQueueService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RetryQueueService.name);
  private readonly queues = new Map<string, AccountQueue>();
  private readonly halted = new Set<string>();
  private readonly maxRetries: number;
  private readonly backoffTable: number[];
  private readonly maxDelaySeconds: number;
  private stopping = false;
  private unsubscribe?: () => void;

  constructor(
    private readonly configService: ConfigService,
    private readonly accountHealth: AccountHealthService,
    private readonly operations: AccountOperationService,
    private readonly alerts: AlertService,
    @Inject(ACCOUNT_STORE) private readonly store: AccountStore,
  ) {
    this.maxRetries = this.configService.get<number>('retry.maxAttempts') || 50;
    const table = this.configService.get<number[]>('retry.backoffTable') || [];
    this.backoffTable = table.length > 0 ? table : [2, 5, 10, 30, 60];
    this.maxDelaySeconds =
      this.configService.get<number>('retry.maxDelaySeconds') || 3600;
  }

  onModuleInit(): void {
    this.stopping = false;
    this.unsubscribe = this.accountHealth.onStatusChange((account) => {
      if (account.status === 'banned') {
        this.haltAccount(account.id);
      }
    });
  }

  async onModuleDestroy(): Promise<void> {
    this.unsubscribe?.();
    await this.stop();
  }

  /**
   * Queues an operation to be retried for an account. The first retry runs
   * once the account's flood wait, if any, is over.
   *
   * @returns The queued task, or null when the account's queue is halted
   */
  enqueue(
    accountId: string,
    operation: PlatformOperation,
    options: EnqueueOptions = {},
  ): RetryTask | null {
    if (this.halted.has(accountId) || this.accountHealth.isBanned(accountId)) {
      this.logger.debug(`Not queueing retry for banned account ${accountId}`);
      return null;
    }

    const now = Date.now();
    const task: RetryTask = {
      id: uuidv4(),
      accountId,
      operation,
      attemptCount: 0,
      nextRetryAt: Math.max(now, options.floodWaitUntil ?? 0),
      maxRetries: this.maxRetries,
      createdAt: now,
      lastError: options.lastError,
      alerted: false,
    };

    const queue = this.queueFor(accountId);
    queue.tasks.push(task);
    this.logger.log(
      `Queued retry of ${operation.kind} on ${operation.target} for ${accountId} at ${new Date(task.nextRetryAt).toISOString()}`,
    );
    this.ensureWorker(queue);
    return task;
  }

  /**
   * Stops an account's queue for good: pending tasks are destroyed and the
   * worker is cancelled.
   */
  haltAccount(accountId: string): void {
    this.halted.add(accountId);
    const queue = this.queues.get(accountId);
    if (!queue) {
      return;
    }

    const dropped = queue.tasks.length + (queue.current ? 1 : 0);
    queue.tasks = [];
    queue.controller?.abort();
    this.logger.warn(
      `Retry queue for ${accountId} halted, ${dropped} task(s) dropped`,
    );
  }

  /**
   * Cancels every worker and waits for them to exit. A task interrupted
   * mid-wait goes back to the head of its queue.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    const workers: Promise<void>[] = [];
    for (const queue of this.queues.values()) {
      queue.controller?.abort();
      if (queue.worker) {
        workers.push(queue.worker);
      }
    }
    await Promise.all(workers);
    if (workers.length > 0) {
      this.logger.log(`Stopped ${workers.length} retry worker(s)`);
    }
  }

  /**
   * Lets workers run again after {@link stop}, picking up the tasks left in
   * each queue.
   */
  resume(): void {
    this.stopping = false;
    for (const queue of this.queues.values()) {
      this.ensureWorker(queue);
    }
  }

  getStatus(): RetryQueueStatus {
    const queues = Array.from(this.queues.values())
      .filter((queue) => queue.tasks.length > 0 || queue.current)
      .map((queue) => ({
        accountId: queue.accountId,
        queued: queue.tasks.length + (queue.current ? 1 : 0),
        running: queue.worker !== undefined,
        nextRetryAt: (queue.current ?? queue.tasks[0])?.nextRetryAt,
      }));

    return {
      workers: Array.from(this.queues.values()).filter((queue) => queue.worker)
        .length,
      totalQueued: queues.reduce((sum, queue) => sum + queue.queued, 0),
      queues,
      haltedAccounts: Array.from(this.halted),
    };
  }

  /**
   * Delay before retry number `attempt`, in ms: the backoff table entry for
   * the attempt with ±50% jitter, capped at the configured maximum.
   */
  backoffDelay(attempt: number): number {
    const index = Math.min(Math.max(attempt, 1) - 1, this.backoffTable.length - 1);
    const base = this.backoffTable[index] ?? this.maxDelaySeconds;
    const jittered = base * (0.5 + Math.random());
    return Math.round(Math.min(jittered, this.maxDelaySeconds) * 1000);
  }

  private queueFor(accountId: string): AccountQueue {
    let queue = this.queues.get(accountId);
    if (!queue) {
      queue = { accountId, tasks: [] };
      this.queues.set(accountId, queue);
    }
    return queue;
  }

  private ensureWorker(queue: AccountQueue): void {
    if (
      queue.worker ||
      this.stopping ||
      this.halted.has(queue.accountId) ||
      queue.tasks.length === 0
    ) {
      return;
    }

    const controller = new AbortController();
    queue.controller = controller;
    queue.worker = this.runWorker(queue, controller.signal)
      .catch((error: unknown) => {
        const errorMessage =
          error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(
          `Retry worker for ${queue.accountId} crashed: ${errorMessage}`,
        );
      })
      .finally(() => {
        queue.worker = undefined;
        queue.controller = undefined;
        // restart when tasks arrived while the worker was winding down
        this.ensureWorker(queue);
      });
  }

  private async runWorker(queue: AccountQueue, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const task = queue.tasks.shift();
      if (!task) {
        return;
      }

      queue.current = task;
      try {
        await this.process(queue, task, signal);
        continue;
      } catch (error) {
        if (signal.aborted) {
          this.putBack(queue, task);
          return;
        }

        const errorMessage =
          error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(
          `Retry of ${task.id} for ${queue.accountId} failed unexpectedly: ${errorMessage}`,
        );
        this.putBack(queue, task);
      } finally {
        queue.current = undefined;
      }

      if (!(await this.backOff(signal))) {
        return;
      }
    }
  }

  private async process(
    queue: AccountQueue,
    task: RetryTask,
    signal: AbortSignal,
  ): Promise<void> {
    const wait = task.nextRetryAt - Date.now();
    if (wait > 0) {
      await sleep(wait, signal);
    }

    const account = this.accountHealth.getAccountById(task.accountId);
    if (!account || account.status === 'banned') {
      this.logger.warn(`Dropping retry ${task.id}: account ${task.accountId} is gone`);
      return;
    }

    const floodWaitUntil = account.floodWaitUntil ?? 0;
    if (account.status === 'flood_wait' && floodWaitUntil > Date.now()) {
      task.nextRetryAt = Math.max(task.nextRetryAt, floodWaitUntil);
      queue.tasks.unshift(task);
      return;
    }

    const outcome = await this.operations.run(account, task.operation, {
      signal,
      checkPrecondition: true,
    });
    await this.settle(queue, task, outcome, account.displayName);
  }

  private async settle(
    queue: AccountQueue,
    task: RetryTask,
    outcome: AccountOutcome,
    displayName: string,
  ): Promise<void> {
    const { kind, target } = task.operation;

    switch (outcome.type) {
      case 'success':
        this.logger.log(
          `Retry of ${kind} on ${target} for ${displayName} succeeded after ${task.attemptCount + 1} attempt(s)`,
        );
        return;
      case 'stale':
        this.logger.log(
          `Retry of ${kind} on ${target} for ${displayName} no longer needed`,
        );
        return;
      case 'banned':
        // the ban listener halts the queue
        return;
      case 'targetInaccessible':
        this.logger.warn(
          `Dropping retry of ${kind} for ${displayName}: ${target} is not reachable (${outcome.message})`,
        );
        await this.store.appendAuditLog({
          type: 'error',
          accountId: task.accountId,
          message: `Retry of ${kind} on ${target} dropped: ${outcome.message}`,
        });
        return;
      case 'throttled':
        await this.reschedule(
          queue,
          task,
          `Throttled for ${outcome.seconds}s`,
          displayName,
          outcome.until ?? 0,
        );
        return;
      case 'failed':
        await this.reschedule(queue, task, outcome.message, displayName, 0);
        return;
      case 'unavailable':
        await this.reschedule(queue, task, 'session_unavailable', displayName, 0);
        return;
    }
  }

  private async reschedule(
    queue: AccountQueue,
    task: RetryTask,
    lastError: string,
    displayName: string,
    floodWaitUntil: number,
  ): Promise<void> {
    task.attemptCount++;
    task.lastError = lastError;
    task.nextRetryAt = Math.max(
      task.nextRetryAt,
      Date.now() + this.backoffDelay(task.attemptCount),
      floodWaitUntil,
    );

    if (this.halted.has(task.accountId)) {
      return;
    }
    queue.tasks.push(task);

    this.logger.debug(
      `Retry ${task.id} attempt ${task.attemptCount} failed (${lastError}), next at ${new Date(task.nextRetryAt).toISOString()}`,
    );

    if (task.attemptCount >= task.maxRetries && !task.alerted) {
      task.alerted = true;
      await this.store.appendAuditLog({
        type: 'retry_alert',
        accountId: task.accountId,
        message: `${task.operation.kind} on ${task.operation.target} reached ${task.attemptCount} attempts`,
      });
      await this.alerts.maxRetriesReached(task, displayName);
    }
  }

  private putBack(queue: AccountQueue, task: RetryTask): void {
    if (!this.halted.has(queue.accountId) && !queue.tasks.includes(task)) {
      queue.tasks.unshift(task);
    }
  }

  /** @returns False when cancelled during the back-off */
  private async backOff(signal: AbortSignal): Promise<boolean> {
    try {
      await sleep(SUPERVISOR_BACKOFF_MS, signal);
      return true;
    } catch (error) {
      if (error instanceof SleepAbortedError) {
        return false;
      }
      throw error;
    }
  }
}
