import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RetryQueueService } from './retry-queue.service';
import { AccountHealthService } from '../accounts/account-health.service';
import { AccountOperationService } from '../operations/account-operation.service';
import { AlertService } from '../alerts/alert.service';
import { ACCOUNT_STORE } from '../storage/interfaces';
import { Account, AccountStatusListener } from '../accounts/interfaces';
import { PlatformOperation } from '../platform/interfaces';

const flush = async () => {
  for (let i = 0; i < 10; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
};

const T0 = new Date('2026-03-01T12:00:00Z').getTime();

describe('RetryQueueService', () => {
  let service: RetryQueueService;
  let statusListener: AccountStatusListener | undefined;
  let randomSpy: jest.SpyInstance<number, []>;

  const operation: PlatformOperation = { kind: 'join', target: '@news' };

  const account: Account = {
    id: 'account-1',
    credentialRef: 'session-1',
    displayName: 'Alpha',
    status: 'active',
    failedAttemptCount: 0,
    priority: 1,
  };

  const mockConfigService = {
    get: jest.fn((key: string) => {
      if (key === 'retry.maxAttempts') return 3;
      if (key === 'retry.backoffTable') return [1, 2, 4];
      if (key === 'retry.maxDelaySeconds') return 3;
      return undefined;
    }),
  };

  const mockAccountHealth = {
    onStatusChange: jest.fn(),
    getAccountById: jest.fn(),
    isBanned: jest.fn(),
  };

  const mockOperations = {
    run: jest.fn(),
  };

  const mockAlerts = {
    maxRetriesReached: jest.fn(),
  };

  const mockStore = {
    appendAuditLog: jest.fn(),
  };

  const advance = async (ms: number) => {
    jest.advanceTimersByTime(ms);
    await flush();
  };

  beforeEach(async () => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
    jest.setSystemTime(T0);
    jest.clearAllMocks();
    randomSpy = jest.spyOn(Math, 'random').mockReturnValue(0.5);
    statusListener = undefined;

    mockAccountHealth.onStatusChange.mockImplementation(
      (listener: AccountStatusListener) => {
        statusListener = listener;
        return () => undefined;
      },
    );
    mockAccountHealth.getAccountById.mockImplementation(() => ({ ...account }));
    mockAccountHealth.isBanned.mockReturnValue(false);
    mockOperations.run.mockResolvedValue({ type: 'failed', message: 'boom' });
    mockAlerts.maxRetriesReached.mockResolvedValue(undefined);
    mockStore.appendAuditLog.mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RetryQueueService,
        { provide: ConfigService, useValue: mockConfigService },
        { provide: AccountHealthService, useValue: mockAccountHealth },
        { provide: AccountOperationService, useValue: mockOperations },
        { provide: AlertService, useValue: mockAlerts },
        { provide: ACCOUNT_STORE, useValue: mockStore },
      ],
    }).compile();

    service = module.get<RetryQueueService>(RetryQueueService);
    service.onModuleInit();
  });

  afterEach(async () => {
    await service.stop();
    randomSpy.mockRestore();
    jest.useRealTimers();
  });

  it('should retry with backoff until the operation succeeds', async () => {
    mockOperations.run
      .mockResolvedValueOnce({ type: 'failed', message: 'boom' })
      .mockResolvedValueOnce({ type: 'failed', message: 'boom' })
      .mockResolvedValueOnce({ type: 'success', alreadyMember: false });

    service.enqueue('account-1', operation);
    await flush();

    expect(mockOperations.run).toHaveBeenCalledTimes(1);
    expect(mockOperations.run).toHaveBeenCalledWith(
      expect.objectContaining({ id: 'account-1' }),
      operation,
      { signal: expect.any(AbortSignal), checkPrecondition: true },
    );
    expect(service.getStatus().queues[0]?.nextRetryAt).toBe(T0 + 1000);

    await advance(999);
    expect(mockOperations.run).toHaveBeenCalledTimes(1);

    await advance(1);
    expect(mockOperations.run).toHaveBeenCalledTimes(2);
    expect(service.getStatus().queues[0]?.nextRetryAt).toBe(T0 + 3000);

    await advance(2000);
    expect(mockOperations.run).toHaveBeenCalledTimes(3);
    expect(service.getStatus()).toEqual({
      workers: 0,
      totalQueued: 0,
      queues: [],
      haltedAccounts: [],
    });
  });

  it('should keep backoff delays within half to one and a half of the table entry', () => {
    randomSpy.mockReturnValue(0);
    expect(service.backoffDelay(1)).toBe(500);
    expect(service.backoffDelay(2)).toBe(1000);

    randomSpy.mockReturnValue(0.999);
    expect(service.backoffDelay(1)).toBe(1499);
    expect(service.backoffDelay(2)).toBe(2998);
  });

  it('should cap delays at the configured maximum and reuse the last table entry', () => {
    expect(service.backoffDelay(3)).toBe(3000);
    expect(service.backoffDelay(12)).toBe(3000);
  });

  it('should not retry before the account flood wait ends', async () => {
    mockOperations.run.mockResolvedValueOnce({
      type: 'throttled',
      seconds: 30,
      until: T0 + 30_000,
    });

    service.enqueue('account-1', operation);
    await flush();

    expect(service.getStatus().queues[0]?.nextRetryAt).toBe(T0 + 30_000);

    await advance(29_999);
    expect(mockOperations.run).toHaveBeenCalledTimes(1);

    await advance(1);
    expect(mockOperations.run).toHaveBeenCalledTimes(2);
  });

  it('should start a task queued during a flood wait when the wait ends', async () => {
    const task = service.enqueue('account-1', operation, {
      floodWaitUntil: T0 + 10_000,
      lastError: 'Throttled for 10s',
    });

    expect(task).toMatchObject({
      accountId: 'account-1',
      attemptCount: 0,
      nextRetryAt: T0 + 10_000,
      maxRetries: 3,
      lastError: 'Throttled for 10s',
    });

    await flush();
    expect(mockOperations.run).not.toHaveBeenCalled();

    await advance(10_000);
    expect(mockOperations.run).toHaveBeenCalledTimes(1);
  });

  it('should alert once on reaching the retry limit and keep retrying', async () => {
    service.enqueue('account-1', operation);
    await flush();
    await advance(1000);
    await advance(2000);

    expect(mockOperations.run).toHaveBeenCalledTimes(3);
    expect(mockAlerts.maxRetriesReached).toHaveBeenCalledTimes(1);
    expect(mockStore.appendAuditLog).toHaveBeenCalledWith({
      type: 'retry_alert',
      accountId: 'account-1',
      message: 'join on @news reached 3 attempts',
    });

    await advance(3000);
    await advance(3000);

    expect(mockOperations.run).toHaveBeenCalledTimes(5);
    expect(mockAlerts.maxRetriesReached).toHaveBeenCalledTimes(1);
    expect(mockAlerts.maxRetriesReached).toHaveBeenCalledWith(
      expect.objectContaining({ accountId: 'account-1', attemptCount: 5 }),
      'Alpha',
    );
    expect(service.getStatus().totalQueued).toBe(1);
  });

  it('should halt the queue for good when the account is banned', async () => {
    service.enqueue('account-1', operation);
    await flush();

    statusListener?.({ ...account, status: 'banned' }, 'active');
    await flush();

    expect(service.getStatus()).toEqual({
      workers: 0,
      totalQueued: 0,
      queues: [],
      haltedAccounts: ['account-1'],
    });

    await advance(10_000);
    expect(mockOperations.run).toHaveBeenCalledTimes(1);
    expect(service.enqueue('account-1', operation)).toBeNull();
  });

  it('should refuse tasks for banned accounts', () => {
    mockAccountHealth.isBanned.mockReturnValue(true);

    expect(service.enqueue('account-1', operation)).toBeNull();
    expect(service.getStatus().totalQueued).toBe(0);
  });

  it('should drop a task whose precondition no longer holds', async () => {
    mockOperations.run.mockResolvedValueOnce({ type: 'stale' });

    service.enqueue('account-1', operation);
    await flush();

    expect(service.getStatus().totalQueued).toBe(0);
  });

  it('should drop a task whose target became unreachable', async () => {
    mockOperations.run.mockResolvedValueOnce({
      type: 'targetInaccessible',
      message: 'CHANNEL_PRIVATE',
    });

    service.enqueue('account-1', operation);
    await flush();

    expect(service.getStatus().totalQueued).toBe(0);
    expect(mockStore.appendAuditLog).toHaveBeenCalledWith({
      type: 'error',
      accountId: 'account-1',
      message: 'Retry of join on @news dropped: CHANNEL_PRIVATE',
    });
  });

  it('should put the in-flight task back at the head on stop', async () => {
    service.enqueue('account-1', operation);
    await flush();

    await service.stop();

    expect(service.getStatus()).toEqual({
      workers: 0,
      totalQueued: 1,
      queues: [
        {
          accountId: 'account-1',
          queued: 1,
          running: false,
          nextRetryAt: T0 + 1000,
        },
      ],
      haltedAccounts: [],
    });

    service.resume();
    await advance(1000);
    expect(mockOperations.run).toHaveBeenCalledTimes(2);
  });

  it('should back off and continue after an unexpected worker error', async () => {
    mockOperations.run
      .mockRejectedValueOnce(new Error('store offline'))
      .mockResolvedValueOnce({ type: 'success', alreadyMember: false });

    service.enqueue('account-1', operation);
    await flush();

    expect(mockOperations.run).toHaveBeenCalledTimes(1);
    expect(service.getStatus().totalQueued).toBe(1);

    await advance(4999);
    expect(mockOperations.run).toHaveBeenCalledTimes(1);

    await advance(1);
    expect(mockOperations.run).toHaveBeenCalledTimes(2);
    expect(service.getStatus().totalQueued).toBe(0);
  });
});
