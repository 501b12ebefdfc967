import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { GLOBAL_RATE_KEY, RateLimiterService } from './rate-limiter.service';
import { SleepAbortedError } from '../common/utils';

const flush = async () => {
  for (let i = 0; i < 10; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
};

describe('RateLimiterService', () => {
  let service: RateLimiterService;
  let settings: Record<string, number>;

  const mockConfigService = {
    get: jest.fn((key: string, fallback?: number) => settings[key] ?? fallback),
  };

  const createService = async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RateLimiterService,
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();
    return module.get<RateLimiterService>(RateLimiterService);
  };

  beforeEach(async () => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    settings = {
      'rateLimit.perAccountPerMinute': 5,
      'rateLimit.perAccountPerHour': 0,
      'rateLimit.globalPerMinute': 1000,
      'rateLimit.globalPerHour': 0,
    };
    service = await createService();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should admit calls up to the per-minute limit without waiting', async () => {
    for (let i = 0; i < 5; i++) {
      await service.acquire('account-1');
    }

    const status = service.getStatus('account-1');
    expect(status.windows[0]).toEqual({
      label: 'minute',
      limit: 5,
      windowMs: 60000,
      used: 5,
    });
  });

  it('should delay the call over the limit until the oldest entry leaves the window', async () => {
    for (let i = 0; i < 5; i++) {
      await service.acquire('account-1');
    }

    let admitted = false;
    const pending = service.acquire('account-1').then(() => {
      admitted = true;
    });

    await flush();
    expect(admitted).toBe(false);

    jest.advanceTimersByTime(59_999);
    await flush();
    expect(admitted).toBe(false);

    jest.advanceTimersByTime(1);
    await flush();
    expect(admitted).toBe(true);
    await pending;

    expect(service.getStatus('account-1').windows[0]?.used).toBe(1);
  });

  it('should keep accounts independent of each other', async () => {
    for (let i = 0; i < 5; i++) {
      await service.acquire('account-1');
    }

    let admitted = false;
    const pending = service.acquire('account-2').then(() => {
      admitted = true;
    });
    await flush();

    expect(admitted).toBe(true);
    await pending;
  });

  it('should hold every account back once the global window is full', async () => {
    settings['rateLimit.perAccountPerMinute'] = 100;
    settings['rateLimit.globalPerMinute'] = 3;
    service = await createService();

    await service.acquire('account-1');
    await service.acquire('account-2');
    jest.advanceTimersByTime(10_000);
    await service.acquire('account-3');

    let admitted = false;
    const pending = service.acquire('account-4').then(() => {
      admitted = true;
    });

    jest.advanceTimersByTime(49_999);
    await flush();
    expect(admitted).toBe(false);

    jest.advanceTimersByTime(1);
    await flush();
    expect(admitted).toBe(true);
    await pending;

    expect(service.getStatus(GLOBAL_RATE_KEY).windows[0]?.used).toBe(2);
  });

  it('should let the hourly window bind when the minute window has room', async () => {
    settings['rateLimit.perAccountPerMinute'] = 10;
    settings['rateLimit.perAccountPerHour'] = 2;
    service = await createService();

    await service.acquire('account-1');
    await service.acquire('account-1');

    let admitted = false;
    const pending = service.acquire('account-1').then(() => {
      admitted = true;
    });

    jest.advanceTimersByTime(60_000);
    await flush();
    expect(admitted).toBe(false);

    jest.advanceTimersByTime(3_540_000);
    await flush();
    expect(admitted).toBe(true);
    await pending;
  });

  it('should reject a pending wait when its signal aborts', async () => {
    for (let i = 0; i < 5; i++) {
      await service.acquire('account-1');
    }

    const controller = new AbortController();
    const pending = service.acquire('account-1', controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(SleepAbortedError);
  });

  it('should return the account permit when the global wait is aborted', async () => {
    settings['rateLimit.globalPerMinute'] = 1;
    service = await createService();
    await service.acquire('account-1');

    const controller = new AbortController();
    const pending = service.acquire('account-2', controller.signal);
    await flush();
    expect(service.getStatus('account-2').windows[0]?.used).toBe(1);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(SleepAbortedError);
    expect(service.getStatus('account-2').windows[0]?.used).toBe(0);
    expect(service.getStatus(GLOBAL_RATE_KEY).windows[0]?.used).toBe(1);
  });

  it('should drop the windows of a forgotten account', async () => {
    for (let i = 0; i < 5; i++) {
      await service.acquire('account-1');
    }

    service.forget('account-1');

    expect(service.getStatus('account-1').windows.map((w) => w.used)).toEqual([
      0, 0,
    ]);
  });
});
