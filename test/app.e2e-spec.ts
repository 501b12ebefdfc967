import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { AppModule } from './../src/app.module';
import { configureApp } from './../src/app.setup';
import {
  PLATFORM_CLIENT,
  PlatformClient,
  PlatformOperation,
  PlatformSession,
  SessionCredentials,
} from './../src/platform/interfaces';
import { PlatformError } from './../src/platform/platform.errors';

interface HealthResponse {
  status: string;
  timestamp: string;
  accounts: { total: number; active: number };
  sessions: { active: number; capacity: number };
}

interface BroadcastResponse {
  operation: string;
  attempted: number;
  successCount: number;
  aborted: boolean;
  reason?: string;
  success: boolean;
}

interface AuditResponseEntry {
  type: string;
  accountId?: string;
  message: string;
}

interface MonitorsResponse {
  running: boolean;
  monitors: { target: string; breadth: number | null }[];
}

interface ErrorResponse {
  statusCode: number;
  message: string | string[];
}

const AUTH = { Authorization: 'Bearer test-secret' };

class FakePlatformClient implements PlatformClient {
  readonly calls: PlatformOperation[] = [];

  authenticate(credentials: SessionCredentials): Promise<PlatformSession> {
    const session: PlatformSession = {
      accountId: credentials.accountId,
      call: (operation) => {
        this.calls.push(operation);
        if (operation.target === '@private') {
          return Promise.reject(
            new PlatformError({
              type: 'targetInaccessible',
              message: 'CHANNEL_PRIVATE',
            }),
          );
        }
        return Promise.resolve();
      },
      detectLiveEvent: () => Promise.resolve(null),
      disconnect: () => Promise.resolve(),
    };
    return Promise.resolve(session);
  }
}

const ENV = {
  TG_ACCOUNTS_1: JSON.stringify({ displayName: 'First', session: 'session-1' }),
  TG_ACCOUNTS_2: JSON.stringify({ displayName: 'Second', session: 'session-2' }),
  TG_ACCOUNTS_3: JSON.stringify({ displayName: 'Third', session: 'session-3' }),
  CONTROL_API_KEY: 'test-secret',
  BROADCAST_COOLDOWN_MAX_MS: '0',
};

describe('Session fan-out (e2e)', () => {
  let app: INestApplication<App>;
  let platform: FakePlatformClient;
  const savedEnv = { ...process.env };

  beforeAll(() => {
    Object.assign(process.env, ENV);
  });

  afterAll(() => {
    for (const key of Object.keys(ENV)) {
      if (savedEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = savedEnv[key];
      }
    }
  });

  beforeEach(async () => {
    platform = new FakePlatformClient();
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(PLATFORM_CLIENT)
      .useValue(platform)
      .compile();

    app = moduleFixture.createNestApplication();
    configureApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /health', () => {
    it('should report accounts and session capacity without auth', () => {
      return request(app.getHttpServer())
        .get('/health')
        .expect(200)
        .expect((res) => {
          const body = res.body as HealthResponse;
          expect(body.status).toBe('ok');
          expect(body.timestamp).toBeDefined();
          expect(body.accounts.total).toBe(3);
          expect(body.accounts.active).toBe(3);
          expect(body.sessions.active).toBe(0);
          expect(body.sessions.capacity).toBe(100);
        });
    });
  });

  describe('authentication', () => {
    it('should return 401 without API key', () => {
      return request(app.getHttpServer()).get('/accounts/health').expect(401);
    });

    it('should return 401 with a wrong API key', () => {
      return request(app.getHttpServer())
        .get('/accounts/health')
        .set('Authorization', 'Bearer wrong-key')
        .expect(401);
    });
  });

  describe('GET /accounts/health', () => {
    it('should count enrolled accounts by state', () => {
      return request(app.getHttpServer())
        .get('/accounts/health')
        .set(AUTH)
        .expect(200)
        .expect({ total: 3, active: 3, floodWait: 0, banned: 0, inactive: 0 });
    });
  });

  describe('POST /broadcasts', () => {
    it('should join with every account and write the audit log', async () => {
      const res = await request(app.getHttpServer())
        .post('/broadcasts')
        .set(AUTH)
        .send({ target: '@example_channel', operation: 'join' })
        .expect(200);

      const body = res.body as BroadcastResponse;
      expect(body.operation).toBe('join');
      expect(body.attempted).toBe(3);
      expect(body.successCount).toBe(3);
      expect(body.aborted).toBe(false);
      expect(body.success).toBe(true);
      expect(platform.calls).toHaveLength(3);

      const audit = await request(app.getHttpServer())
        .get('/accounts/audit')
        .query({ limit: 10 })
        .set(AUTH)
        .expect(200);

      const entries = audit.body as AuditResponseEntry[];
      expect(entries).toHaveLength(3);
      expect(entries.every((entry) => entry.type === 'join')).toBe(true);
      expect(entries.map((entry) => entry.message).sort()).toEqual([
        'First: Joined @example_channel',
        'Second: Joined @example_channel',
        'Third: Joined @example_channel',
      ]);
    });

    it('should respect breadth', async () => {
      const res = await request(app.getHttpServer())
        .post('/broadcasts')
        .set(AUTH)
        .send({ target: '@example_channel', operation: 'join', breadth: 2 })
        .expect(200);

      expect((res.body as BroadcastResponse).successCount).toBe(2);
      expect(platform.calls).toHaveLength(2);
    });

    it('should return 422 with the result when the target is inaccessible', async () => {
      const res = await request(app.getHttpServer())
        .post('/broadcasts')
        .set(AUTH)
        .send({ target: '@private', operation: 'join' })
        .expect(422);

      const body = res.body as BroadcastResponse;
      expect(body.aborted).toBe(true);
      expect(body.reason).toBe('Target inaccessible: CHANNEL_PRIVATE');
      expect(body.successCount).toBe(0);
      expect(platform.calls).toHaveLength(1);
    });

    it('should return 400 for an unknown operation', () => {
      return request(app.getHttpServer())
        .post('/broadcasts')
        .set(AUTH)
        .send({ target: '@example_channel', operation: 'dance' })
        .expect(400);
    });

    it('should return 400 when view has no message ids', async () => {
      const res = await request(app.getHttpServer())
        .post('/broadcasts')
        .set(AUTH)
        .send({ target: '@example_channel', operation: 'view' })
        .expect(400);

      const body = res.body as ErrorResponse;
      expect(body.statusCode).toBe(400);
      expect(body.message).toContain('Invalid view payload');
      expect(platform.calls).toHaveLength(0);
    });

    it('should return 400 for a zero breadth', () => {
      return request(app.getHttpServer())
        .post('/broadcasts')
        .set(AUTH)
        .send({ target: '@example_channel', operation: 'join', breadth: 0 })
        .expect(400);
    });
  });

  describe('GET /broadcasts/retries', () => {
    it('should report an empty queue', () => {
      return request(app.getHttpServer())
        .get('/broadcasts/retries')
        .set(AUTH)
        .expect(200)
        .expect({ workers: 0, totalQueued: 0, queues: [], haltedAccounts: [] });
    });
  });

  describe('/monitors', () => {
    it('should add, list and remove a monitor', async () => {
      const server = app.getHttpServer();

      await request(server)
        .post('/monitors')
        .set(AUTH)
        .send({ target: ' @live_channel ', breadth: 2 })
        .expect(201);

      const list = await request(server).get('/monitors').set(AUTH).expect(200);
      const status = list.body as MonitorsResponse;
      expect(status.running).toBe(false);
      expect(status.monitors).toHaveLength(1);
      expect(status.monitors[0]?.target).toBe('@live_channel');
      expect(status.monitors[0]?.breadth).toBe(2);

      await request(server)
        .delete('/monitors')
        .set(AUTH)
        .send({ target: '@live_channel' })
        .expect(200)
        .expect({ removed: true, target: '@live_channel' });

      await request(server)
        .delete('/monitors')
        .set(AUTH)
        .send({ target: '@live_channel' })
        .expect(404);
    });

    it('should return 404 when checking an unknown target', () => {
      return request(app.getHttpServer())
        .post('/monitors/check')
        .set(AUTH)
        .send({ target: '@unknown' })
        .expect(404);
    });
  });

  describe('POST /accounts/:id/reactivate', () => {
    it('should return 404 for an account that is not inactive', () => {
      return request(app.getHttpServer())
        .post('/accounts/account-1/reactivate')
        .set(AUTH)
        .expect(404);
    });
  });
});
