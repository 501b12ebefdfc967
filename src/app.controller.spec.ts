import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AccountHealthService } from './accounts/account-health.service';
import { SessionRegistryService } from './sessions/session-registry.service';

describe('AppController', () => {
  let appController: AppController;

  const mockAccountHealth = {
    getHealthSummary: jest.fn().mockReturnValue({
      total: 2,
      active: 1,
      floodWait: 1,
      banned: 0,
      inactive: 0,
    }),
  };

  const mockSessions = {
    getStats: jest.fn().mockReturnValue({
      active: 1,
      busy: 0,
      connecting: 0,
      waitingForCapacity: 0,
      capacity: 100,
    }),
  };

  beforeEach(async () => {
    const app: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        AppService,
        { provide: AccountHealthService, useValue: mockAccountHealth },
        { provide: SessionRegistryService, useValue: mockSessions },
      ],
    }).compile();

    appController = app.get<AppController>(AppController);
  });

  describe('health', () => {
    it('should return health check response', () => {
      const result = appController.getHealth();
      expect(result.status).toBe('ok');
      expect(result.timestamp).toBeDefined();
      expect(result.accounts.floodWait).toBe(1);
      expect(result.sessions.capacity).toBe(100);
    });
  });
});
