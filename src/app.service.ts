import { Injectable } from '@nestjs/common';
import { AccountHealthService } from './accounts/account-health.service';
import { AccountHealthSummary } from './accounts/interfaces';
import { SessionRegistryStats } from './sessions/interfaces';
import { SessionRegistryService } from './sessions/session-registry.service';

export interface HealthResponse {
  status: string;
  timestamp: string;
  accounts: AccountHealthSummary;
  sessions: SessionRegistryStats;
}

@Injectable()
export class AppService {
  constructor(
    private readonly accountHealth: AccountHealthService,
    private readonly sessions: SessionRegistryService,
  ) {}

  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      accounts: this.accountHealth.getHealthSummary(),
      sessions: this.sessions.getStats(),
    };
  }
}
