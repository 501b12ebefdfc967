import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { BroadcastModule } from '../broadcast/broadcast.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { SessionsModule } from '../sessions/sessions.module';
import { LiveController } from './live.controller';
import { LiveWatcherService } from './live-watcher.service';

@Module({
  imports: [AccountsModule, BroadcastModule, RateLimitModule, SessionsModule],
  controllers: [LiveController],
  providers: [LiveWatcherService],
  exports: [LiveWatcherService],
})
export class LiveModule {}
