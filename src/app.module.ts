import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AccountsModule } from './accounts/accounts.module';
import { AlertsModule } from './alerts/alerts.module';
import { BroadcastModule } from './broadcast/broadcast.module';
import { LiveModule } from './live/live.module';
import { OperationsModule } from './operations/operations.module';
import { PlatformModule } from './platform/platform.module';
import { RateLimitModule } from './rate-limit/rate-limit.module';
import { RetryModule } from './retry/retry.module';
import { SessionsModule } from './sessions/sessions.module';
import { StorageModule } from './storage/storage.module';
import configuration from './config/configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    StorageModule,
    PlatformModule,
    AccountsModule,
    RateLimitModule,
    SessionsModule,
    AlertsModule,
    OperationsModule,
    RetryModule,
    BroadcastModule,
    LiveModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
