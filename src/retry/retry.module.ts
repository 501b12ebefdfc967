import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { AlertsModule } from '../alerts/alerts.module';
import { OperationsModule } from '../operations/operations.module';
import { RetryQueueService } from './retry-queue.service';

@Module({
  imports: [AccountsModule, AlertsModule, OperationsModule],
  providers: [RetryQueueService],
  exports: [RetryQueueService],
})
export class RetryModule {}
