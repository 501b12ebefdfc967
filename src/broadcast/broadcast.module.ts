import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { OperationsModule } from '../operations/operations.module';
import { RetryModule } from '../retry/retry.module';
import { BroadcastController } from './broadcast.controller';
import { BroadcastService } from './broadcast.service';

@Module({
  imports: [AccountsModule, OperationsModule, RetryModule],
  controllers: [BroadcastController],
  providers: [BroadcastService],
  exports: [BroadcastService],
})
export class BroadcastModule {}
