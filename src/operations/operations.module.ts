import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { SessionsModule } from '../sessions/sessions.module';
import { AccountOperationService } from './account-operation.service';

@Module({
  imports: [AccountsModule, RateLimitModule, SessionsModule],
  providers: [AccountOperationService],
  exports: [AccountOperationService],
})
export class OperationsModule {}
