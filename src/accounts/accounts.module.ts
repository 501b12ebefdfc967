import { Module, Global } from '@nestjs/common';
import { AccountHealthService } from './account-health.service';
import { AccountsController } from './accounts.controller';

@Global()
@Module({
  controllers: [AccountsController],
  providers: [AccountHealthService],
  exports: [AccountHealthService],
})
export class AccountsModule {}
