import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { AlertService } from './alert.service';

@Module({
  imports: [AccountsModule],
  providers: [AlertService],
  exports: [AlertService],
})
export class AlertsModule {}
