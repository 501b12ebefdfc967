import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { SessionRegistryService } from './session-registry.service';

@Module({
  imports: [AccountsModule],
  providers: [SessionRegistryService],
  exports: [SessionRegistryService],
})
export class SessionsModule {}
