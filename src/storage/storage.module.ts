import { Global, Module } from '@nestjs/common';
import { ACCOUNT_STORE } from './interfaces';
import { InMemoryAccountStore } from './in-memory-account.store';

@Global()
@Module({
  providers: [{ provide: ACCOUNT_STORE, useClass: InMemoryAccountStore }],
  exports: [ACCOUNT_STORE],
})
export class StorageModule {}
