import { Global, Module } from '@nestjs/common';
import { PLATFORM_CLIENT } from './interfaces';
import { TelegramPlatformClient } from './telegram/telegram-platform.client';

@Global()
@Module({
  providers: [{ provide: PLATFORM_CLIENT, useClass: TelegramPlatformClient }],
  exports: [PLATFORM_CLIENT],
})
export class PlatformModule {}
