import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TelegramClient } from 'telegram';
import { LogLevel } from 'telegram/extensions/Logger';
import { StringSession } from 'telegram/sessions';
import {
  PlatformClient,
  PlatformSession,
  SessionCredentials,
} from '../interfaces';
import { AuthError } from '../platform.errors';
import { isAuthFailure, toPlatformError } from './telegram-errors';
import { TelegramSession } from './telegram-session';

@Injectable()
export class TelegramPlatformClient implements PlatformClient {
  private readonly logger = new Logger(TelegramPlatformClient.name);
  private readonly apiId: number;
  private readonly apiHash: string;
  private readonly connectionRetries: number;

  constructor(private readonly configService: ConfigService) {
    this.apiId = this.configService.get<number>('telegram.apiId') || 0;
    this.apiHash = this.configService.get<string>('telegram.apiHash') || '';
    this.connectionRetries =
      this.configService.get<number>('telegram.connectionRetries') || 3;
  }

  async authenticate(
    credentials: SessionCredentials,
  ): Promise<PlatformSession> {
    const { accountId } = credentials;

    let session: StringSession;
    try {
      session = new StringSession(credentials.credentialRef);
    } catch {
      throw new AuthError(accountId, 'saved session string is malformed');
    }

    // flood waits must surface to the caller instead of being slept inside the client
    const client = new TelegramClient(session, this.apiId, this.apiHash, {
      connectionRetries: this.connectionRetries,
      floodSleepThreshold: 0,
    });
    client.setLogLevel(LogLevel.ERROR);

    try {
      await client.connect();
      if (!(await client.checkAuthorization())) {
        throw new AuthError(accountId, 'session is no longer authorized');
      }
      this.logger.debug(`Connected session for ${accountId}`);
      return new TelegramSession(accountId, client);
    } catch (error) {
      await this.destroyQuietly(client, accountId);
      if (error instanceof AuthError) {
        throw error;
      }
      if (isAuthFailure(error)) {
        throw new AuthError(accountId, error.errorMessage);
      }
      throw toPlatformError(error);
    }
  }

  private async destroyQuietly(
    client: TelegramClient,
    accountId: string,
  ): Promise<void> {
    try {
      await client.destroy();
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.debug(
        `Error closing failed session for ${accountId}: ${errorMessage}`,
      );
    }
  }
}
