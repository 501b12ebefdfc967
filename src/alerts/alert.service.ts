import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AccountHealthService } from '../accounts/account-health.service';
import { Account } from '../accounts/interfaces';
import { RetryTask } from '../retry/interfaces';

const BOT_API_URL = 'https://api.telegram.org';

/**
 * Operator alerts. Always logged; also sent to the admin chats through the
 * Bot API when a bot token and chat ids are configured.
 */
@Injectable()
export class AlertService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(AlertService.name);
  private readonly botToken: string;
  private readonly chatIds: string[];
  private unsubscribe?: () => void;

  constructor(
    private readonly configService: ConfigService,
    private readonly accountHealth: AccountHealthService,
  ) {
    this.botToken = this.configService.get<string>('alerts.botToken') || '';
    this.chatIds = this.configService.get<string[]>('alerts.chatIds') || [];
  }

  onModuleInit(): void {
    this.unsubscribe = this.accountHealth.onStatusChange((account) => {
      if (account.status === 'banned') {
        this.accountBanned(account).catch((error: unknown) => {
          const errorMessage =
            error instanceof Error ? error.message : 'Unknown error';
          this.logger.error(`Ban alert failed: ${errorMessage}`);
        });
      }
    });
  }

  onModuleDestroy(): void {
    this.unsubscribe?.();
  }

  isEnabled(): boolean {
    return this.botToken.length > 0 && this.chatIds.length > 0;
  }

  async maxRetriesReached(task: RetryTask, displayName: string): Promise<void> {
    const { kind, target } = task.operation;
    const text =
      `Retry limit reached: ${kind} on ${target} for ${displayName} ` +
      `failed ${task.attemptCount} times (last error: ${task.lastError ?? 'unknown'}). ` +
      `Retries continue.`;

    this.logger.error(text);
    await this.send(text);
  }

  async accountBanned(account: Account): Promise<void> {
    const text = `Account ${account.displayName} (${account.id}) was banned and removed from rotation.`;

    this.logger.error(text);
    await this.send(text);
  }

  /**
   * Posts `text` to every admin chat.
   *
   * @returns Number of chats the message reached
   */
  private async send(text: string): Promise<number> {
    if (!this.isEnabled()) {
      return 0;
    }

    let delivered = 0;
    for (const chatId of this.chatIds) {
      try {
        await axios.post(
          `${BOT_API_URL}/bot${this.botToken}/sendMessage`,
          { chat_id: chatId, text },
          { timeout: 10000 },
        );
        delivered++;
      } catch (error) {
        const errorMessage =
          error instanceof Error ? error.message : 'Unknown error';
        this.logger.warn(`Failed to deliver alert to ${chatId}: ${errorMessage}`);
      }
    }
    return delivered;
  }
}
