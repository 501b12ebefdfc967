import { Logger } from '@nestjs/common';
import { Api, TelegramClient } from 'telegram';
import type { Entity } from 'telegram/define';
import {
  LiveEvent,
  OperationOf,
  PlatformOperation,
  PlatformSession,
} from '../interfaces';
import { PlatformError } from '../platform.errors';
import { toPlatformError } from './telegram-errors';

export class TelegramSession implements PlatformSession {
  private readonly logger = new Logger(TelegramSession.name);

  constructor(
    readonly accountId: string,
    private readonly client: TelegramClient,
  ) {}

  async call(operation: PlatformOperation): Promise<void> {
    try {
      await this.dispatch(operation);
    } catch (error) {
      throw toPlatformError(error);
    }
  }

  async detectLiveEvent(target: string): Promise<LiveEvent | null> {
    try {
      const entity = await this.client.getEntity(target);
      return await this.findLiveEvent(entity, target);
    } catch (error) {
      throw toPlatformError(error);
    }
  }

  async disconnect(): Promise<void> {
    await this.client.destroy();
  }

  private dispatch(operation: PlatformOperation): Promise<void> {
    switch (operation.kind) {
      case 'join':
        return this.join(operation);
      case 'view':
        return this.view(operation);
      case 'react':
        return this.react(operation);
      case 'vote':
        return this.vote(operation);
      case 'joinLive':
        return this.joinLive(operation);
    }
  }

  private async join(operation: OperationOf<'join'>): Promise<void> {
    const entity = await this.client.getEntity(operation.target);
    if (!(entity instanceof Api.Channel)) {
      throw new PlatformError({
        type: 'targetInaccessible',
        message: `${operation.target} is not a channel or supergroup`,
      });
    }
    await this.client.invoke(new Api.channels.JoinChannel({ channel: entity }));
  }

  private async view(operation: OperationOf<'view'>): Promise<void> {
    const entity = await this.client.getEntity(operation.target);
    await this.client.invoke(
      new Api.messages.GetMessagesViews({
        peer: entity,
        id: operation.messageIds,
        increment: true,
      }),
    );

    if (!operation.markAsRead || operation.messageIds.length === 0) {
      return;
    }

    const maxId = Math.max(...operation.messageIds);
    try {
      if (entity instanceof Api.Channel) {
        await this.client.invoke(
          new Api.channels.ReadHistory({ channel: entity, maxId }),
        );
      } else {
        await this.client.invoke(
          new Api.messages.ReadHistory({ peer: entity, maxId }),
        );
      }
    } catch (error) {
      // views already counted; an unread marker is not worth failing the call
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(
        `Could not mark ${operation.target} as read for ${this.accountId}: ${errorMessage}`,
      );
    }
  }

  private async react(operation: OperationOf<'react'>): Promise<void> {
    const entity = await this.client.getEntity(operation.target);

    for (const msgId of operation.messageIds) {
      const emoticon =
        operation.emojis[Math.floor(Math.random() * operation.emojis.length)];
      if (!emoticon) {
        throw new PlatformError({
          type: 'other',
          message: 'No reaction emoji available',
        });
      }
      await this.client.invoke(
        new Api.messages.SendReaction({
          peer: entity,
          msgId,
          reaction: [new Api.ReactionEmoji({ emoticon })],
        }),
      );
    }
  }

  private async vote(operation: OperationOf<'vote'>): Promise<void> {
    const entity = await this.client.getEntity(operation.target);
    const [message] = await this.client.getMessages(entity, {
      ids: [operation.messageId],
    });
    const media = message?.media;

    if (!(media instanceof Api.MessageMediaPoll)) {
      throw new PlatformError({
        type: 'targetInaccessible',
        message: `Message ${operation.messageId} in ${operation.target} is not a poll`,
      });
    }
    if (media.poll.closed) {
      throw new PlatformError({
        type: 'targetInaccessible',
        message: `Poll ${operation.messageId} in ${operation.target} is closed`,
      });
    }

    const options: Buffer[] = [];
    for (const index of operation.optionIndexes) {
      const answer = media.poll.answers[index];
      if (!answer) {
        throw new PlatformError({
          type: 'targetInaccessible',
          message: `Poll ${operation.messageId} has no option #${index}`,
        });
      }
      options.push(answer.option);
    }

    await this.client.invoke(
      new Api.messages.SendVote({
        peer: entity,
        msgId: operation.messageId,
        options,
      }),
    );
  }

  /**
   * Joins the channel hosting the event once the same call is confirmed to be
   * running. Media-level participation is left to the client library.
   */
  private async joinLive(operation: OperationOf<'joinLive'>): Promise<void> {
    const entity = await this.client.getEntity(operation.target);
    const live = await this.findLiveEvent(entity, operation.target);

    if (!live || live.id !== operation.eventId) {
      throw new PlatformError({
        type: 'targetInaccessible',
        message: `Live event ${operation.eventId} in ${operation.target} is no longer running`,
      });
    }

    if (entity instanceof Api.Channel) {
      await this.client.invoke(
        new Api.channels.JoinChannel({ channel: entity }),
      );
    }
  }

  private async findLiveEvent(
    entity: Entity,
    target: string,
  ): Promise<LiveEvent | null> {
    let call: Api.TypeInputGroupCall | undefined;

    if (entity instanceof Api.Channel) {
      const full = await this.client.invoke(
        new Api.channels.GetFullChannel({ channel: entity }),
      );
      call = full.fullChat.call;
    } else if (entity instanceof Api.Chat) {
      const full = await this.client.invoke(
        new Api.messages.GetFullChat({ chatId: entity.id }),
      );
      call = full.fullChat.call;
    }

    if (!(call instanceof Api.InputGroupCall)) {
      return null;
    }

    const result = await this.client.invoke(
      new Api.phone.GetGroupCall({ call, limit: 1 }),
    );
    if (!(result.call instanceof Api.GroupCall)) {
      return null;
    }

    return {
      id: result.call.id.toString(),
      target,
      title: result.call.title,
      participantsCount: result.call.participantsCount,
    };
  }
}
