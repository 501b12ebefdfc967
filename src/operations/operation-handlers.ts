import { plainToInstance } from 'class-transformer';
import type { ClassConstructor } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import {
  OperationKind,
  OperationOf,
  PlatformOperation,
  PlatformSession,
} from '../platform/interfaces';
import {
  JoinLivePayloadDto,
  ReactPayloadDto,
  ViewPayloadDto,
  VotePayloadDto,
} from './dto/operation-payload.dto';
import { AuditType } from '../storage/interfaces';
import { OperationHandlers, OperationPayload } from './interfaces';
import { InvalidBroadcastError } from './operation.errors';

export const DEFAULT_REACTIONS = [
  '👍',
  '❤',
  '🔥',
  '🎉',
  '👏',
  '😁',
  '🤩',
  '🙏',
  '👌',
  '💯',
];

const OPERATION_KINDS: readonly OperationKind[] = [
  'join',
  'view',
  'react',
  'vote',
  'joinLive',
];

export function isOperationKind(value: unknown): value is OperationKind {
  return OPERATION_KINDS.some((kind) => kind === value);
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {});
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}

function parsePayload<T extends object>(
  kind: OperationKind,
  type: ClassConstructor<T>,
  payload: OperationPayload,
): T {
  const instance = plainToInstance(type, payload);
  const errors = validateSync(instance);
  if (errors.length > 0) {
    throw new InvalidBroadcastError(
      `Invalid ${kind} payload: ${flattenErrors(errors).join('; ')}`,
    );
  }
  return instance;
}

async function liveEventStillRunning(
  operation: OperationOf<'joinLive'>,
  session: PlatformSession,
): Promise<boolean> {
  const event = await session.detectLiveEvent(operation.target);
  return event?.id === operation.eventId;
}

export const OPERATION_HANDLERS: OperationHandlers = {
  join: {
    auditType: 'join',
    build: (target) => ({ kind: 'join', target }),
    describe: (operation) => `Joined ${operation.target}`,
  },
  view: {
    auditType: 'view',
    build: (target, payload) => {
      const dto = parsePayload('view', ViewPayloadDto, payload);
      return {
        kind: 'view',
        target,
        messageIds: dto.messageIds,
        markAsRead: dto.markAsRead ?? true,
      };
    },
    describe: (operation) =>
      `Viewed ${operation.messageIds.length} message(s) in ${operation.target}`,
  },
  react: {
    auditType: 'react',
    build: (target, payload) => {
      const dto = parsePayload('react', ReactPayloadDto, payload);
      return {
        kind: 'react',
        target,
        messageIds: dto.messageIds,
        emojis: dto.emojis ?? DEFAULT_REACTIONS,
      };
    },
    describe: (operation) =>
      `Reacted to ${operation.messageIds.length} message(s) in ${operation.target}`,
  },
  vote: {
    auditType: 'vote',
    build: (target, payload) => {
      const dto = parsePayload('vote', VotePayloadDto, payload);
      return {
        kind: 'vote',
        target,
        messageId: dto.messageId,
        optionIndexes: Array.from(new Set(dto.optionIndexes)),
      };
    },
    describe: (operation) =>
      `Voted [${operation.optionIndexes.join(', ')}] on poll ${operation.messageId} in ${operation.target}`,
  },
  joinLive: {
    auditType: 'live_join',
    build: (target, payload) => {
      const dto = parsePayload('joinLive', JoinLivePayloadDto, payload);
      return { kind: 'joinLive', target, eventId: dto.eventId };
    },
    describe: (operation) =>
      `Joined live event ${operation.eventId} in ${operation.target}`,
    precondition: liveEventStillRunning,
  },
};

/**
 * Builds a validated platform operation.
 *
 * @throws InvalidBroadcastError for an empty target, an unknown kind or a
 * payload that does not fit the kind
 */
export function buildOperation(
  kind: unknown,
  target: string,
  payload: OperationPayload = {},
): PlatformOperation {
  const trimmed = target.trim();
  if (!trimmed) {
    throw new InvalidBroadcastError('Target must not be empty');
  }
  if (!isOperationKind(kind)) {
    throw new InvalidBroadcastError(`Unknown operation kind: ${String(kind)}`);
  }
  return OPERATION_HANDLERS[kind].build(trimmed, payload);
}

function handlerFor<K extends OperationKind>(kind: K): OperationHandlers[K] {
  return OPERATION_HANDLERS[kind];
}

export function describeOperation<K extends OperationKind>(
  operation: OperationOf<K> & { kind: K },
): string {
  return handlerFor<K>(operation.kind).describe(operation);
}

export function auditTypeOf(operation: PlatformOperation): AuditType {
  return OPERATION_HANDLERS[operation.kind].auditType;
}

/**
 * Resolves true when the operation has no precondition or it still holds.
 */
export async function preconditionHolds<K extends OperationKind>(
  operation: OperationOf<K> & { kind: K },
  session: PlatformSession,
): Promise<boolean> {
  const { precondition } = handlerFor<K>(operation.kind);
  return precondition ? precondition(operation, session) : true;
}
