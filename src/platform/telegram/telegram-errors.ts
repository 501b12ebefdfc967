import { FloodWaitError, RPCError } from 'telegram/errors';
import { PlatformError, PlatformFailure } from '../platform.errors';

const THROTTLE_PATTERN =
  /^(?:FLOOD_WAIT|FLOOD_PREMIUM_WAIT|SLOWMODE_WAIT)_(\d+)$/;

const TARGET_INACCESSIBLE_CODES = new Set([
  'CHANNEL_PRIVATE',
  'CHANNEL_INVALID',
  'CHAT_ADMIN_REQUIRED',
  'CHAT_WRITE_FORBIDDEN',
  'INVITE_HASH_EXPIRED',
  'INVITE_HASH_INVALID',
  'USERNAME_INVALID',
  'USERNAME_NOT_OCCUPIED',
  'PEER_ID_INVALID',
  'MSG_ID_INVALID',
  'MESSAGE_POLL_CLOSED',
  'GROUPCALL_INVALID',
  'GROUPCALL_FORBIDDEN',
]);

const ALREADY_MEMBER_CODES = new Set([
  'USER_ALREADY_PARTICIPANT',
  'INVITE_REQUEST_SENT',
]);

const BANNED_CODES = new Set([
  'USER_BANNED_IN_CHANNEL',
  'USER_DEACTIVATED_BAN',
]);

const AUTH_FAILURE_CODES = new Set([
  'AUTH_KEY_UNREGISTERED',
  'AUTH_KEY_INVALID',
  'AUTH_KEY_DUPLICATED',
  'SESSION_REVOKED',
  'SESSION_EXPIRED',
  'USER_DEACTIVATED',
  'USER_DEACTIVATED_BAN',
]);

/**
 * Maps an MTProto RPC error code to the platform failure union.
 */
export function classifyRpcCode(code: string): PlatformFailure {
  const throttle = THROTTLE_PATTERN.exec(code);
  if (throttle?.[1]) {
    return { type: 'throttled', seconds: parseInt(throttle[1], 10) };
  }
  if (ALREADY_MEMBER_CODES.has(code)) {
    return { type: 'alreadyMember' };
  }
  if (BANNED_CODES.has(code)) {
    return { type: 'bannedOnTarget', message: code };
  }
  if (TARGET_INACCESSIBLE_CODES.has(code)) {
    return { type: 'targetInaccessible', message: code };
  }
  return { type: 'other', message: code };
}

export function classifyTelegramError(error: unknown): PlatformFailure {
  if (error instanceof FloodWaitError) {
    return { type: 'throttled', seconds: error.seconds };
  }
  if (error instanceof RPCError) {
    return classifyRpcCode(error.errorMessage);
  }
  return {
    type: 'other',
    message: error instanceof Error ? error.message : String(error),
  };
}

export function toPlatformError(error: unknown): PlatformError {
  return error instanceof PlatformError
    ? error
    : new PlatformError(classifyTelegramError(error));
}

export function isAuthFailure(error: unknown): error is RPCError {
  return error instanceof RPCError && AUTH_FAILURE_CODES.has(error.errorMessage);
}
