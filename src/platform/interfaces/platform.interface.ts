export type PlatformOperation =
  | { kind: 'join'; target: string }
  | {
      kind: 'view';
      target: string;
      messageIds: number[];
      markAsRead: boolean;
    }
  | { kind: 'react'; target: string; messageIds: number[]; emojis: string[] }
  | {
      kind: 'vote';
      target: string;
      messageId: number;
      optionIndexes: number[];
    }
  | { kind: 'joinLive'; target: string; eventId: string };

export type OperationKind = PlatformOperation['kind'];

export type OperationOf<K extends OperationKind> = Extract<
  PlatformOperation,
  { kind: K }
>;

export interface LiveEvent {
  id: string;
  target: string;
  title?: string;
  participantsCount?: number;
}

export interface SessionCredentials {
  accountId: string;
  credentialRef: string;
}

/**
 * A live authenticated connection for one account. Not safe for concurrent
 * use; the session registry serializes access.
 */
export interface PlatformSession {
  readonly accountId: string;
  call(operation: PlatformOperation): Promise<void>;
  detectLiveEvent(target: string): Promise<LiveEvent | null>;
  disconnect(): Promise<void>;
}

export interface PlatformClient {
  /**
   * Opens and authorizes a session.
   * @throws AuthError when the saved credentials are no longer authorized
   */
  authenticate(credentials: SessionCredentials): Promise<PlatformSession>;
}

export const PLATFORM_CLIENT = Symbol('PLATFORM_CLIENT');
