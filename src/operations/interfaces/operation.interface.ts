import {
  OperationKind,
  OperationOf,
  PlatformSession,
} from '../../platform/interfaces';
import { AuditType } from '../../storage/interfaces';

export type OperationPayload = Record<string, unknown>;

export interface OperationHandler<K extends OperationKind> {
  auditType: AuditType;
  /** @throws InvalidBroadcastError when the payload does not fit the kind */
  build(target: string, payload: OperationPayload): OperationOf<K>;
  describe(operation: OperationOf<K>): string;
  /**
   * Re-checked before a retry runs. Resolves false when the operation no
   * longer makes sense and should be dropped as done.
   */
  precondition?: (
    operation: OperationOf<K>,
    session: PlatformSession,
  ) => Promise<boolean>;
}

export type OperationHandlers = {
  [K in OperationKind]: OperationHandler<K>;
};

export type AccountOutcome =
  | { type: 'success'; alreadyMember: boolean }
  | { type: 'stale' }
  | { type: 'throttled'; seconds: number; until: number | null }
  | { type: 'banned'; message: string }
  | { type: 'targetInaccessible'; message: string }
  | { type: 'failed'; message: string }
  | { type: 'unavailable' };

export interface RunOptions {
  signal?: AbortSignal;
  checkPrecondition?: boolean;
}
