import { OperationKind } from '../../platform/interfaces';
import { OperationPayload } from '../../operations/interfaces';

export interface BroadcastRequest {
  target: string;
  /** Validated against the supported operation kinds. */
  operation: string;
  /** Number of accounts to use; all eligible accounts when omitted. */
  breadth?: number | null;
  payload?: OperationPayload;
  maxConcurrency?: number;
  /** Queue throttled accounts for retry. Defaults to true. */
  retryThrottled?: boolean;
}

export type BroadcastFailureReason =
  | 'throttled'
  | 'banned'
  | 'target_inaccessible'
  | 'session_unavailable'
  | 'error';

export interface BroadcastFailure {
  accountId: string;
  displayName: string;
  reason: BroadcastFailureReason;
  message?: string;
}

export interface BroadcastResult {
  broadcastId: string;
  target: string;
  operation: OperationKind;
  requested: number;
  attempted: number;
  successCount: number;
  failures: BroadcastFailure[];
  aborted: boolean;
  reason?: string;
  success: boolean;
  startedAt: string;
  finishedAt: string;
}
