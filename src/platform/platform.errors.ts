export type PlatformFailure =
  | { type: 'throttled'; seconds: number }
  | { type: 'targetInaccessible'; message: string }
  | { type: 'alreadyMember' }
  | { type: 'bannedOnTarget'; message: string }
  | { type: 'other'; message: string };

export class PlatformError extends Error {
  constructor(readonly failure: PlatformFailure) {
    super(describeFailure(failure));
    this.name = 'PlatformError';
  }
}

export class AuthError extends Error {
  constructor(
    readonly accountId: string,
    reason: string,
  ) {
    super(`Session for ${accountId} is not authorized: ${reason}`);
    this.name = 'AuthError';
  }
}

export function describeFailure(failure: PlatformFailure): string {
  switch (failure.type) {
    case 'throttled':
      return `Throttled for ${failure.seconds}s`;
    case 'alreadyMember':
      return 'Already a member';
    case 'targetInaccessible':
    case 'bannedOnTarget':
    case 'other':
      return failure.message;
  }
}
