export class InvalidBroadcastError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBroadcastError';
  }
}
