export class OperationTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super('This operation timed out');
    this.name = 'OperationTimeoutError';
  }
}
