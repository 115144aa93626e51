export class RecordStoreWriteFailedError extends Error {
  constructor(
    public readonly groupNumber: number,
    public readonly cause: unknown,
  ) {
    super(
      `Delivery record write for group ${groupNumber} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = 'RecordStoreWriteFailedError';
  }
}
