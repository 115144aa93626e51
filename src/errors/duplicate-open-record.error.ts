export class DuplicateOpenRecordError extends Error {
  constructor(
    public readonly groupNumber: number,
    public readonly recordId: string,
  ) {
    super(
      `Group ${groupNumber} already has an open delivery record (${recordId}). ` +
        `A new press cannot start until it is completed or failed.`,
    );
    this.name = 'DuplicateOpenRecordError';
  }
}
