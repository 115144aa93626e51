export class InvalidStatusTransitionError extends Error {
  constructor(
    public readonly status: string,
    public readonly action: string,
  ) {
    super(`Delivery in status "${status}" cannot ${action}.`);
    this.name = 'InvalidStatusTransitionError';
  }
}
