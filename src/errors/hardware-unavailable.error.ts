export class HardwareUnavailableError extends Error {
  constructor(
    public readonly groupId: number,
    public readonly reason: string,
  ) {
    super(`Group ${groupId} status could not be read: ${reason}`);
    this.name = 'HardwareUnavailableError';
  }
}
