export class InvalidMonitorOptionsError extends Error {
  constructor(message: string) {
    super(`Invalid delivery monitor options: ${message}`);
    this.name = 'InvalidMonitorOptionsError';
  }
}
