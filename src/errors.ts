export class SimulationError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends SimulationError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
  }
}
