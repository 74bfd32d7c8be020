// Raised for bad command-line input; the entry point turns it into exit code 1.
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(`${key}: ${message}`);
    this.name = 'ConfigError';
  }
}
