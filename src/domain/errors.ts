export class UsageError extends Error {
  public readonly exitCode = 2;

  public constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class DescriptorNotFoundError extends Error {
  public constructor(public readonly query: string) {
    super(`No desktop file found for name '${query}'`);
    this.name = 'DescriptorNotFoundError';
  }
}

export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
