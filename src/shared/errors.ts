export class FeedprobeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FeedprobeError';
  }
}

export class ConfigError extends FeedprobeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class SourceError extends FeedprobeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class VerifyError extends FeedprobeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VERIFY_ERROR', details);
    this.name = 'VerifyError';
  }
}
