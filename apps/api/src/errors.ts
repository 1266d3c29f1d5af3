export class TablecastError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'TablecastError';
  }
}

/** An IncrementalConfig field (or env variable) is missing or invalid for the chosen pattern. */
export class ConfigurationError extends TablecastError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends TablecastError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.issues = issues.length ? issues : [message];
  }
}

/** The target platform cannot produce the requested artifact, physical type or load pattern. */
export class UnsupportedCapabilityError extends TablecastError {
  constructor(
    message: string,
    public readonly platform: string,
    public readonly capability: string
  ) {
    super(message, 'UNSUPPORTED_CAPABILITY');
    this.name = 'UnsupportedCapabilityError';
  }
}
