export class CommuteRankError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommuteRankError';
  }
}

/**
 * A line of an input file could not be read as an address or key point
 */
export class ParseError extends CommuteRankError {
  constructor(
    message: string,
    public readonly filePath?: string,
    public readonly lineNumber?: number
  ) {
    super(ParseError.describe(message, filePath, lineNumber));
    this.name = 'ParseError';
  }

  private static describe(message: string, filePath?: string, lineNumber?: number): string {
    if (filePath && lineNumber !== undefined) {
      return `${filePath}:${lineNumber}: ${message}`;
    }
    if (lineNumber !== undefined) {
      return `line ${lineNumber}: ${message}`;
    }
    return message;
  }
}

/**
 * Network failure, timeout or non-2xx status on a provider request
 */
export class TransportError extends CommuteRankError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Provider payload did not have the expected shape. The raw payload is kept for the diagnostic dump.
 */
export class DataFormatError extends CommuteRankError {
  constructor(message: string, public readonly response?: unknown) {
    super(message);
    this.name = 'DataFormatError';
  }
}

export class InvalidWeightsError extends CommuteRankError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidWeightsError';
  }
}

export class ConfigError extends CommuteRankError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
