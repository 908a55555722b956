/**
 * Error types shared across docgate
 */

/**
 * Invalid option value or conflicting flags. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * The run cannot start, e.g. no files matched the given paths.
 */
export class InvocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvocationError';
  }
}

/**
 * Source text the parser could not build a clean tree from.
 */
export class SourceParseError extends Error {
  constructor(
    public readonly line: number,
    message = `Syntax error: unable to parse source at line ${line}`
  ) {
    super(message);
    this.name = 'SourceParseError';
  }
}

/**
 * Malformed candidate data handed to the validator. This is a bug in the
 * caller, not a user-facing violation.
 */
export class CandidateContractError extends Error {
  constructor(
    public readonly scopeName: string,
    reason: string
  ) {
    super(`Malformed docstring candidate for ${scopeName}: ${reason}`);
    this.name = 'CandidateContractError';
  }
}

export type StyleCheckFailure = 'unavailable' | 'timeout' | 'unparseable' | 'failed';

export class StyleCheckError extends Error {
  constructor(
    public readonly kind: StyleCheckFailure,
    message: string
  ) {
    super(message);
    this.name = 'StyleCheckError';
  }
}
