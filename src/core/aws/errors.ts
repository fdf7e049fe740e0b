/**
 * Error types for credential and account resolution
 */

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Format a list of errors the way the aggregate renders them
 */
export function formatErrors(errors: readonly Error[]): string {
  const points = errors.map((e) => `\t* ${e.message}`).join('\n');
  const noun = errors.length === 1 ? 'error' : 'errors';
  return `${errors.length} ${noun} occurred:\n${points}\n`;
}

/**
 * Accumulates independent failures into one reportable error
 */
export class ErrorAggregate extends Error {
  private readonly causes: Error[];
  private readonly autoMessage: boolean;

  constructor(message?: string, errors: readonly Error[] = []) {
    super(message ?? formatErrors(errors));
    this.name = 'ErrorAggregate';
    this.causes = [...errors];
    this.autoMessage = message === undefined;
  }

  /** Every cause appended so far, in order */
  get errors(): readonly Error[] {
    return this.causes;
  }

  get isEmpty(): boolean {
    return this.causes.length === 0;
  }

  /**
   * Append a cause; the message is recomputed unless one was given explicitly
   */
  append(error: unknown): this {
    this.causes.push(toError(error));
    if (this.autoMessage) {
      this.message = formatErrors(this.causes);
    }
    return this;
  }
}

/**
 * Thrown when no provider in a credential chain produced credentials
 */
export class CredentialChainError extends ErrorAggregate {
  constructor(errors: readonly Error[]) {
    super(`No valid credential source found in chain.\n${formatErrors(errors)}`, errors);
    this.name = 'CredentialChainError';
  }
}

/**
 * Thrown when the account ID could not be determined
 */
export class AccountResolutionError extends ErrorAggregate {
  constructor(message: string, errors: readonly Error[]) {
    super(message, errors);
    this.name = 'AccountResolutionError';
  }
}

/**
 * AWS SDK service errors carry response metadata or an error code
 */
export function isAwsServiceError(error: unknown): error is Error & { Code?: string } {
  return error instanceof Error && ('$metadata' in error || 'Code' in error);
}

/**
 * Service error code: the `Code` field when present, otherwise the error name
 */
export function getAwsErrorCode(error: Error & { Code?: unknown }): string {
  return typeof error.Code === 'string' ? error.Code : error.name;
}
