import { ErrorCode, ProvisioningError } from '../types';

export const STACK_ALREADY_EXISTS = 'AlreadyExistsException';

/**
 * Error raised by a capability adapter. `code` is the provider's
 * classification (the SDK exception name for AWS), never parsed from text.
 */
export class ProviderError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'ProviderError';
    this.code = code;
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/**
 * Wrap whatever an SDK call rejected with into a ProviderError.
 */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (error instanceof Error) {
    return new ProviderError(error.name || 'Error', error.message);
  }
  return new ProviderError('Unknown', String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function provisioningError(
  code: ErrorCode,
  message: string,
  extra: Omit<ProvisioningError, 'code' | 'message'> = {}
): ProvisioningError {
  return { code, message, ...extra };
}

/**
 * Render an error and its chain of causes on one line each.
 */
export function describeError(error: ProvisioningError): string[] {
  const lines = [`${error.code}: ${error.message}`];
  let cause = error.cause;
  while (cause) {
    lines.push(`  caused by ${cause.code}: ${cause.message}`);
    cause = cause.cause;
  }
  return lines;
}
