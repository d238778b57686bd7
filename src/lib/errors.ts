/**
 * Tracker Relay — Error Classification
 *
 * Transport exceptions are turned into values here, once, so the rest of
 * the code only deals with typed failure kinds.
 */

export type TransportErrorKind = 'timeout' | 'connection' | 'unexpected';

export interface TransportError {
  kind: TransportErrorKind;
  message: string;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function causeMessage(error: Error): string | undefined {
  const { cause } = error;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
    return code ? `${code}: ${cause.message}` : cause.message;
  }
  return undefined;
}

/**
 * Classify an error thrown by `fetch`.
 *
 * An abort (our timeout) is a timeout; undici reports network failures as a
 * TypeError with the socket error as its cause.
 */
export function classifyFetchError(error: unknown): TransportError {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return { kind: 'timeout', message: error.message || 'Request timed out' };
  }

  if (error instanceof TypeError) {
    const cause = causeMessage(error);
    return { kind: 'connection', message: cause ? `${error.message} (${cause})` : error.message };
  }

  return { kind: 'unexpected', message: errorMessage(error) };
}

export function isTransient(error: TransportError): boolean {
  return error.kind === 'timeout' || error.kind === 'connection';
}

/**
 * Invalid or missing configuration. Thrown before any network activity.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
