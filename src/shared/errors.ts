/**
 * Error types raised by the banking client.
 *
 * - `ValidationError` - malformed input caught before any request is sent
 * - `HttpError` - the API answered with a non-2xx status
 * - `BankingError` - everything else (network, timeout, bad response body)
 */

export type BankingErrorCode =
  | 'VALIDATION_ERROR'
  | 'HTTP_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'INVALID_JSON'
  | 'UNEXPECTED_RESPONSE'
  | 'AUTH_ERROR'
  | 'CLIENT_CLOSED';

export class BankingError extends Error {
  constructor(
    message: string,
    public readonly code: BankingErrorCode,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ValidationError extends BankingError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

export class HttpError extends BankingError {
  constructor(
    statusCode: number,
    public readonly statusText: string,
    public readonly url: string,
    public readonly body: string = ''
  ) {
    super(`HTTP ${statusCode} ${statusText} for ${url}`, 'HTTP_ERROR', statusCode);
  }
}
