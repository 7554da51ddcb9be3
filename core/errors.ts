/**
 * Library Error Types
 *
 * Structured error codes for programmatic error handling.
 * Callers can switch on error.code instead of matching messages.
 *
 * @example
 * ```ts
 * import { CoinbitsError, toBytes } from 'coinbits';
 *
 * try {
 *   toBytes(userInput);
 * } catch (err) {
 *   if (err instanceof CoinbitsError) {
 *     switch (err.code) {
 *       case 'MALFORMED_HEX': showError('Not a hex string'); break;
 *       default: showError(err.message);
 *     }
 *   }
 * }
 * ```
 */

export type CoinbitsErrorCode =
  | 'MALFORMED_HEX'
  | 'INVALID_BASE58_CHARACTER'
  | 'INVALID_PUBLIC_KEY'
  | 'INVALID_PRIVATE_KEY'
  | 'FIELD_TOO_LONG'
  | 'UNKNOWN_NETWORK'
  | 'NETWORK_ALREADY_REGISTERED'
  | 'VALIDATION_ERROR';

export class CoinbitsError extends Error {
  readonly code: CoinbitsErrorCode;
  readonly cause?: unknown;

  constructor(message: string, code: CoinbitsErrorCode, cause?: unknown) {
    super(message);
    this.name = 'CoinbitsError';
    this.code = code;
    this.cause = cause;
  }
}

/**
 * Type guard to check if an error is a CoinbitsError
 */
export function isCoinbitsError(err: unknown): err is CoinbitsError {
  return err instanceof CoinbitsError;
}
