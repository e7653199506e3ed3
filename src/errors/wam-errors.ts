/**
 * Custom error classes for the WAM speaker API
 * Provides a consistent error hierarchy with proper typing
 */

/**
 * Base error class for all WAM-related errors
 */
export class WamError extends Error {
  constructor(message: string, public readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WamError';
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WamError);
    }
  }
}

/**
 * Network-level failure: unreachable host, refused connection, timeout or a non-2xx status
 */
export class TransportError extends WamError {
  constructor(
    public readonly address: string,
    cause: unknown,
    public readonly statusCode?: number
  ) {
    super(`Transport error for ${address}: ${getErrorMessage(cause)}`, 'TRANSPORT_ERROR', { cause });
    this.name = 'TransportError';
  }
}

/**
 * Malformed or unexpected reply, or a failure reported by the device itself
 */
export class ProtocolError extends WamError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly rawResponse: string
  ) {
    super(`${command}: ${message}`, 'PROTOCOL_ERROR');
    this.name = 'ProtocolError';
  }
}

/**
 * Client-side validation failure. Thrown before anything is sent to a speaker.
 */
export class InvalidArgumentError extends WamError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown
  ) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

/**
 * One step of the multi-step grouping sequence failed.
 * `step` is the zero-based index into the sequence (ungroup calls first, group command last).
 */
export class GroupingError extends WamError {
  constructor(
    message: string,
    public readonly groupName: string,
    public readonly step: number,
    public readonly speakerAddress: string,
    cause: unknown
  ) {
    super(message, 'GROUPING_ERROR', { cause });
    this.name = 'GroupingError';
  }
}

export function isWamError(error: unknown): error is WamError {
  return error instanceof WamError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}

/**
 * Get a user-friendly error message from any error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}
