/**
 * Structured error classes for the networking runtime.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  CONNECT_FAILED: 'CONNECT_FAILED',
  DUPLICATE_HANDLER: 'DUPLICATE_HANDLER',
  DECODE_FAILED: 'DECODE_FAILED',
  HANDLER_FAILED: 'HANDLER_FAILED',
  CAPACITY_EXCEEDED: 'CAPACITY_EXCEEDED',
  NOT_CONNECTED: 'NOT_CONNECTED',
  MISSING_TRANSPORT: 'MISSING_TRANSPORT',
  MESSAGE_TOO_LARGE: 'MESSAGE_TOO_LARGE',
  CHANNEL_CLOSED: 'CHANNEL_CLOSED',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
export abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when dialling a server fails (unreachable, refused, timed out, aborted).
 */
export class ConnectError extends BaseError {
  readonly code = 'CONNECT_FAILED' as const;

  constructor(message = 'Connect failed', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Thrown when a message type key already has a handler on a connection.
 *
 * Also raised when two different message names hash to the same key.
 */
export class DuplicateHandlerError extends BaseError {
  readonly code = 'DUPLICATE_HANDLER' as const;

  constructor(messageName: string, registeredName: string, key: number) {
    super(
      messageName === registeredName
        ? `Handler for ${messageName} is already registered`
        : `Message ${messageName} collides with ${registeredName} (type key 0x${key.toString(16).padStart(8, '0')})`
    );
  }
}

/**
 * Thrown when a received frame cannot be decoded. Fatal to the connection.
 */
export class DecodeError extends BaseError {
  readonly code = 'DECODE_FAILED' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Decode failed! ${message}`, options);
  }
}

/**
 * Wraps an exception thrown by an application message handler.
 */
export class HandlerError extends BaseError {
  readonly code = 'HANDLER_FAILED' as const;

  constructor(messageName: string, cause: unknown) {
    super(`Handler for ${messageName} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/**
 * Raised when a server at capacity turns a new peer away.
 */
export class CapacityExceededError extends BaseError {
  readonly code = 'CAPACITY_EXCEEDED' as const;

  constructor(maxConnections: number) {
    super(`Server is full (${maxConnections} connections)`);
  }
}

/**
 * Thrown when sending through a client that has no active connection.
 */
export class NotConnectedError extends BaseError {
  readonly code = 'NOT_CONNECTED' as const;

  constructor(message = 'Client is not connected') {
    super(message);
  }
}

/**
 * Thrown when a server is asked to listen without a transport.
 */
export class MissingTransportError extends BaseError {
  readonly code = 'MISSING_TRANSPORT' as const;

  constructor(message = 'Transport could not be found for NetworkServer') {
    super(message);
  }
}

/**
 * Thrown when an encoded message exceeds the channel's maximum size.
 */
export class MessageTooLargeError extends BaseError {
  readonly code = 'MESSAGE_TOO_LARGE' as const;

  constructor(size: number, maxSize: number) {
    super(`Message of ${size} bytes exceeds the maximum of ${maxSize} bytes`);
  }
}

/**
 * Thrown when sending on a channel that has been closed.
 */
export class ChannelClosedError extends BaseError {
  readonly code = 'CHANNEL_CLOSED' as const;

  constructor(message = 'Channel is closed') {
    super(message);
  }
}

/**
 * Thrown when an outgoing message does not match its schema.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}
