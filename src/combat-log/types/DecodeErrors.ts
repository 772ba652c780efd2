/**
 * Error types and codes for log decoding
 *
 * Structural failures abort the whole decode; each carries enough context
 * (byte offset, expected vs. available length, addresses) to diagnose a corrupt capture.
 */

/**
 * Error codes for programmatic error handling
 */
export enum DecodeErrorCode {
  BAD_MAGIC = 'BAD_MAGIC',
  TRUNCATED = 'TRUNCATED',
  DUPLICATE_AGENT = 'DUPLICATE_AGENT',
  INSTANCE_CONFLICT = 'INSTANCE_CONFLICT',
  UNSUPPORTED_CONTAINER = 'UNSUPPORTED_CONTAINER',
}

/**
 * Base error class for all decode errors
 */
export abstract class DecodeError extends Error {
  public readonly code: DecodeErrorCode;
  public readonly timestamp: Date;

  constructor(message: string, code: DecodeErrorCode) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when the input does not start with the EVTC marker
 */
export class BadMagicError extends DecodeError {
  public readonly found: string;

  constructor(found: string) {
    super(`Expected EVTC magic marker, found "${found}"`, DecodeErrorCode.BAD_MAGIC);
    this.found = found;
  }
}

/**
 * Error thrown when a declared count or record size exceeds the remaining bytes
 */
export class TruncatedError extends DecodeError {
  public readonly section: string;
  public readonly offset: number;
  public readonly expected: number;
  public readonly available: number;

  constructor(section: string, offset: number, expected: number, available: number) {
    super(
      `Truncated ${section} at offset ${offset}: expected ${expected} bytes, ${available} available`,
      DecodeErrorCode.TRUNCATED
    );
    this.section = section;
    this.offset = offset;
    this.expected = expected;
    this.available = available;
  }
}

/**
 * Error thrown when the agent table lists the same address twice
 */
export class DuplicateAgentError extends DecodeError {
  public readonly address: bigint;

  constructor(address: bigint) {
    super(`Agent address 0x${address.toString(16)} appears twice in the agent table`, DecodeErrorCode.DUPLICATE_AGENT);
    this.address = address;
  }
}

/**
 * Error thrown when two agents hold the same instance id over overlapping time
 */
export class InstanceConflictError extends DecodeError {
  public readonly instanceId: number;
  public readonly firstAddress: bigint;
  public readonly secondAddress: bigint;
  public readonly time: number;

  constructor(instanceId: number, firstAddress: bigint, secondAddress: bigint, time: number) {
    super(
      `Instance id ${instanceId} held by 0x${firstAddress.toString(16)} and 0x${secondAddress.toString(16)} at time ${time}`,
      DecodeErrorCode.INSTANCE_CONFLICT
    );
    this.instanceId = instanceId;
    this.firstAddress = firstAddress;
    this.secondAddress = secondAddress;
    this.time = time;
  }
}

/**
 * Error thrown when a byte source is handed a compressed container instead of a plain log
 */
export class UnsupportedContainerError extends DecodeError {
  public readonly path: string;

  constructor(path: string) {
    super(`${path} is a zip container; extract the log before decoding`, DecodeErrorCode.UNSUPPORTED_CONTAINER);
    this.path = path;
  }
}

/**
 * Type guard to check if an error is a TruncatedError
 */
export function isTruncatedError(error: unknown): error is TruncatedError {
  return error instanceof TruncatedError;
}

/**
 * Type guard to check if an error is any DecodeError
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}
