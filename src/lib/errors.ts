/**
 * Error taxonomy
 *
 * Every failure the core reports is a PeerSyncError subclass carrying its
 * taxonomy kind and the HTTP status the gateway answers with.
 */

import { ErrorKind } from '../types/constants';

export abstract class PeerSyncError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly httpStatus: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): { error: ErrorKind; message: string } {
    return { error: this.kind, message: this.message };
  }
}

/**
 * Malformed connection string, request body or name
 */
export class FormatError extends PeerSyncError {
  readonly kind = ErrorKind.FORMAT;
  readonly httpStatus = 400;
}

/**
 * Unknown peer, gallery or file
 */
export class NotFoundError extends PeerSyncError {
  readonly kind = ErrorKind.NOT_FOUND;
  readonly httpStatus = 404;
}

/**
 * Remote peer refused the connection or could not be resolved
 */
export class UnreachableError extends PeerSyncError {
  readonly kind = ErrorKind.UNREACHABLE;
  readonly httpStatus = 502;
}

/**
 * Remote peer did not answer within the request ceiling
 */
export class TimeoutError extends PeerSyncError {
  readonly kind = ErrorKind.TIMEOUT;
  readonly httpStatus = 504;
}

/**
 * Remote peer answered with something we cannot decode
 */
export class ProtocolError extends PeerSyncError {
  readonly kind = ErrorKind.PROTOCOL;
  readonly httpStatus = 502;
}

/**
 * Operation abandoned because its deadline passed or the caller aborted
 */
export class CancelledError extends PeerSyncError {
  readonly kind = ErrorKind.CANCELLED;
  readonly httpStatus = 499;
}

/**
 * Local cache write failed
 */
export class WriteError extends PeerSyncError {
  readonly kind = ErrorKind.WRITE;
  readonly httpStatus = 500;
}

export function isPeerSyncError(error: unknown): error is PeerSyncError {
  return error instanceof PeerSyncError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
