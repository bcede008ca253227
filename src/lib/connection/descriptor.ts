/**
 * Connection descriptor codec
 *
 * Canonical text form is `<host>:<port>:<peerID>`: exactly two colons, three
 * non-empty printable-ASCII fields, port in 1..65535.
 */

import { FormatError } from '../errors';

const SEPARATOR = ':';
const PRINTABLE_ASCII = /^[\x21-\x7e]+$/;
const PORT_DIGITS = /^[1-9][0-9]*$/;
const MAX_PORT = 65535;

export class ConnectionDescriptor {
  private constructor(
    readonly host: string,
    readonly port: number,
    readonly peerId: string
  ) {}

  /**
   * Validate the three fields and build a descriptor
   * @throws FormatError when any field is malformed
   */
  static create(host: string, port: number, peerId: string): ConnectionDescriptor {
    checkField('host', host);
    checkField('peer ID', peerId);
    if (!Number.isInteger(port) || port < 1 || port > MAX_PORT) {
      throw new FormatError(`Invalid port: ${port} (expected an integer between 1 and ${MAX_PORT})`);
    }
    return new ConnectionDescriptor(host, port, peerId);
  }

  /** Base URL of the peer's HTTP endpoints */
  baseUrl(): string {
    return `http://${this.host}:${this.port}`;
  }

  toString(): string {
    return formatConnectionString(this);
  }
}

function checkField(field: string, value: string): void {
  if (value.length === 0) {
    throw new FormatError(`Connection string ${field} is empty`);
  }
  if (value.includes(SEPARATOR)) {
    throw new FormatError(`Connection string ${field} must not contain '${SEPARATOR}'`);
  }
  if (!PRINTABLE_ASCII.test(value)) {
    throw new FormatError(`Connection string ${field} must be printable ASCII without spaces`);
  }
}

/**
 * Parse `<host>:<port>:<peerID>` into a descriptor
 * @param text - Connection string as entered by the user
 * @throws FormatError on any malformed input
 */
export function parseConnectionString(text: string): ConnectionDescriptor {
  const parts = text.trim().split(SEPARATOR).map(part => part.trim());
  if (parts.length !== 3) {
    throw new FormatError(
      `Invalid connection string "${text}": expected <host>:<port>:<peerID>`
    );
  }

  const [host, portText, peerId] = parts;
  if (!PORT_DIGITS.test(portText)) {
    throw new FormatError(`Invalid port "${portText}" in connection string`);
  }
  return ConnectionDescriptor.create(host, Number.parseInt(portText, 10), peerId);
}

/**
 * Format a descriptor as its canonical connection string
 */
export function formatConnectionString(descriptor: ConnectionDescriptor): string {
  return [descriptor.host, String(descriptor.port), descriptor.peerId].join(SEPARATOR);
}

/**
 * Validated construction, for callers that hold the three fields separately
 */
export function createDescriptor(host: string, port: number, peerId: string): ConnectionDescriptor {
  return ConnectionDescriptor.create(host, port, peerId);
}
