/**
 * Error types for tlv-relay.
 *
 * Transports raise these to their immediate caller; nothing below the CLI
 * retries or reconnects on its own.
 */

export class TlvError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TlvError";
  }
}

/** The socket is absent, closed, or failed irrecoverably. */
export class ConnectionError extends TlvError {
  constructor(message: string, options?: ErrorOptions) {
    super(`Connection error: ${message}`, options);
    this.name = "ConnectionError";
  }
}

/** A buffer is too short for the frame it declares. */
export class FormatError extends TlvError {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

export class EgressOverflowError extends TlvError {
  constructor(size: number, limit: number) {
    super(`Egress buffer full: ${size} > ${limit} bytes`);
    this.name = "EgressOverflowError";
  }
}
