/**
 * The kinds of failures the protocol layer can report.
 */
export enum ErrorKind {
  // handshake marker not observed before the deadline
  sync = "sync",
  // missing ready prompt, NACK or absent ACK byte
  protocol = "protocol",
  // response without the expected structural markers
  parse = "parse",
  // transfer completed but content does not match the source
  verification = "verification",
  // no prompt before the deadline
  timeout = "timeout",
}

/**
 * Base class for all errors raised while talking to the board.
 */
export abstract class NodeMcuError extends Error {
  public abstract readonly kind: ErrorKind;

  /**
   * @param message Human readable description.
   * @param response The raw bytes read from the board when the error occurred,
   * if there were any.
   */
  constructor(message: string, public readonly response?: Buffer) {
    super(message);
    this.name = new.target.name;
  }
}

export class SyncError extends NodeMcuError {
  public readonly kind = ErrorKind.sync;
}

export class ProtocolError extends NodeMcuError {
  public readonly kind = ErrorKind.protocol;
}

export class ParseError extends NodeMcuError {
  public readonly kind = ErrorKind.parse;
}

export class TimeoutError extends NodeMcuError {
  public readonly kind = ErrorKind.timeout;
}

export class VerificationError extends NodeMcuError {
  public readonly kind = ErrorKind.verification;

  /**
   * @param expected What the host sent (hex digest or byte length).
   * @param actual What the board reported back.
   */
  constructor(
    message: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(message);
  }
}

export function isNodeMcuError(error: unknown): error is NodeMcuError {
  return error instanceof NodeMcuError;
}
