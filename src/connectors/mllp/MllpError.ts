/**
 * Failure kinds of a single MLLP exchange
 */
export enum MllpErrorKind {
  /** Request rejected before any socket was opened */
  INVALID_INPUT = 'INVALID_INPUT',
  /** TCP connect failed (refused, unreachable, resolution failure) or timed out */
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  /** Framed message could not be written */
  WRITE_ERROR = 'WRITE_ERROR',
  /**
   * No usable response bytes: the read timed out, the peer closed without
   * sending anything, or a write stalled past the timeout. Callers cannot tell
   * these apart from the kind alone.
   */
  TIMED_OUT = 'TIMED_OUT',
  /** Any other I/O failure while reading the response; see `cause` */
  READ_ERROR = 'READ_ERROR',
  /** Response bytes are not valid UTF-8 */
  INVALID_DATA = 'INVALID_DATA',
}

/**
 * Error raised by an MLLP exchange. `cause` holds the underlying socket or
 * decoder error, when there is one.
 */
export class MllpError extends Error {
  constructor(
    public readonly kind: MllpErrorKind,
    message: string,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MllpError';
  }
}

export function isMllpError(value: unknown, kind?: MllpErrorKind): value is MllpError {
  return value instanceof MllpError && (kind === undefined || value.kind === kind);
}
