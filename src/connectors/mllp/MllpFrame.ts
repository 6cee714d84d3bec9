/**
 * MLLP framing
 *
 * A frame is START_BLOCK + payload + END_BLOCK + CARRIAGE_RETURN. There is no
 * length prefix and no escaping: payload bytes equal to a marker are sent as-is.
 */

/**
 * MLLP frame characters
 */
export const MLLP_FRAME = {
  /** Start block character (VT - Vertical Tab) */
  START_BLOCK: 0x0b,
  /** End block character (FS - File Separator) */
  END_BLOCK: 0x1c,
  /** Carriage return */
  CARRIAGE_RETURN: 0x0d,
} as const;

const START_SEQUENCE = Buffer.from([MLLP_FRAME.START_BLOCK]);
const END_SEQUENCE = Buffer.from([MLLP_FRAME.END_BLOCK, MLLP_FRAME.CARRIAGE_RETURN]);

/**
 * Wrap a message in an MLLP frame. The message is encoded as UTF-8.
 */
export function frameMessage(message: string): Buffer {
  return Buffer.concat([START_SEQUENCE, Buffer.from(message, 'utf-8'), END_SEQUENCE]);
}

/**
 * True when the buffer ends with the END_BLOCK + CARRIAGE_RETURN sequence
 */
export function hasCompleteMessage(buffer: Buffer): boolean {
  return (
    buffer.length >= END_SEQUENCE.length &&
    buffer[buffer.length - 2] === MLLP_FRAME.END_BLOCK &&
    buffer[buffer.length - 1] === MLLP_FRAME.CARRIAGE_RETURN
  );
}

/**
 * Strip one leading START_BLOCK and one trailing END sequence, each only if present.
 * Some peers omit the start byte on error paths, so neither marker is required.
 */
export function unframeMessage(data: Buffer): Buffer {
  const start = data.length > 0 && data[0] === MLLP_FRAME.START_BLOCK ? 1 : 0;
  let end = data.length;

  if (end - start >= END_SEQUENCE.length && hasCompleteMessage(data)) {
    end -= END_SEQUENCE.length;
  }

  return data.subarray(start, end);
}
