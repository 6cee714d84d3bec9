/**
 * Loads the message payload for a send.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Message of an fs error. Checked structurally, since errors raised by
 * Node's own modules can come from another realm than this module's Error.
 */
function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Read a message file as UTF-8 text. Relative paths resolve against the
 * working directory. The content is returned untouched; segment separators
 * and any trailing framing bytes are the peer's concern.
 */
export function readMessageFile(filePath: string): string {
  const absolutePath = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);

  try {
    return fs.readFileSync(absolutePath, 'utf8');
  } catch (error) {
    throw new Error(`Failed to open message file: ${describeError(error)}`);
  }
}
