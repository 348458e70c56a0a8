/**
 * Template text travels through the engine as byte strings: one char code
 * (0-255) per file byte, the `latin1` mapping. The placeholder grammar is
 * ASCII, so bytes outside placeholders reach the output unchanged whatever
 * encoding the template uses.
 */
import fs from 'fs';

export const BYTE_ENCODING = 'latin1';

/** Encode a Unicode string (command-line text, environment values) as UTF-8 bytes. */
export function toByteString(text: string): string {
  return Buffer.from(text, 'utf8').toString(BYTE_ENCODING);
}

export function readByteString(filePath: string): string {
  return fs.readFileSync(filePath, BYTE_ENCODING);
}

export function toBuffer(bytes: string): Buffer {
  return Buffer.from(bytes, BYTE_ENCODING);
}
