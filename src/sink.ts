/**
 * Output sinks for rendered templates. Text arrives as a byte string and
 * is written back byte for byte.
 */
import fs from 'fs';
import path from 'path';

import { toBuffer } from './bytes.js';
import { ConfigError } from './errors.js';

export interface ByteStream {
  write(chunk: Uint8Array): unknown;
}

export interface Sink {
  /** Write `text` to `output`, or to standard output when `output` is null. */
  write(output: string | null, text: string): void;
}

/** Throws ConfigError when `output` cannot be written as a file. */
export function assertWritableOutput(output: string): void {
  if (fs.existsSync(output) && fs.statSync(output).isDirectory()) {
    throw new ConfigError(`Output path is a directory: ${output}`);
  }
}

/** Writes files (creating parent directories) and falls back to stdout. */
export class FileSink implements Sink {
  constructor(
    private readonly stdout: ByteStream = process.stdout,
  ) {}

  write(output: string | null, text: string): void {
    if (output === null) {
      this.stdout.write(toBuffer(text));
      return;
    }
    assertWritableOutput(output);
    fs.mkdirSync(path.dirname(output), { recursive: true });
    fs.writeFileSync(output, toBuffer(text));
  }
}

/** Keeps every write in memory, in order. */
export class MemorySink implements Sink {
  readonly writes: { output: string | null; text: string }[] = [];

  write(output: string | null, text: string): void {
    this.writes.push({ output, text });
  }
}
