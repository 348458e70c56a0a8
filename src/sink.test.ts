import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ConfigError } from './errors.js';
import { FileSink, assertWritableOutput } from './sink.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tokenfill-sink-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('FileSink', () => {
  it('writes byte strings to stdout unchanged', () => {
    const chunks: Uint8Array[] = [];
    const sink = new FileSink({
      write: (chunk: Uint8Array) => chunks.push(chunk),
    });

    sink.write(null, 'café');

    expect(Buffer.concat(chunks)).toEqual(Buffer.from([0x63, 0x61, 0x66, 0xe9]));
  });

  it('creates parent directories for a file output', () => {
    const output = path.join(tmpDir, 'a', 'b', 'out.conf');
    new FileSink().write(output, 'x=1\n');
    expect(fs.readFileSync(output, 'utf-8')).toBe('x=1\n');
  });

  it('refuses to write over a directory', () => {
    expect(() => new FileSink().write(tmpDir, 'x')).toThrow(ConfigError);
  });
});

describe('assertWritableOutput', () => {
  it('accepts a path that does not exist yet', () => {
    expect(() => assertWritableOutput(path.join(tmpDir, 'new'))).not.toThrow();
  });

  it('throws ConfigError for an existing directory', () => {
    expect(() => assertWritableOutput(tmpDir)).toThrow(
      `Output path is a directory: ${tmpDir}`,
    );
  });
});
