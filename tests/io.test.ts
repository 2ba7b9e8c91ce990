/**
 * Source/sink adapter tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  compressTo,
  decompressTo,
  fileSink,
  fileSource,
  memorySink,
  memorySource,
  readLimited,
  bytesEqual,
} from '../src/io/index.js';
import { InvalidInputError } from '../src/huffman/index.js';
import { bytes, text, SAMPLE_CONTAINER } from './helpers.js';

describe('IO', () => {
  describe('memory adapters', () => {
    it('should compress into a sink and decompress back', () => {
      const packed = memorySink();
      const compressed = compressTo(memorySource(bytes('aaaabbbccd')), packed);
      expect(compressed).toEqual({ success: true, bytesIn: 10, bytesOut: 35 });
      expect(packed.bytes()).toEqual(SAMPLE_CONTAINER);

      const unpacked = memorySink();
      const decompressed = decompressTo(memorySource(packed.bytes()), unpacked);
      expect(decompressed).toEqual({ success: true, bytesIn: 35, bytesOut: 10 });
      expect(text(unpacked.bytes())).toBe('aaaabbbccd');
    });

    it('should verify the round trip when asked', () => {
      const sink = memorySink();
      const result = compressTo(memorySource(bytes('verify me')), sink, { verify: true });
      expect(result.success).toBe(true);
      expect(sink.bytes().length).toBe(result.bytesOut);
    });

    it('should report decode failures without writing', () => {
      const sink = memorySink();
      const corrupted = SAMPLE_CONTAINER.slice();
      corrupted[corrupted.length - 1] ^= 0xff;

      const result = decompressTo(memorySource(corrupted), sink);
      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('CORRUPT_STREAM');
      expect(sink.bytes()).toHaveLength(0);
    });
  });

  describe('readLimited', () => {
    it('should reject input above the limit', () => {
      expect(() => readLimited(memorySource(bytes('0123456789'), 'ten'), 3)).toThrow(InvalidInputError);
      expect(() => readLimited(memorySource(bytes('0123456789'), 'ten'), 3)).toThrow('ten is 10 bytes, limit is 3');
    });

    it('should surface the limit as a transfer failure', () => {
      const result = compressTo(memorySource(bytes('0123456789')), memorySink(), { maxInputBytes: 3 });
      expect(result.success).toBe(false);
      expect(result.bytesIn).toBe(0);
      expect(result.error?.code).toBe('INVALID_INPUT');
    });
  });

  describe('file adapters', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'huffpack-io-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should round trip through files, creating parent directories', () => {
      const inputPath = join(dir, 'input.txt');
      const packedPath = join(dir, 'nested', 'out', 'input.txt.huff');
      const restoredPath = join(dir, 'restored.txt');

      fileSink(inputPath).write(bytes('to be or not to be'));
      expect(compressTo(fileSource(inputPath), fileSink(packedPath)).success).toBe(true);
      expect(existsSync(packedPath)).toBe(true);

      expect(decompressTo(fileSource(packedPath), fileSink(restoredPath)).success).toBe(true);
      expect(readFileSync(restoredPath, 'utf-8')).toBe('to be or not to be');
    });

    it('should propagate filesystem errors', () => {
      expect(() => compressTo(fileSource(join(dir, 'missing.txt')), memorySink())).toThrow(/ENOENT/);
    });
  });

  describe('bytesEqual', () => {
    it('should compare contents and lengths', () => {
      expect(bytesEqual(bytes('abc'), bytes('abc'))).toBe(true);
      expect(bytesEqual(bytes('abc'), bytes('abd'))).toBe(false);
      expect(bytesEqual(bytes('abc'), bytes('ab'))).toBe(false);
    });
  });
});
