/**
 * MCP tool tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type Database from 'better-sqlite3';
import { openArchiveDb } from '../src/db/index.js';
import { clearConfigCache, getConfig } from '../src/config/index.js';
import {
  compressTool,
  compressInputSchema,
  decompressTool,
  decompressInputSchema,
  analyzeTool,
  analyzeInputSchema,
  archives,
  archivesInputSchema,
  config,
} from '../src/tools/index.js';
import { SAMPLE_CONTAINER } from './helpers.js';

const SAMPLE_BASE64 = Buffer.from(SAMPLE_CONTAINER).toString('base64');

describe('Tools', () => {
  let db: Database.Database;
  let home: string;
  let savedHome: string | undefined;
  let savedMax: string | undefined;

  beforeEach(() => {
    savedHome = process.env.HUFFPACK_HOME;
    savedMax = process.env.HUFFPACK_MAX_INPUT_BYTES;
    home = mkdtempSync(join(tmpdir(), 'huffpack-tools-'));
    process.env.HUFFPACK_HOME = home;
    delete process.env.HUFFPACK_MAX_INPUT_BYTES;
    clearConfigCache();
    db = openArchiveDb(':memory:');
  });

  afterEach(() => {
    db.close();
    if (savedHome === undefined) delete process.env.HUFFPACK_HOME;
    else process.env.HUFFPACK_HOME = savedHome;
    if (savedMax === undefined) delete process.env.HUFFPACK_MAX_INPUT_BYTES;
    else process.env.HUFFPACK_MAX_INPUT_BYTES = savedMax;
    clearConfigCache();
    rmSync(home, { recursive: true, force: true });
  });

  describe('huffman_compress', () => {
    it('should return the container as base64', () => {
      const result = compressTool(db, compressInputSchema.parse({ text: 'aaaabbbccd' }));
      expect(result).toMatchObject({
        success: true,
        container: SAMPLE_BASE64,
        bytesIn: 10,
        bytesOut: 35,
        bitLength: 19,
      });
      expect(result.archiveId).toBeUndefined();
    });

    it('should accept base64 input', () => {
      const result = compressTool(db, compressInputSchema.parse({ base64: Buffer.from('aaaabbbccd').toString('base64') }));
      expect(result.container).toBe(SAMPLE_BASE64);
    });

    it('should store the container when named', () => {
      const result = compressTool(db, compressInputSchema.parse({ text: 'aaaabbbccd', name: 'sample' }));
      expect(result.archiveId).toBe(1);
    });

    it('should warn when naming without an archive', () => {
      const result = compressTool(null, compressInputSchema.parse({ text: 'aaaabbbccd', name: 'sample' }));
      expect(result.success).toBe(true);
      expect(result.warning).toBe('Archive storage is disabled. Container was not stored.');
    });

    it('should enforce the configured input limit', () => {
      process.env.HUFFPACK_MAX_INPUT_BYTES = '4';
      clearConfigCache();

      const result = compressTool(db, compressInputSchema.parse({ text: 'hello' }));
      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('INVALID_INPUT');
    });

    it('should require exactly one input source', () => {
      expect(compressInputSchema.safeParse({}).success).toBe(false);
      expect(compressInputSchema.safeParse({ text: 'a', base64: 'YQ==' }).success).toBe(false);
    });
  });

  describe('huffman_decompress', () => {
    it('should decode an inline container', () => {
      const result = decompressTool(db, decompressInputSchema.parse({ container: SAMPLE_BASE64 }));
      expect(result).toEqual({ success: true, text: 'aaaabbbccd', bytes: 10 });
    });

    it('should return base64 when asked', () => {
      const result = decompressTool(db, decompressInputSchema.parse({ container: SAMPLE_BASE64, encoding: 'base64' }));
      expect(result.base64).toBe(Buffer.from('aaaabbbccd').toString('base64'));
    });

    it('should decode a stored archive', () => {
      const stored = compressTool(db, compressInputSchema.parse({ text: 'stored text', name: 'note' }));
      const result = decompressTool(db, decompressInputSchema.parse({ archiveId: stored.archiveId }));
      expect(result.text).toBe('stored text');
    });

    it('should report missing archives and a disabled archive', () => {
      expect(decompressTool(db, decompressInputSchema.parse({ archiveId: 99 })).error?.code).toBe('NOT_FOUND');
      expect(decompressTool(null, decompressInputSchema.parse({ archiveId: 1 })).error?.code).toBe('ARCHIVE_DISABLED');
    });

    it('should report a corrupt container', () => {
      const corrupted = SAMPLE_CONTAINER.slice();
      corrupted[corrupted.length - 1] ^= 0xff;
      const result = decompressTool(
        db,
        decompressInputSchema.parse({ container: Buffer.from(corrupted).toString('base64') })
      );
      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('CORRUPT_STREAM');
    });

    it('should default to utf8 output', () => {
      expect(decompressInputSchema.parse({ container: SAMPLE_BASE64 }).encoding).toBe('utf8');
    });
  });

  describe('huffman_analyze', () => {
    it('should list codes', () => {
      const result = analyzeTool(analyzeInputSchema.parse({ text: 'zzzz' }));
      expect(result.analysis?.codes).toEqual([{ symbol: 122, frequency: 4, code: '0' }]);
    });

    it('should enforce the configured input limit', () => {
      process.env.HUFFPACK_MAX_INPUT_BYTES = '4';
      clearConfigCache();
      expect(analyzeTool(analyzeInputSchema.parse({ text: 'hello' })).error?.code).toBe('INVALID_INPUT');
    });
  });

  describe('huffman_archives', () => {
    it('should list, total and delete archives', () => {
      compressTool(db, compressInputSchema.parse({ text: 'aaaabbbccd', name: 'sample' }));

      const listed = archives(db, archivesInputSchema.parse({}));
      expect(listed.archives?.map((a) => a.name)).toEqual(['sample']);

      const stats = archives(db, archivesInputSchema.parse({ action: 'stats' }));
      expect(stats.stats?.total).toBe(1);

      expect(archives(db, archivesInputSchema.parse({ action: 'delete', id: 1 }))).toEqual({ success: true, deleted: 1 });
      expect(archives(db, archivesInputSchema.parse({ action: 'delete', id: 1 })).error?.code).toBe('NOT_FOUND');
    });

    it('should require an id to delete', () => {
      expect(archives(db, archivesInputSchema.parse({ action: 'delete' })).error?.code).toBe('INVALID_INPUT');
    });

    it('should fail when the archive is disabled', () => {
      expect(archives(null, archivesInputSchema.parse({})).error?.code).toBe('ARCHIVE_DISABLED');
    });
  });

  describe('huffman_config', () => {
    it('should update settings', () => {
      const result = config({ verify_roundtrip: true });
      expect(result.message).toBe('Updated verify_roundtrip.');
      expect(getConfig().verify_roundtrip).toBe(true);
    });

    it('should show the current configuration', () => {
      const result = config({ show: true });
      expect(result.message).toBe('Current configuration:');
      expect(result.config).toMatchObject({ max_input_bytes: 64 * 1024 * 1024 });
    });
  });
});
