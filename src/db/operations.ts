/**
 * Archive CRUD Operations
 */

import type Database from 'better-sqlite3';
import type { ArchiveRecord, ArchiveStats, ByteSink, ByteSource, StoredArchive } from '../types.js';
import { parseContainer, totalFrequency } from '../huffman/index.js';

export interface ListArchivesInput {
  limit?: number;
  offset?: number;
}

interface DbArchiveRow {
  id: number;
  name: string;
  original_size: number;
  stored_size: number;
  distinct_symbols: number;
  bit_length: number;
  created_at: number;
  accessed_at: number;
  access_count: number;
}

interface DbStoredArchiveRow extends DbArchiveRow {
  container: Buffer;
}

const RECORD_COLUMNS = `
  id, name, original_size, stored_size, distinct_symbols, bit_length,
  created_at, accessed_at, access_count
`;

function rowToRecord(row: DbArchiveRow): ArchiveRecord {
  return {
    id: row.id,
    name: row.name,
    originalSize: row.original_size,
    storedSize: row.stored_size,
    distinctSymbols: row.distinct_symbols,
    bitLength: row.bit_length,
    createdAt: row.created_at,
    accessedAt: row.accessed_at,
    accessCount: row.access_count,
  };
}

function rowToStored(row: DbStoredArchiveRow): StoredArchive {
  return {
    ...rowToRecord(row),
    container: new Uint8Array(row.container),
  };
}

/**
 * Store a serialized container. The header is parsed to fill the metadata
 * columns, so malformed bytes are rejected before they reach the table.
 */
export function createArchive(db: Database.Database, name: string, container: Uint8Array): ArchiveRecord {
  const parsed = parseContainer(container);
  const existing = db
    .prepare<[string], { id: number }>('SELECT id FROM archives WHERE name = ?')
    .get(name);
  if (existing) {
    throw new Error(`Archive "${name}" already exists (#${existing.id})`);
  }

  const now = Date.now();
  const originalSize = totalFrequency(parsed.table);

  const result = db.prepare<[string, number, number, number, number, Buffer, number, number]>(`
    INSERT INTO archives (name, original_size, stored_size, distinct_symbols, bit_length, container, created_at, accessed_at, access_count)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0)
  `).run(
    name,
    originalSize,
    container.length,
    parsed.table.size,
    parsed.bitLength,
    Buffer.from(container.buffer, container.byteOffset, container.byteLength),
    now,
    now
  );

  return {
    id: Number(result.lastInsertRowid),
    name,
    originalSize,
    storedSize: container.length,
    distinctSymbols: parsed.table.size,
    bitLength: parsed.bitLength,
    createdAt: now,
    accessedAt: now,
    accessCount: 0,
  };
}

function touchArchive(db: Database.Database, id: number): void {
  db.prepare<[number, number]>(`
    UPDATE archives
    SET accessed_at = ?, access_count = access_count + 1
    WHERE id = ?
  `).run(Date.now(), id);
}

/**
 * Get an archive by ID
 */
export function getArchive(db: Database.Database, id: number): StoredArchive | null {
  const row = db
    .prepare<[number], DbStoredArchiveRow>(`SELECT ${RECORD_COLUMNS}, container FROM archives WHERE id = ?`)
    .get(id);

  if (!row) return null;

  touchArchive(db, id);
  return rowToStored(row);
}

/**
 * Get an archive by name
 */
export function getArchiveByName(db: Database.Database, name: string): StoredArchive | null {
  const row = db
    .prepare<[string], DbStoredArchiveRow>(`SELECT ${RECORD_COLUMNS}, container FROM archives WHERE name = ?`)
    .get(name);

  if (!row) return null;

  touchArchive(db, row.id);
  return rowToStored(row);
}

/**
 * List archives, newest first, without their container bytes
 */
export function listArchives(db: Database.Database, input: ListArchivesInput = {}): ArchiveRecord[] {
  const rows = db
    .prepare<[number, number], DbArchiveRow>(`
      SELECT ${RECORD_COLUMNS}
      FROM archives
      ORDER BY created_at DESC, id DESC
      LIMIT ? OFFSET ?
    `)
    .all(input.limit ?? 50, input.offset ?? 0);

  return rows.map(rowToRecord);
}

/**
 * Delete an archive
 */
export function deleteArchive(db: Database.Database, id: number): boolean {
  const result = db.prepare<[number]>('DELETE FROM archives WHERE id = ?').run(id);
  return result.changes > 0;
}

/**
 * Totals across all archives
 */
export function getArchiveStats(db: Database.Database): ArchiveStats {
  const row = db
    .prepare<[], { total: number; original: number | null; stored: number | null }>(`
      SELECT COUNT(*) as total, SUM(original_size) as original, SUM(stored_size) as stored
      FROM archives
    `)
    .get();

  const total = row?.total ?? 0;
  const original = row?.original ?? 0;
  const stored = row?.stored ?? 0;

  return {
    total,
    totalOriginalBytes: original,
    totalStoredBytes: stored,
    overallRatio: stored > 0 ? original / stored : 0,
  };
}

/**
 * Sink that stores each write as a new archive under `name`
 */
export function archiveSink(db: Database.Database, name: string): ByteSink & { lastRecord(): ArchiveRecord | null } {
  let last: ArchiveRecord | null = null;
  return {
    name: `archive:${name}`,
    write: (bytes: Uint8Array) => {
      last = createArchive(db, name, bytes);
    },
    lastRecord: () => last,
  };
}

/**
 * Source reading the container bytes of a stored archive
 */
export function archiveSource(db: Database.Database, id: number): ByteSource {
  return {
    name: `archive:#${id}`,
    read: () => {
      const archive = getArchive(db, id);
      if (!archive) {
        throw new Error(`Archive #${id} not found`);
      }
      return archive.container;
    },
  };
}
