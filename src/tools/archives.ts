/**
 * huffman_archives - List, summarize or delete stored containers
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ArchiveRecord, ArchiveStats, ErrorInfo } from '../types.js';
import { deleteArchive, getArchiveStats, listArchives } from '../db/operations.js';

export const archivesInputSchema = z.object({
  action: z.enum(['list', 'stats', 'delete']).default('list'),
  id: z.number().int().positive().optional(),
  limit: z.number().int().min(1).max(500).optional(),
  offset: z.number().int().min(0).optional(),
});

export type ArchivesInput = z.infer<typeof archivesInputSchema>;

export interface ArchivesResult {
  success: boolean;
  archives?: ArchiveRecord[];
  stats?: ArchiveStats;
  deleted?: number;
  error?: ErrorInfo;
}

export function archives(db: Database.Database | null, input: ArchivesInput): ArchivesResult {
  if (!db) {
    return { success: false, error: { code: 'ARCHIVE_DISABLED', message: 'Archive storage is disabled' } };
  }

  switch (input.action) {
    case 'stats':
      return { success: true, stats: getArchiveStats(db) };

    case 'delete': {
      if (input.id === undefined) {
        return { success: false, error: { code: 'INVALID_INPUT', message: '"id" is required for delete' } };
      }
      if (!deleteArchive(db, input.id)) {
        return { success: false, error: { code: 'NOT_FOUND', message: `Archive #${input.id} not found` } };
      }
      return { success: true, deleted: input.id };
    }

    case 'list':
    default:
      return { success: true, archives: listArchives(db, { limit: input.limit, offset: input.offset }) };
  }
}

/**
 * Tool definition for MCP
 */
export const archivesToolDef = {
  name: 'huffman_archives',
  description: 'Manage stored Huffman containers: list them, show totals, or delete one by id.',
  inputSchema: {
    type: 'object',
    properties: {
      action: {
        type: 'string',
        enum: ['list', 'stats', 'delete'],
        description: 'What to do. Default: list',
      },
      id: {
        type: 'number',
        description: 'Archive id (required for delete).',
      },
      limit: {
        type: 'number',
        minimum: 1,
        maximum: 500,
        description: 'Maximum archives to list. Default: 50',
      },
      offset: {
        type: 'number',
        minimum: 0,
        description: 'Number of archives to skip when listing.',
      },
    },
  },
};
