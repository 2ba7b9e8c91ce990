#!/usr/bin/env node
/**
 * Huffpack MCP Server
 *
 * Exposes static Huffman compression, analysis and the container archive
 * as MCP tools over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { openArchiveDb } from './db/index.js';
import { loadConfig } from './config/index.js';
import {
  compressTool,
  compressToolDef,
  compressInputSchema,
  decompressTool,
  decompressToolDef,
  decompressInputSchema,
  analyzeTool,
  analyzeToolDef,
  analyzeInputSchema,
  archives,
  archivesToolDef,
  archivesInputSchema,
  config,
  configToolDef,
  configInputSchema,
} from './tools/index.js';

// Initialize config and archive
const appConfig = loadConfig();
const db = appConfig.archive_enabled ? openArchiveDb() : null;

function textResult(result: unknown, isError = false) {
  return {
    content: [
      {
        type: 'text' as const,
        text: typeof result === 'string' ? result : JSON.stringify(result, null, 2),
      },
    ],
    isError,
  };
}

// Create MCP server
const server = new Server(
  {
    name: 'huffpack',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      compressToolDef,
      decompressToolDef,
      analyzeToolDef,
      archivesToolDef,
      configToolDef,
    ],
  };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args = {} } = request.params;

  try {
    switch (name) {
      case 'huffman_compress': {
        const result = compressTool(db, compressInputSchema.parse(args));
        return textResult(result, !result.success);
      }

      case 'huffman_decompress': {
        const result = decompressTool(db, decompressInputSchema.parse(args));
        return textResult(result, !result.success);
      }

      case 'huffman_analyze': {
        const result = analyzeTool(analyzeInputSchema.parse(args));
        return textResult(result, !result.success);
      }

      case 'huffman_archives': {
        const result = archives(db, archivesInputSchema.parse(args));
        return textResult(result, !result.success);
      }

      case 'huffman_config': {
        return textResult(config(configInputSchema.parse(args)));
      }

      default:
        return textResult(`Unknown tool: ${name}`, true);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return textResult(`Error: ${errorMessage}`, true);
  }
});

function shutdown(code: number): void {
  db?.close();
  process.exit(code);
}

// Handle cleanup
process.on('SIGINT', () => shutdown(0));
process.on('SIGTERM', () => shutdown(0));

// Start the server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Huffpack MCP server running (archive ${db ? 'enabled' : 'disabled'})`);
}

process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  shutdown(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
});

main().catch((error) => {
  console.error('Failed to start server:', error);
  shutdown(1);
});
