#!/usr/bin/env node
/**
 * Huffpack CLI
 *
 * Compress and decompress files, inspect code tables, and manage the archive.
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname, extname } from 'path';
import { fileURLToPath } from 'url';
import { analyze, isHuffmanError } from './huffman/index.js';
import type { CompressionAnalysis } from './huffman/index.js';
import {
  bytesEqual,
  compressTo,
  decompressTo,
  fileSink,
  fileSource,
  readLimited,
} from './io/index.js';
import type { TransferResult } from './io/index.js';
import {
  archiveSink,
  archiveSource,
  deleteArchive,
  getArchiveStats,
  listArchives,
  openArchiveDb,
} from './db/index.js';
import {
  loadConfig,
  getConfigForDisplay,
  resetConfig,
  updateConfig,
  validateConfig,
} from './config/index.js';
import type { HuffpackConfig } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Package info
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
);
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
    ? String(packageJson.version)
    : 'unknown';

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function success(message: string): void {
  log(`✓ ${message}`, 'green');
}

function info(message: string): void {
  log(`ℹ ${message}`, 'blue');
}

function warn(message: string): void {
  log(`⚠ ${message}`, 'yellow');
}

function error(message: string): void {
  log(`✗ ${message}`, 'red');
}

/**
 * Show help message
 */
function showHelp(): void {
  console.log(`
${colors.bright}huffpack${colors.reset} v${version}
Static Huffman compression

${colors.cyan}Usage:${colors.reset}
  huffpack <command> [options]

${colors.cyan}Commands:${colors.reset}
  encode <input> [output]     Compress a file (default output: <input>.huff)
  decode <input> [output]     Decompress a file (default output: <input> without .huff)
  roundtrip <input>           Write <input>.huff and <input>.decoded and compare
  stats <input>               Show frequencies, codes and size estimate
  archive <action>            Manage stored containers
  config                      Manage configuration
  version                     Show version
  help                        Show this help

${colors.cyan}Archive Actions:${colors.reset}
  list                        List stored containers
  stats                       Show archive totals
  add <file> [--name <n>]     Compress a file into the archive
  extract <id> <output>       Decompress an archived container to a file
  delete <id>                 Delete an archived container

${colors.cyan}Config Options:${colors.reset}
  --show                      Show current configuration
  --set <key>=<value>         Set max_input_bytes, verify_roundtrip, archive_enabled or output_extension
  --reset                     Restore defaults

${colors.cyan}Examples:${colors.reset}
  huffpack encode notes.txt
  huffpack decode notes.txt.huff restored.txt
  huffpack stats notes.txt
  huffpack archive add notes.txt --name notes
  huffpack config --set verify_roundtrip=true
`);
}

function getFlag(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

function reportTransfer(result: TransferResult, action: string, output: string): boolean {
  if (!result.success) {
    error(`${action} failed: [${result.error?.code}] ${result.error?.message}`);
    return false;
  }
  const ratio = result.bytesOut > 0 ? (result.bytesIn / result.bytesOut).toFixed(2) : '-';
  success(`${action}: ${result.bytesIn} → ${result.bytesOut} bytes (ratio ${ratio}) → ${output}`);
  return true;
}

function requireInput(path: string | undefined, usage: string): string | null {
  if (!path) {
    error(`Usage: ${usage}`);
    return null;
  }
  if (!existsSync(path)) {
    error(`File not found: ${path}`);
    return null;
  }
  return path;
}

/**
 * Compress a file
 */
function encodeFile(args: string[], config: HuffpackConfig): boolean {
  const input = requireInput(args[0], 'huffpack encode <input> [output]');
  if (!input) return false;

  const output = args[1] ?? `${input}${config.output_extension}`;
  const result = compressTo(fileSource(input), fileSink(output), {
    maxInputBytes: config.max_input_bytes,
    verify: config.verify_roundtrip,
  });
  return reportTransfer(result, 'Encoded', output);
}

/**
 * Decompress a file
 */
function decodeFile(args: string[], config: HuffpackConfig): boolean {
  const input = requireInput(args[0], 'huffpack decode <input> [output]');
  if (!input) return false;

  let output = args[1];
  if (!output) {
    output = extname(input) === config.output_extension
      ? input.slice(0, -config.output_extension.length)
      : `${input}.out`;
  }
  if (!args[1] && existsSync(output)) {
    error(`Refusing to overwrite ${output}; pass an output path`);
    return false;
  }

  const result = decompressTo(fileSource(input), fileSink(output), {
    maxInputBytes: config.max_input_bytes,
  });
  return reportTransfer(result, 'Decoded', output);
}

/**
 * Encode, decode and compare a file
 */
function roundtrip(args: string[], config: HuffpackConfig): boolean {
  const input = requireInput(args[0], 'huffpack roundtrip <input>');
  if (!input) return false;

  const encodedPath = `${input}${config.output_extension}`;
  const decodedPath = `${input}.decoded`;

  const encoded = compressTo(fileSource(input), fileSink(encodedPath), {
    maxInputBytes: config.max_input_bytes,
  });
  if (!reportTransfer(encoded, 'Encoded', encodedPath)) return false;

  const decoded = decompressTo(fileSource(encodedPath), fileSink(decodedPath));
  if (!reportTransfer(decoded, 'Decoded', decodedPath)) return false;

  if (!bytesEqual(fileSource(input).read(), fileSource(decodedPath).read())) {
    error('Decoded output differs from the input');
    return false;
  }
  success('Round trip matches the input');
  return true;
}

function describeSymbol(symbol: number): string {
  if (symbol >= 0x21 && symbol <= 0x7e) return `'${String.fromCharCode(symbol)}'`;
  return `0x${symbol.toString(16).padStart(2, '0')}`;
}

function printAnalysis(name: string, analysis: CompressionAnalysis): void {
  log(`\n📊 ${name}\n`, 'bright');
  log(`  Input:            ${analysis.inputBytes} bytes`);
  log(`  Distinct symbols: ${analysis.distinctSymbols}`);
  log(`  Encoded payload:  ${analysis.encodedBits} bits`);
  log(`  Container:        ${analysis.containerBytes} bytes`);
  log(`  Ratio:            ${analysis.compressionRatio.toFixed(3)}`);
  log(`  Avg code length:  ${analysis.averageCodeLength.toFixed(3)} bits/symbol`);
  log(`  Entropy:          ${analysis.entropy.toFixed(3)} bits/symbol`);

  if (analysis.codes.length === 0) {
    log('');
    return;
  }

  log('\n  Codes:', 'cyan');
  for (const entry of analysis.codes.slice(0, 32)) {
    log(`    ${describeSymbol(entry.symbol).padEnd(6)} ${String(entry.frequency).padStart(10)}  ${entry.code}`);
  }
  if (analysis.codes.length > 32) {
    log(`    ... and ${analysis.codes.length - 32} more`);
  }
  log('');
}

/**
 * Show code table and size estimate
 */
function stats(args: string[], config: HuffpackConfig): boolean {
  const input = requireInput(args[0], 'huffpack stats <input>');
  if (!input) return false;

  const bytes = readLimited(fileSource(input), config.max_input_bytes);
  printAnalysis(input, analyze(bytes));
  return true;
}

/**
 * Manage the archive
 */
function archive(args: string[], config: HuffpackConfig): boolean {
  if (!config.archive_enabled) {
    warn('Archive storage is disabled. Enable it with: huffpack config --set archive_enabled=true');
    return false;
  }

  const action = args[0] ?? 'list';
  const db = openArchiveDb();

  try {
    switch (action) {
      case 'list': {
        const records = listArchives(db, { limit: Number(getFlag(args, '--limit') ?? 50) });
        if (records.length === 0) {
          info('Archive is empty');
          return true;
        }
        for (const record of records) {
          const created = new Date(record.createdAt).toISOString();
          log(`  #${record.id} ${record.name}  ${record.originalSize} → ${record.storedSize} bytes  ${created}`);
        }
        return true;
      }

      case 'stats': {
        const totals = getArchiveStats(db);
        log('\n📦 Archive\n', 'bright');
        log(`  Containers:     ${totals.total}`);
        log(`  Original bytes: ${totals.totalOriginalBytes}`);
        log(`  Stored bytes:   ${totals.totalStoredBytes}`);
        log(`  Overall ratio:  ${totals.overallRatio.toFixed(3)}\n`);
        return true;
      }

      case 'add': {
        const input = requireInput(args[1], 'huffpack archive add <file> [--name <n>]');
        if (!input) return false;
        const name = getFlag(args, '--name') ?? input;
        const sink = archiveSink(db, name);
        const result = compressTo(fileSource(input), sink, {
          maxInputBytes: config.max_input_bytes,
          verify: config.verify_roundtrip,
        });
        const record = sink.lastRecord();
        return reportTransfer(result, 'Archived', record ? `#${record.id} ${record.name}` : sink.name);
      }

      case 'extract': {
        const id = Number(args[1]);
        const output = args[2];
        if (!Number.isInteger(id) || !output) {
          error('Usage: huffpack archive extract <id> <output>');
          return false;
        }
        const result = decompressTo(archiveSource(db, id), fileSink(output));
        return reportTransfer(result, 'Extracted', output);
      }

      case 'delete': {
        const id = Number(args[1]);
        if (!Number.isInteger(id)) {
          error('Usage: huffpack archive delete <id>');
          return false;
        }
        if (!deleteArchive(db, id)) {
          error(`Archive #${id} not found`);
          return false;
        }
        success(`Deleted archive #${id}`);
        return true;
      }

      default:
        error(`Unknown archive action: ${action}`);
        return false;
    }
  } finally {
    db.close();
  }
}

function parseSetting(assignment: string): Partial<HuffpackConfig> | null {
  const [key, value] = assignment.split('=', 2);
  if (value === undefined) return null;

  switch (key) {
    case 'max_input_bytes': {
      const n = Number(value);
      return Number.isSafeInteger(n) && n > 0 ? { max_input_bytes: n } : null;
    }
    case 'verify_roundtrip':
      if (value !== 'true' && value !== 'false') return null;
      return { verify_roundtrip: value === 'true' };
    case 'archive_enabled':
      if (value !== 'true' && value !== 'false') return null;
      return { archive_enabled: value === 'true' };
    case 'output_extension':
      return /^\.[A-Za-z0-9._-]+$/.test(value) ? { output_extension: value } : null;
    default:
      return null;
  }
}

/**
 * Manage configuration
 */
function configCommand(args: string[]): boolean {
  if (args.includes('--reset')) {
    resetConfig();
    success('Configuration reset to defaults');
    return true;
  }

  const assignment = getFlag(args, '--set');
  if (assignment !== undefined) {
    const update = parseSetting(assignment);
    if (!update) {
      error(`Invalid setting: ${assignment}`);
      return false;
    }
    updateConfig(update);
    success(`Updated ${Object.keys(update).join(', ')}`);
  }

  log('\n⚙️  Configuration\n', 'bright');
  for (const [key, value] of Object.entries(getConfigForDisplay())) {
    log(`  ${key}: ${String(value)}`);
  }
  for (const issue of validateConfig().issues) {
    warn(issue);
  }
  log('');
  return true;
}

/**
 * Main CLI entry point
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);
  const config = loadConfig();

  let ok = true;
  try {
    switch (command) {
      case 'encode':
        ok = encodeFile(rest, config);
        break;
      case 'decode':
        ok = decodeFile(rest, config);
        break;
      case 'roundtrip':
        ok = roundtrip(rest, config);
        break;
      case 'stats':
        ok = stats(rest, config);
        break;
      case 'archive':
        ok = archive(rest, config);
        break;
      case 'config':
        ok = configCommand(rest);
        break;
      case 'version':
      case '--version':
      case '-v':
        console.log(version);
        break;
      case 'help':
      case '--help':
      case '-h':
      case undefined:
        showHelp();
        break;
      default:
        error(`Unknown command: ${command}`);
        showHelp();
        ok = false;
    }
  } catch (err) {
    if (isHuffmanError(err)) {
      error(`[${err.code}] ${err.message}`);
    } else {
      error(`${command} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    ok = false;
  }

  process.exitCode = ok ? 0 : 1;
}

main();
