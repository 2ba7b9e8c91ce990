/**
 * MCP Tools Module
 */

export { compressTool, compressToolDef, compressInputSchema, type CompressResult } from './compress.js';
export { decompressTool, decompressToolDef, decompressInputSchema, type DecompressResult } from './decompress.js';
export { analyzeTool, analyzeToolDef, analyzeInputSchema, type AnalyzeResult } from './analyze.js';
export { archives, archivesToolDef, archivesInputSchema, type ArchivesResult } from './archives.js';
export { config, configToolDef, configInputSchema, type ConfigResult } from './config.js';
