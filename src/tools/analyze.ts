/**
 * huffman_analyze - Show the code table and size estimate for an input
 */

import type { ErrorInfo } from '../types.js';
import { analyze, InvalidInputError } from '../huffman/index.js';
import type { CompressionAnalysis } from '../huffman/index.js';
import { getConfig } from '../config/index.js';
import { bytesInputSchema, inputToBytes, toErrorInfo } from './input.js';
import type { BytesInput } from './input.js';

export const analyzeInputSchema = bytesInputSchema;

export interface AnalyzeResult {
  success: boolean;
  analysis?: CompressionAnalysis;
  error?: ErrorInfo;
}

export function analyzeTool(input: BytesInput): AnalyzeResult {
  const bytes = inputToBytes(input);
  const limit = getConfig().max_input_bytes;

  try {
    if (bytes.length > limit) {
      throw new InvalidInputError(`Input is ${bytes.length} bytes, limit is ${limit}`);
    }
    return { success: true, analysis: analyze(bytes) };
  } catch (error) {
    return { success: false, error: toErrorInfo(error) };
  }
}

/**
 * Tool definition for MCP
 */
export const analyzeToolDef = {
  name: 'huffman_analyze',
  description: 'Compute symbol frequencies, Huffman codes, entropy and the expected compressed size without storing anything.',
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Text to analyze (UTF-8 bytes).',
      },
      base64: {
        type: 'string',
        description: 'Raw bytes to analyze, base64 encoded.',
      },
    },
  },
};
