/**
 * Huffman Error Types
 *
 * Every failure the codec can report maps to one code, so callers can
 * branch on `error.code` without parsing messages.
 */

export type HuffmanErrorCode =
  | 'INVALID_INPUT'
  | 'UNKNOWN_SYMBOL'
  | 'CORRUPT_STREAM'
  | 'MALFORMED_CONTAINER';

export class HuffmanError extends Error {
  public readonly code: HuffmanErrorCode;

  /**
   * Offsets, counts and symbols relevant to the failure
   */
  public readonly details?: Record<string, unknown>;

  constructor(code: HuffmanErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HuffmanError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Empty frequency table, out-of-range symbol or frequency, oversized input
 */
export class InvalidInputError extends HuffmanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
    this.name = 'InvalidInputError';
  }
}

/**
 * Encoder met a symbol with no entry in the code table
 */
export class UnknownSymbolError extends HuffmanError {
  constructor(symbol: number, position: number) {
    super('UNKNOWN_SYMBOL', `No code for symbol 0x${symbol.toString(16).padStart(2, '0')} at offset ${position}`, {
      symbol,
      position,
    });
    this.name = 'UnknownSymbolError';
  }
}

/**
 * Decoder walked into a missing child or ran out of bits mid-code
 */
export class CorruptStreamError extends HuffmanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CORRUPT_STREAM', message, details);
    this.name = 'CorruptStreamError';
  }
}

/**
 * Container header fields disagree with each other or with the bytes available
 */
export class MalformedContainerError extends HuffmanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_CONTAINER', message, details);
    this.name = 'MalformedContainerError';
  }
}

/**
 * Check if an error is a HuffmanError
 */
export function isHuffmanError(error: unknown): error is HuffmanError {
  return error instanceof HuffmanError;
}
