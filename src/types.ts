// Configuration
export interface HuffpackConfig {
  max_input_bytes: number;
  verify_roundtrip: boolean;
  archive_enabled: boolean;
  output_extension: string;
}

export const DEFAULT_CONFIG: HuffpackConfig = {
  max_input_bytes: 64 * 1024 * 1024,
  verify_roundtrip: false,
  archive_enabled: true,
  output_extension: '.huff',
};

// Archive storage
export interface ArchiveRecord {
  id: number;
  name: string;
  originalSize: number;     // sum of header frequencies
  storedSize: number;       // container bytes
  distinctSymbols: number;
  bitLength: number;
  createdAt: number;
  accessedAt: number;
  accessCount: number;
}

export interface StoredArchive extends ArchiveRecord {
  container: Uint8Array;
}

export interface ArchiveStats {
  total: number;
  totalOriginalBytes: number;
  totalStoredBytes: number;
  overallRatio: number;
}

// Byte collaborators at the codec boundary
export interface ByteSource {
  readonly name: string;
  read(): Uint8Array;
}

export interface ByteSink {
  readonly name: string;
  write(bytes: Uint8Array): void;
}

// Serialized error for tool and transfer results
export interface ErrorInfo {
  code: string;
  message: string;
}
