/**
 * Core type definitions for cdxj-zipnum
 */

// Pipeline types
export interface Chunk {
  index: number;
  lines: Buffer[];
}

export interface CompressedChunk {
  data: Buffer;
  length: number;
}

export interface AppendResult {
  offset: number;
  length: number;
  shardNumber: number; // 0-based
}

// Output record types
export interface IndexRecord {
  key: string;
  shard: string; // shard name without extension
  offset: number;
  length: number;
  shardNumber: number; // 1-based
}

export interface LocationRecord {
  shard: string;
  path: string;
}

// Build configuration
export interface BuildConfig {
  input: string; // path, or "-" for stdin
  outputDir: string;
  shardSize: number; // target bytes per shard, Infinity for a single shard
  chunkSize: number; // lines per chunk
  compressLevel: number;
  base: string;
  idxFile: string;
  locFile: string;
}

// CLI options
export interface BuildOptions {
  input: string;
  output: string;
  shardSize?: string;
  singleShard?: boolean;
  chunkSize?: string;
  compressLevel?: string;
  base?: string;
  idxFile?: string;
  locFile?: string;
  progress?: boolean;
  quiet?: boolean;
}

export interface InspectOptions {
  sample?: number;
  fast?: boolean;
}

export interface QueryOptions {
  base?: string;
  idxFile?: string;
  locFile?: string;
  limit?: number;
}
