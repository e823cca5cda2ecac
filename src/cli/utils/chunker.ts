/**
 * Chunking logic: groups input lines into fixed-size chunks and compresses
 * each chunk as its own gzip member
 */

import { gzipSync } from "node:zlib";
import type { Chunk, CompressedChunk } from "../../types/index.js";

export const DEFAULT_CHUNK_SIZE = 3000;
export const DEFAULT_COMPRESS_LEVEL = 6;

/**
 * Validate a lines-per-chunk value
 */
export function assertChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new Error(`Invalid chunk size: ${chunkSize}. Must be a positive integer`);
  }
}

/**
 * Validate a gzip compression level
 */
export function assertCompressLevel(level: number): void {
  if (!Number.isInteger(level) || level < 1 || level > 9) {
    throw new Error(`Invalid compression level: ${level}. Must be an integer from 1 to 9`);
  }
}

/**
 * Group lines into chunks of chunkSize lines, in arrival order.
 * Only the chunk being filled is held in memory.
 */
export async function* chunkLines(
  lines: AsyncIterable<Buffer> | Iterable<Buffer>,
  chunkSize: number
): AsyncGenerator<Chunk> {
  assertChunkSize(chunkSize);

  let current: Buffer[] = [];
  let index = 0;

  for await (const line of lines) {
    current.push(line);

    if (current.length >= chunkSize) {
      yield { index, lines: current };
      index++;
      current = [];
    }
  }

  // Don't forget the last partial chunk
  if (current.length > 0) {
    yield { index, lines: current };
  }
}

/**
 * Compress a whole chunk into one independent gzip member
 */
export function compressChunk(
  chunk: Chunk,
  level: number = DEFAULT_COMPRESS_LEVEL
): CompressedChunk {
  assertCompressLevel(level);

  const data = gzipSync(Buffer.concat(chunk.lines), { level });
  return { data, length: data.length };
}

/**
 * Number of chunks a given line count produces
 */
export function calculateChunkCount(totalLines: number, chunkSize: number): number {
  assertChunkSize(chunkSize);
  return Math.ceil(totalLines / chunkSize);
}

/**
 * Rough shard count for a compressed size estimate; at least one shard
 * always exists
 */
export function calculateShardCount(compressedBytes: number, shardSize: number): number {
  if (!Number.isFinite(shardSize)) return 1;
  return Math.max(1, Math.ceil(compressedBytes / shardSize));
}
