/**
 * cdxj-zipnum - ZipNum sharding for sorted CDX/CDXJ indexes
 *
 * This module exports the build pipeline, its building blocks and the
 * client used to read a built index back.
 */

// Core types
export type {
  Chunk,
  CompressedChunk,
  AppendResult,
  IndexRecord,
  LocationRecord,
  BuildConfig,
  BuildOptions,
  InspectOptions,
  QueryOptions,
} from "./types/index.js";

// Build pipeline
export {
  build,
  buildZipNum,
  resolveBuildConfig,
  parseShardSize,
  type BuildResult,
  type RunOptions,
} from "./cli/commands/build.js";
export { extractKey, openInput, readLines, parseSize, isGzipPath } from "./cli/utils/parsers.js";
export { chunkLines, compressChunk, calculateChunkCount } from "./cli/utils/chunker.js";
export {
  ShardWriter,
  SHARD_EXTENSION,
  numberedShardName,
  shardNameFromPath,
  type PlacedChunk,
} from "./cli/utils/shard-writer.js";
export {
  IndexWriter,
  INDEX_BATCH_SIZE,
  formatIndexRecord,
  parseIndexLine,
  writeLocationFile,
  readIndexFile,
  readLocationFile,
} from "./cli/utils/indexer.js";

// Client runtime
export {
  ZipNumClient,
  createClient,
  type ClientOptions,
  type ClientQueryOptions,
} from "./client/index.js";
