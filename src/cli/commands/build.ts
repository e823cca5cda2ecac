/**
 * Build command - stream a sorted CDX/CDXJ input into ZipNum shards,
 * an index file and a location file
 */

import * as fs from "node:fs";
import * as path from "node:path";
import cliProgress from "cli-progress";
import type { BuildConfig, BuildOptions, LocationRecord } from "../../types/index.js";
import { extractKey, openInput, parseSize, readLines } from "../utils/parsers.js";
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_COMPRESS_LEVEL,
  assertChunkSize,
  assertCompressLevel,
  chunkLines,
  compressChunk,
} from "../utils/chunker.js";
import { ShardWriter } from "../utils/shard-writer.js";
import { IndexWriter, writeLocationFile } from "../utils/indexer.js";

export const DEFAULT_SHARD_SIZE = "100mb";
const DEFAULT_BASE = "zipnum-output";

// Update the progress bar every N lines
const PROGRESS_INTERVAL = 1000;

export interface BuildResult {
  config: BuildConfig;
  shardPaths: string[];
  locations: LocationRecord[];
  idxPath: string;
  locPath: string;
  chunkCount: number;
  lineCount: number;
}

export interface RunOptions {
  /** Show a progress bar while reading a named input file */
  showProgress?: boolean;
  /** Suppress console output */
  quiet?: boolean;
}

/**
 * Parse an integer option, rejecting anything that is not a plain integer
 */
function parseInteger(value: string, label: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Parse a shard size. A bare number is megabytes; suffixed values
 * ("512kb", "1gb") go through parseSize.
 */
export function parseShardSize(value: string): number {
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return parseSize(`${trimmed}mb`);
  }
  return parseSize(trimmed);
}

/**
 * Turn CLI options into a validated build configuration.
 * Throws before anything is written when an option is invalid.
 */
export function resolveBuildConfig(options: BuildOptions): BuildConfig {
  if (!options.input) {
    throw new Error("An input path (or '-' for stdin) is required");
  }
  if (!options.output) {
    throw new Error("An output directory is required");
  }

  const chunkSize =
    options.chunkSize !== undefined
      ? parseInteger(options.chunkSize, "chunk size")
      : DEFAULT_CHUNK_SIZE;
  assertChunkSize(chunkSize);

  const compressLevel =
    options.compressLevel !== undefined
      ? parseInteger(options.compressLevel, "compression level")
      : DEFAULT_COMPRESS_LEVEL;
  assertCompressLevel(compressLevel);

  // Validate the size string even when a single shard is forced
  const shardSize = parseShardSize(options.shardSize ?? DEFAULT_SHARD_SIZE);

  const outputDir = path.resolve(options.output);
  const base = options.base || path.basename(outputDir) || DEFAULT_BASE;

  return {
    input: options.input,
    outputDir,
    shardSize: options.singleShard ? Infinity : shardSize,
    chunkSize,
    compressLevel,
    base,
    idxFile: options.idxFile || `${base}.idx`,
    locFile: options.locFile || `${base}.loc`,
  };
}

/**
 * Run the sharding pipeline for a resolved configuration
 */
export async function buildZipNum(
  config: BuildConfig,
  options: RunOptions = {}
): Promise<BuildResult> {
  const log = (message: string): void => {
    if (!options.quiet) console.log(message);
  };

  const idxPath = path.join(config.outputDir, config.idxFile);
  const locPath = path.join(config.outputDir, config.locFile);
  const shards = new ShardWriter({
    outputDir: config.outputDir,
    base: config.base,
    threshold: config.shardSize,
  });
  const source = openInput(config.input);

  let progressBar: cliProgress.SingleBar | null = null;
  let index: IndexWriter | null = null;
  let chunkCount = 0;
  let lineCount = 0;
  let shardPaths: string[] = [];

  try {
    await fs.promises.mkdir(config.outputDir, { recursive: true });
    await shards.open();
    index = await IndexWriter.open(idxPath);

    if (options.showProgress && !options.quiet && source.size !== null) {
      progressBar = new cliProgress.SingleBar({
        format: '  Processing |{bar}| {percentage}% | {value}/{total} MB | {lines} lines | {shards} shard(s)',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
      }, cliProgress.Presets.shades_classic);
      progressBar.start(toMegabytes(source.size), 0, { lines: 0, shards: 1 });
    }

    let nextProgress = PROGRESS_INTERVAL;

    for await (const chunk of chunkLines(readLines(source.stream), config.chunkSize)) {
      const compressed = compressChunk(chunk, config.compressLevel);
      const placed = await shards.append(compressed.data);

      await index.add({
        key: extractKey(chunk.lines[0]),
        shard: placed.shard,
        offset: placed.offset,
        length: placed.length,
        shardNumber: placed.shardNumber + 1,
      });

      // Keep the index on disk in step with closed shards
      if (placed.rolledOver) {
        await index.flush();
      }

      chunkCount++;
      lineCount += chunk.lines.length;

      if (progressBar && lineCount >= nextProgress) {
        progressBar.update(toMegabytes(source.bytesRead()), {
          lines: lineCount.toLocaleString(),
          shards: shards.shardNumber + 1,
        });
        nextProgress = lineCount + PROGRESS_INTERVAL;
      }
    }

    await index.close();
    shardPaths = await shards.finalize();

    if (progressBar && source.size !== null) {
      progressBar.update(toMegabytes(source.size), {
        lines: lineCount.toLocaleString(),
        shards: shardPaths.length,
      });
    }
  } finally {
    progressBar?.stop();
    source.close();
    await index?.dispose();
    await shards.close();
  }

  const locations = await writeLocationFile(locPath, shardPaths);

  log(`Processed ${lineCount.toLocaleString()} lines into ${chunkCount.toLocaleString()} chunks`);

  return {
    config,
    shardPaths,
    locations,
    idxPath,
    locPath,
    chunkCount,
    lineCount,
  };
}

/**
 * CLI entry for the build command
 */
export async function build(options: BuildOptions): Promise<BuildResult> {
  const startTime = Date.now();
  const config = resolveBuildConfig(options);
  const log = (message: string): void => {
    if (!options.quiet) console.log(message);
  };

  log(`Input: ${config.input === "-" ? "(stdin)" : config.input}`);
  log(`Output: ${config.outputDir}`);
  log(
    `Shard size: ${Number.isFinite(config.shardSize) ? formatBytes(config.shardSize) : "single shard"}` +
      `, chunk size: ${config.chunkSize.toLocaleString()} lines, compression level: ${config.compressLevel}`
  );

  const result = await buildZipNum(config, {
    showProgress: options.progress ?? false,
    quiet: options.quiet,
  });

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  log(`Build completed in ${elapsed}s`);
  log(
    `Finished. Wrote ${result.shardPaths.length} shard file(s), index: ${result.idxPath}, loc: ${result.locPath}`
  );

  return result;
}

function toMegabytes(bytes: number): number {
  return Math.round(bytes / (1024 * 1024));
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}
