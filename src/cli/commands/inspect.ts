/**
 * Inspect command - analyze a CDX/CDXJ input and guide through build setup
 * Interactive wizard for chunk size, shard size and compression level
 */

import * as fs from "node:fs";
import { gzipSync } from "node:zlib";
import { confirm, input, select } from "@inquirer/prompts";
import type { InspectOptions } from "../../types/index.js";
import { extractKey, getFileSize, parseSize, sampleInput } from "../utils/parsers.js";
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_COMPRESS_LEVEL,
  calculateChunkCount,
  calculateShardCount,
} from "../utils/chunker.js";
import { build, DEFAULT_SHARD_SIZE, formatBytes } from "./build.js";

export interface InputProfile {
  totalLines: number;
  isEstimated: boolean;
  sampleLines: number;
  averageLineSize: number;
  distinctKeys: number;
  sortedSample: boolean;
  /** Compressed/uncompressed ratio of the sample at the default level */
  compressionRatio: number;
}

/**
 * Summarize a sample of input lines
 */
export function profileSample(
  sample: Buffer[],
  totalLines: number,
  isEstimated: boolean
): InputProfile {
  const raw = Buffer.concat(sample);
  const keys = sample.map((line) => extractKey(line));

  let sortedSample = true;
  for (let i = 1; i < keys.length; i++) {
    if (keys[i] < keys[i - 1]) {
      sortedSample = false;
      break;
    }
  }

  const compressed = raw.length > 0 ? gzipSync(raw, { level: DEFAULT_COMPRESS_LEVEL }).length : 0;

  return {
    totalLines,
    isEstimated,
    sampleLines: sample.length,
    averageLineSize: sample.length > 0 ? raw.length / sample.length : 0,
    distinctKeys: new Set(keys).size,
    sortedSample,
    compressionRatio: raw.length > 0 ? compressed / raw.length : 0,
  };
}

export async function inspect(
  inputFile: string,
  options: InspectOptions
): Promise<void> {
  // Validate input file exists
  if (!fs.existsSync(inputFile)) {
    throw new Error(`Input file not found: ${inputFile}`);
  }

  const fileSize = getFileSize(inputFile);
  const sampleSize = options.sample || 1000;
  console.log(`\nFile: ${inputFile}`);
  console.log(`Size: ${formatBytes(fileSize)}`);

  if (options.fast) {
    console.log("Fast mode: sampling lines (count will be estimated)...");
  } else {
    console.log("Reading all lines (use --fast to estimate count instead)...");
  }

  const result = await sampleInput(inputFile, sampleSize, options.fast ?? false);
  const totalLines = result.estimatedCount ?? result.count;

  if (result.sample.length === 0) {
    console.log("\nNo lines found.");
    return;
  }

  const profile = profileSample(result.sample, totalLines, options.fast ?? false);

  console.log("\n" + "=".repeat(60));
  console.log("INPUT");
  console.log("=".repeat(60));

  console.log(`\n${profile.isEstimated ? "Estimated lines: ~" : "Total lines: "}${totalLines.toLocaleString()}`);
  console.log(`Average line size: ${formatBytes(profile.averageLineSize)}`);
  console.log(`Distinct keys in sample: ${profile.distinctKeys.toLocaleString()} of ${profile.sampleLines.toLocaleString()}`);
  if (!profile.sortedSample) {
    console.log("Warning: sample is not sorted by key. Sort the input before building.");
  }

  console.log("\nFirst keys:");
  for (const line of result.sample.slice(0, 3)) {
    console.log(`  ${extractKey(line)}`);
  }

  // Size estimates for the defaults
  const estimatedCompressed = totalLines * profile.averageLineSize * profile.compressionRatio;
  const defaultShardSize = parseSize(DEFAULT_SHARD_SIZE);

  console.log("\n" + "=".repeat(60));
  console.log("SIZE ESTIMATES");
  console.log("=".repeat(60));

  console.log(`\nCompressed size: ~${formatBytes(estimatedCompressed)}`);
  console.log(`With ${DEFAULT_CHUNK_SIZE} lines per chunk: ~${calculateChunkCount(totalLines, DEFAULT_CHUNK_SIZE).toLocaleString()} chunks`);
  console.log(`With ${DEFAULT_SHARD_SIZE} shards: ~${calculateShardCount(estimatedCompressed, defaultShardSize)} shard(s)`);

  // Interactive wizard
  console.log("\n" + "=".repeat(60));
  console.log("BUILD CONFIGURATION");
  console.log("=".repeat(60));

  // 1. Output directory
  const outputDir = await input({
    message: "Output directory:",
    default: "./output",
  });

  // 2. Chunk size
  const chunkSizeAnswer = await select({
    message: "Lines per chunk:",
    choices: [
      { name: "1000 (smaller blocks, faster lookups)", value: "1000" },
      { name: "3000 (balanced) - recommended", value: "3000" },
      { name: "5000 (fewer index records)", value: "5000" },
      { name: "Custom", value: "custom" },
    ],
    default: String(DEFAULT_CHUNK_SIZE),
  });

  let chunkSize: string = chunkSizeAnswer;
  if (chunkSizeAnswer === "custom") {
    chunkSize = await input({
      message: "Enter lines per chunk:",
      default: String(DEFAULT_CHUNK_SIZE),
      validate: (value) => (/^\d+$/.test(value.trim()) && parseInt(value, 10) > 0) || "Enter a positive integer",
    });
  }

  // 3. Shard size
  const shardSizeAnswer = await select({
    message: "Target shard size:",
    choices: [
      { name: "50 MB", value: "50mb" },
      { name: "100 MB - recommended", value: "100mb" },
      { name: "200 MB", value: "200mb" },
      { name: "Single shard", value: "single" },
      { name: "Custom", value: "custom" },
    ],
    default: DEFAULT_SHARD_SIZE,
  });

  let shardSize: string = shardSizeAnswer;
  if (shardSizeAnswer === "custom") {
    shardSize = await input({
      message: "Enter shard size (e.g., 500mb, 1gb):",
      default: DEFAULT_SHARD_SIZE,
    });
  }
  const singleShard = shardSizeAnswer === "single";

  // 4. Compression level
  const compressLevel = await select({
    message: "Compression level:",
    choices: [
      { name: "1 (fastest, largest)", value: "1" },
      { name: "6 (balanced) - recommended", value: "6" },
      { name: "9 (slowest, smallest)", value: "9" },
    ],
    default: String(DEFAULT_COMPRESS_LEVEL),
  });

  // Summary
  console.log("\n" + "=".repeat(60));
  console.log("CONFIGURATION SUMMARY");
  console.log("=".repeat(60));

  console.log(`\nInput: ${inputFile}`);
  console.log(`Output: ${outputDir}`);
  console.log(`Chunk size: ${chunkSize} lines`);
  console.log(`Shard size: ${singleShard ? "(single shard)" : shardSize}`);
  console.log(`Compression level: ${compressLevel}`);

  // Build command for reference
  let cmd = `npx cdxj-zipnum build -i "${inputFile}" -o "${outputDir}" -c ${chunkSize} --compress-level ${compressLevel}`;
  cmd += singleShard ? " --single-shard" : ` -s ${shardSize}`;

  console.log(`\nEquivalent command:\n  ${cmd}`);

  // 5. Run build?
  const runBuild = await confirm({
    message: "Run build now?",
    default: true,
  });

  if (runBuild) {
    console.log("\n");
    await build({
      input: inputFile,
      output: outputDir,
      chunkSize,
      shardSize: singleShard ? undefined : shardSize,
      singleShard,
      compressLevel,
      progress: process.stdout.isTTY,
    });
  } else {
    console.log("\nBuild skipped. Run the command above when ready.\n");
  }
}
