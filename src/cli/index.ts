#!/usr/bin/env node

/**
 * cdxj-zipnum CLI
 */

import { Command } from "commander";
import { build } from "./commands/build.js";
import { inspect } from "./commands/inspect.js";
import { query } from "./commands/query.js";

const program = new Command();

program
  .name("cdxj-zipnum")
  .description("Build ZipNum shards, index and location files from a sorted CDX/CDXJ input")
  .version("0.1.0");

program
  .command("build")
  .description("Shard a sorted CDX/CDXJ file (or stdin) into gzip blocks with an index")
  .requiredOption("-i, --input <path>", "Input CDX/CDXJ file (plain or .gz), or '-' for stdin")
  .requiredOption("-o, --output <dir>", "Output directory for shards, idx and loc")
  .option("-s, --shard-size <size>", "Target shard size in MB, or with a unit (e.g., 200, 512kb, 1gb)", "100mb")
  .option("--single-shard", "Create a single shard file regardless of size")
  .option("-c, --chunk-size <lines>", "Lines per chunk", "3000")
  .option("--compress-level <level>", "Gzip compression level 1-9", "6")
  .option("--base <name>", "Base name for output files (default: output directory name)")
  .option("--idx-file <name>", "Custom index filename (written inside the output directory)")
  .option("--loc-file <name>", "Custom location filename (written inside the output directory)")
  .option("--no-progress", "Disable the progress bar")
  .action(async (options) => {
    try {
      await build({
        input: options.input,
        output: options.output,
        shardSize: options.shardSize,
        singleShard: options.singleShard,
        chunkSize: options.chunkSize,
        compressLevel: options.compressLevel,
        base: options.base,
        idxFile: options.idxFile,
        locFile: options.locFile,
        progress: options.progress && process.stderr.isTTY,
      });
    } catch (error) {
      console.error("Error:", (error as Error).message);
      process.exit(1);
    }
  });

program
  .command("inspect")
  .description("Analyze a CDX/CDXJ file and suggest build settings")
  .argument("<input>", "Input CDX/CDXJ file (plain or .gz)")
  .option("-n, --sample <count>", "Number of lines to sample", "1000")
  .option("--fast", "Fast mode: estimate line count instead of reading entire file")
  .action(async (input, options) => {
    try {
      await inspect(input, {
        sample: parseInt(options.sample, 10),
        fast: options.fast,
      });
    } catch (error) {
      console.error("Error:", (error as Error).message);
      process.exit(1);
    }
  });

program
  .command("query")
  .description("Print lines whose key starts with a prefix")
  .argument("<dir>", "Output directory of a previous build")
  .argument("<prefix>", "Key prefix to look up")
  .option("--base <name>", "Base name used at build time")
  .option("--idx-file <name>", "Custom index filename")
  .option("--loc-file <name>", "Custom location filename")
  .option("-l, --limit <count>", "Maximum number of lines to print")
  .action(async (dir, prefix, options) => {
    try {
      await query(dir, prefix, {
        base: options.base,
        idxFile: options.idxFile,
        locFile: options.locFile,
        limit: options.limit !== undefined ? parseInt(options.limit, 10) : undefined,
      });
    } catch (error) {
      console.error("Error:", (error as Error).message);
      process.exit(1);
    }
  });

program.parse();
