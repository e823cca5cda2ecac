/**
 * Shard file management: appends compressed chunks to the open shard and
 * rolls over to a new numbered shard once the size threshold is reached
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { FileHandle } from "node:fs/promises";
import type { AppendResult } from "../../types/index.js";

export const SHARD_EXTENSION = ".cdx.gz";

export interface ShardWriterOptions {
  outputDir: string;
  base: string;
  /** Target bytes per shard. Infinity keeps everything in one shard. */
  threshold: number;
}

export interface PlacedChunk extends AppendResult {
  /** Shard name (without extension) the chunk was written to */
  shard: string;
  /** Whether this append closed the shard and opened the next one */
  rolledOver: boolean;
}

/**
 * Numbered shard name for a 0-based shard number, e.g. "base-01"
 */
export function numberedShardName(base: string, shardNumber: number): string {
  return `${base}-${String(shardNumber + 1).padStart(2, "0")}`;
}

/**
 * Shard file basename without its extension
 */
export function shardNameFromPath(filePath: string): string {
  const basename = path.basename(filePath);
  return basename.endsWith(SHARD_EXTENSION)
    ? basename.slice(0, -SHARD_EXTENSION.length)
    : basename;
}

export class ShardWriter {
  private readonly outputDir: string;
  private readonly base: string;
  private readonly threshold: number;
  private readonly paths: string[] = [];
  private handle: FileHandle | null = null;
  private currentShard = 0;
  private currentOffset = 0;

  constructor(options: ShardWriterOptions) {
    if (!(options.threshold > 0)) {
      throw new Error(`Invalid shard size: ${options.threshold}. Must be greater than zero`);
    }
    this.outputDir = options.outputDir;
    this.base = options.base;
    this.threshold = options.threshold;
  }

  get shardNumber(): number {
    return this.currentShard;
  }

  get offset(): number {
    return this.currentOffset;
  }

  get shardPaths(): readonly string[] {
    return this.paths;
  }

  /**
   * Open the first shard. Called before any chunk is seen, so an empty
   * input still produces one (empty) shard file.
   */
  async open(): Promise<void> {
    if (this.paths.length > 0) {
      throw new Error("Shard writer already opened");
    }
    await this.openShard();
  }

  /**
   * Append a compressed chunk to the current shard
   */
  async append(data: Buffer): Promise<PlacedChunk> {
    const handle = this.handle;
    if (!handle) {
      throw new Error("No shard is open");
    }

    const offset = this.currentOffset;
    const shard = shardNameFromPath(this.paths[this.currentShard]);
    const shardNumber = this.currentShard;

    let written = 0;
    while (written < data.length) {
      const { bytesWritten } = await handle.write(data, written, data.length - written);
      written += bytesWritten;
    }
    this.currentOffset += data.length;

    // Soft threshold: checked after the write, chunks are never split
    let rolledOver = false;
    if (this.currentOffset >= this.threshold) {
      await this.closeShard();
      this.currentShard++;
      await this.openShard();
      rolledOver = true;
    }

    return { offset, length: data.length, shardNumber, shard, rolledOver };
  }

  /**
   * Close the open shard and, when only one shard exists, rename it to the
   * unnumbered form. Returns the final shard paths in order.
   */
  async finalize(): Promise<string[]> {
    await this.closeShard();

    const singlePath = path.join(this.outputDir, `${this.base}${SHARD_EXTENSION}`);
    if (this.paths.length === 1 && this.paths[0] !== singlePath) {
      await fs.promises.rename(this.paths[0], singlePath);
      this.paths[0] = singlePath;
    }

    return [...this.paths];
  }

  /**
   * Release the open shard handle without finalizing. Safe to call more
   * than once.
   */
  async close(): Promise<void> {
    await this.closeShard();
  }

  private async openShard(): Promise<void> {
    const shardPath = path.join(
      this.outputDir,
      `${numberedShardName(this.base, this.currentShard)}${SHARD_EXTENSION}`
    );
    this.handle = await fs.promises.open(shardPath, "w");
    this.paths.push(shardPath);
    this.currentOffset = 0;
  }

  private async closeShard(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }
  }
}
