/**
 * ZipNum Client Runtime
 * Looks up keys in a built index and reads single blocks by byte range
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { gunzipSync } from "node:zlib";
import type { IndexRecord, LocationRecord } from "../types/index.js";
import { extractKey } from "../cli/utils/parsers.js";
import { readIndexFile, readLocationFile } from "../cli/utils/indexer.js";
import { numberedShardName } from "../cli/utils/shard-writer.js";

// Re-export types from core types module
export type { IndexRecord, LocationRecord };

export interface ClientOptions {
  /** Base name used at build time (default: the directory's basename) */
  base?: string;
  idxFile?: string;
  locFile?: string;
}

export interface ClientQueryOptions {
  limit?: number;
}

// ============================================================================
// Client
// ============================================================================

export class ZipNumClient {
  private readonly dir: string;
  private readonly records: IndexRecord[];
  private readonly locations: Map<string, string>;

  constructor(dir: string, records: IndexRecord[], locations: LocationRecord[]) {
    this.dir = dir;
    this.records = records;
    this.locations = new Map(locations.map((loc): [string, string] => [loc.shard, loc.path]));
  }

  /**
   * Load the index and location files of a built output directory
   */
  static async open(dir: string, options: ClientOptions = {}): Promise<ZipNumClient> {
    const resolved = path.resolve(dir);
    const base = options.base || path.basename(resolved);
    const idxPath = path.join(resolved, options.idxFile || `${base}.idx`);
    const locPath = path.join(resolved, options.locFile || `${base}.loc`);

    if (!fs.existsSync(idxPath)) {
      throw new Error(`Index file not found: ${idxPath}`);
    }
    if (!fs.existsSync(locPath)) {
      throw new Error(`Location file not found: ${locPath}`);
    }

    const [records, locations] = await Promise.all([
      readIndexFile(idxPath),
      readLocationFile(locPath),
    ]);

    return new ZipNumClient(resolved, records, locations);
  }

  get blocks(): readonly IndexRecord[] {
    return this.records;
  }

  /**
   * Blocks that may hold lines whose key starts with prefix.
   * Starts at the last block keyed below the prefix, since its tail can
   * already match.
   */
  findBlocks(prefix: string): IndexRecord[] {
    let lo = 0;
    let hi = this.records.length;

    // First block whose key is >= prefix
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.records[mid].key < prefix) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }

    const start = Math.max(0, lo - 1);
    const matches: IndexRecord[] = [];

    for (let i = start; i < this.records.length; i++) {
      const key = this.records[i].key;
      if (key > prefix && !key.startsWith(prefix)) break;
      matches.push(this.records[i]);
    }

    return matches;
  }

  /**
   * Path of the shard file an index record points at
   */
  resolveShard(shard: string): string {
    const file = this.locations.get(shard);
    if (file) {
      return path.join(this.dir, file);
    }

    // A run that ended with one shard renames it after the index was written,
    // so its records still carry the first numbered name
    if (this.locations.size === 1) {
      const [[base, only]] = this.locations.entries();
      if (shard === numberedShardName(base, 0)) {
        return path.join(this.dir, only);
      }
    }

    throw new Error(`Unknown shard: ${shard}`);
  }

  /**
   * Read and decompress exactly one block
   */
  async readBlock(record: IndexRecord): Promise<string[]> {
    const shardPath = this.resolveShard(record.shard);
    const buffer = Buffer.alloc(record.length);
    const handle = await fs.promises.open(shardPath, "r");

    try {
      let read = 0;
      while (read < record.length) {
        const { bytesRead } = await handle.read(buffer, read, record.length - read, record.offset + read);
        if (bytesRead === 0) {
          throw new Error(
            `Unexpected end of ${shardPath} reading [${record.offset}, ${record.offset + record.length})`
          );
        }
        read += bytesRead;
      }
    } finally {
      await handle.close();
    }

    const text = gunzipSync(buffer).toString("utf-8");
    const lines = text.split("\n");
    if (lines[lines.length - 1] === "") {
      lines.pop();
    }
    return lines.map((line) => line.replace(/\r$/, ""));
  }

  /**
   * Lines whose key starts with prefix, in index order
   */
  async query(prefix: string, options: ClientQueryOptions = {}): Promise<string[]> {
    const limit = options.limit ?? Infinity;
    const results: string[] = [];

    for (const block of this.findBlocks(prefix)) {
      for (const line of await this.readBlock(block)) {
        const key = extractKey(line);
        if (key.startsWith(prefix)) {
          results.push(line);
          if (results.length >= limit) {
            return results;
          }
        } else if (key > prefix) {
          return results;
        }
      }
    }

    return results;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createClient(dir: string, options: ClientOptions = {}): Promise<ZipNumClient> {
  return ZipNumClient.open(dir, options);
}
