/**
 * Index (.idx) and location (.loc) file emission and parsing
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as readline from "node:readline";
import type { FileHandle } from "node:fs/promises";
import type { IndexRecord, LocationRecord } from "../../types/index.js";
import { shardNameFromPath } from "./shard-writer.js";

export const INDEX_BATCH_SIZE = 100;

/**
 * Format an index record as a tab-separated line
 */
export function formatIndexRecord(record: IndexRecord): string {
  return `${record.key}\t${record.shard}\t${record.offset}\t${record.length}\t${record.shardNumber}\n`;
}

/**
 * Parse one index line. Keys may contain spaces but never tabs.
 */
export function parseIndexLine(line: string): IndexRecord {
  const fields = line.replace(/\r?\n$/, "").split("\t");
  if (fields.length !== 5) {
    throw new Error(`Invalid index line: ${line.slice(0, 80)}`);
  }

  const [key, shard, offset, length, shardNumber] = fields;
  const record: IndexRecord = {
    key,
    shard,
    offset: Number(offset),
    length: Number(length),
    shardNumber: Number(shardNumber),
  };

  if (
    !Number.isInteger(record.offset) ||
    !Number.isInteger(record.length) ||
    !Number.isInteger(record.shardNumber)
  ) {
    throw new Error(`Invalid index line: ${line.slice(0, 80)}`);
  }

  return record;
}

/**
 * Buffered index writer. Records are written in batches of batchSize and
 * always in the order they were added.
 */
export class IndexWriter {
  private readonly buffer: string[] = [];
  private handle: FileHandle | null;
  private written = 0;

  private constructor(
    handle: FileHandle,
    readonly filePath: string,
    private readonly batchSize: number
  ) {
    this.handle = handle;
  }

  static async open(filePath: string, batchSize: number = INDEX_BATCH_SIZE): Promise<IndexWriter> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error(`Invalid index batch size: ${batchSize}`);
    }
    const handle = await fs.promises.open(filePath, "w");
    return new IndexWriter(handle, filePath, batchSize);
  }

  /** Records accepted so far, flushed or not */
  get count(): number {
    return this.written + this.buffer.length;
  }

  /** Records still waiting in memory */
  get pending(): number {
    return this.buffer.length;
  }

  async add(record: IndexRecord): Promise<void> {
    if (record.key.includes("\t")) {
      // A tab would shift every following field
      record = { ...record, key: record.key.replace(/\t/g, " ") };
    }
    this.buffer.push(formatIndexRecord(record));

    if (this.buffer.length >= this.batchSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const handle = this.handle;
    if (!handle) {
      throw new Error(`Index file already closed: ${this.filePath}`);
    }

    const batch = Buffer.from(this.buffer.join(""), "utf-8");
    const flushed = this.buffer.length;
    let written = 0;
    while (written < batch.length) {
      const { bytesWritten } = await handle.write(batch, written, batch.length - written);
      written += bytesWritten;
    }
    this.buffer.length = 0;
    this.written += flushed;
  }

  /**
   * Flush outstanding records and close the file
   */
  async close(): Promise<void> {
    if (!this.handle) return;
    await this.flush();
    await this.dispose();
  }

  /**
   * Close the file without flushing. Used on failure paths.
   */
  async dispose(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }
  }
}

/**
 * Format a location record as a tab-separated line
 */
export function formatLocationRecord(record: LocationRecord): string {
  return `${record.shard}\t${record.path}\n`;
}

/**
 * Location records for the final shard paths, in shard order
 */
export function buildLocationRecords(shardPaths: readonly string[]): LocationRecord[] {
  return shardPaths.map((shardPath) => ({
    shard: shardNameFromPath(shardPath),
    path: path.basename(shardPath),
  }));
}

/**
 * Write the location file in one go
 */
export async function writeLocationFile(
  filePath: string,
  shardPaths: readonly string[]
): Promise<LocationRecord[]> {
  const records = buildLocationRecords(shardPaths);
  await fs.promises.writeFile(filePath, records.map(formatLocationRecord).join(""), "utf-8");
  return records;
}

/**
 * Parse one location line
 */
export function parseLocationLine(line: string): LocationRecord {
  const fields = line.replace(/\r?\n$/, "").split("\t");
  if (fields.length < 2 || !fields[0] || !fields[1]) {
    throw new Error(`Invalid location line: ${line.slice(0, 80)}`);
  }
  return { shard: fields[0], path: fields[1] };
}

/**
 * Stream an index file line by line
 */
export async function readIndexFile(filePath: string): Promise<IndexRecord[]> {
  const records: IndexRecord[] = [];
  const fileStream = fs.createReadStream(filePath, { encoding: "utf-8" });
  const rl = readline.createInterface({
    input: fileStream,
    crlfDelay: Infinity,
  });

  for await (const line of rl) {
    if (!line) continue;
    records.push(parseIndexLine(line));
  }

  return records;
}

/**
 * Read a location file into records, in file order
 */
export async function readLocationFile(filePath: string): Promise<LocationRecord[]> {
  const content = await fs.promises.readFile(filePath, "utf-8");
  return content
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map(parseLocationLine);
}
