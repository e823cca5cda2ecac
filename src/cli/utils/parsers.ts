/**
 * Input handling for CDX/CDXJ line streams
 * Reads plain files, gzip files and stdin without decoding line bytes
 */

import * as fs from "node:fs";
import { createGunzip } from "node:zlib";
import type { Readable } from "node:stream";

const NEWLINE = 0x0a;

export interface InputSource {
  stream: Readable;
  /** Size of the file on disk, null for stdin */
  size: number | null;
  /** Raw (possibly compressed) bytes read from disk so far */
  bytesRead(): number;
  close(): void;
}

export interface SampleResult {
  count: number;
  sample: Buffer[];
  bytes: number;
  estimatedCount?: number;
}

/**
 * True when the path names a gzip-compressed input
 */
export function isGzipPath(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return lower.endsWith(".gz") || lower.endsWith(".gzip");
}

/**
 * Open an input source. "-" reads stdin as an uncompressed stream.
 */
export function openInput(input: string): InputSource {
  if (input === "-") {
    return {
      stream: process.stdin,
      size: null,
      bytesRead: () => 0,
      close: () => process.stdin.destroy(),
    };
  }

  if (!fs.existsSync(input)) {
    throw new Error(`Input file not found: ${input}`);
  }

  const size = getFileSize(input);
  const fileStream = fs.createReadStream(input);

  if (!isGzipPath(input)) {
    return {
      stream: fileStream,
      size,
      bytesRead: () => fileStream.bytesRead,
      close: () => fileStream.destroy(),
    };
  }

  const gunzip = createGunzip();
  fileStream.on("error", (err) => gunzip.destroy(err));
  fileStream.pipe(gunzip);

  return {
    stream: gunzip,
    size,
    bytesRead: () => fileStream.bytesRead,
    close: () => {
      fileStream.destroy();
      gunzip.destroy();
    },
  };
}

/**
 * Split a byte stream into lines, each keeping its original terminator.
 * A final line without a newline is yielded as-is.
 */
export async function* readLines(stream: AsyncIterable<Buffer | string>): AsyncGenerator<Buffer> {
  let pending: Buffer[] = [];

  for await (const data of stream) {
    const buffer = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
    let start = 0;
    let newline = buffer.indexOf(NEWLINE, start);

    while (newline !== -1) {
      const piece = buffer.subarray(start, newline + 1);
      if (pending.length > 0) {
        pending.push(piece);
        yield Buffer.concat(pending);
        pending = [];
      } else {
        yield piece;
      }
      start = newline + 1;
      newline = buffer.indexOf(NEWLINE, start);
    }

    if (start < buffer.length) {
      pending.push(buffer.subarray(start));
    }
  }

  if (pending.length > 0) {
    yield Buffer.concat(pending);
  }
}

/**
 * Extract the sort key of a CDX/CDXJ line: the text before the first "{",
 * or the whole line, trimmed. Undecodable bytes become U+FFFD.
 */
export function extractKey(line: Buffer | string): string {
  const text = (typeof line === "string" ? line : line.toString("utf-8")).replace(/[\r\n]+$/, "");
  const brace = text.indexOf("{");
  return (brace === -1 ? text : text.slice(0, brace)).trim();
}

/**
 * Read up to sampleSize lines from an input. Unless sampleOnly is set the
 * whole input is read so the line count is exact.
 */
export async function sampleInput(
  input: string,
  sampleSize: number = 1000,
  sampleOnly: boolean = false
): Promise<SampleResult> {
  const source = openInput(input);
  const sample: Buffer[] = [];
  let count = 0;
  let bytes = 0;

  try {
    for await (const line of readLines(source.stream)) {
      if (sample.length < sampleSize) {
        sample.push(line);
      }
      count++;
      bytes += line.length;

      if (sampleOnly && count >= sampleSize) {
        break;
      }
    }
  } finally {
    source.close();
  }

  if (!sampleOnly) {
    return { count, sample, bytes };
  }

  // Scale the sample up by the share of the file read so far
  const rawRead = source.bytesRead();
  const estimatedCount =
    source.size !== null && rawRead > 0 && count > 0
      ? Math.max(count, Math.round((source.size * count) / rawRead))
      : count;

  return { count, sample, bytes, estimatedCount };
}

/**
 * Get file size in bytes
 */
export function getFileSize(filePath: string): number {
  const stats = fs.statSync(filePath);
  return stats.size;
}

/**
 * Parse size string (e.g., "5mb", "1gb") to bytes
 */
export function parseSize(sizeStr: string): number {
  const match = sizeStr.toLowerCase().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/);
  if (!match) {
    throw new Error(`Invalid size format: ${sizeStr}. Use format like "5mb" or "1gb"`);
  }

  const value = parseFloat(match[1]);
  const unit = match[2] || "b";

  const multipliers: Record<string, number> = {
    b: 1,
    kb: 1024,
    mb: 1024 * 1024,
    gb: 1024 * 1024 * 1024,
  };

  const bytes = Math.floor(value * multipliers[unit]);
  if (bytes <= 0) {
    throw new Error(`Invalid size format: ${sizeStr}. Size must be greater than zero`);
  }
  return bytes;
}
