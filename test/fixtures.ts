import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createHash } from "node:crypto";

/**
 * Sorted CDXJ lines: page0000, page0001, ... each with a digest so that
 * chunks do not compress down to nothing
 */
export function makeCdxjLines(count: number): string[] {
  const lines: string[] = [];
  for (let i = 0; i < count; i++) {
    const page = `page${String(i).padStart(4, "0")}`;
    const digest = createHash("sha1").update(page).digest("hex");
    lines.push(
      `com,example)/${page} 20240101000000 {"url": "http://example.com/${page}", "digest": "${digest}"}\n`
    );
  }
  return lines;
}

export function keyOf(i: number): string {
  return `com,example)/page${String(i).padStart(4, "0")} 20240101000000`;
}

export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), "cdxj-zipnum-"));
}

export async function readRange(filePath: string, offset: number, length: number): Promise<Buffer> {
  const handle = await fs.promises.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, offset);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}
