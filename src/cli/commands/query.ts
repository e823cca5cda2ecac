/**
 * Query command - print the lines of a built index whose key starts with
 * a prefix
 */

import type { QueryOptions } from "../../types/index.js";
import { ZipNumClient } from "../../client/index.js";

export interface QueryResult {
  lines: string[];
  blocksRead: number;
}

export async function query(
  dir: string,
  prefix: string,
  options: QueryOptions = {}
): Promise<QueryResult> {
  if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 1)) {
    throw new Error(`Invalid limit: ${options.limit}`);
  }

  const client = await ZipNumClient.open(dir, {
    base: options.base,
    idxFile: options.idxFile,
    locFile: options.locFile,
  });

  const blocks = client.findBlocks(prefix);
  console.error(`Searching ${blocks.length} of ${client.blocks.length} blocks for "${prefix}"`);

  const lines = await client.query(prefix, { limit: options.limit });
  for (const line of lines) {
    console.log(line);
  }

  console.error(`${lines.length} matching line(s)`);
  return { lines, blocksRead: blocks.length };
}
