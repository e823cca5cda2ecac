import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { buildZipNum, resolveBuildConfig } from "../src/cli/commands/build.js";
import { ZipNumClient, createClient } from "../src/client/index.js";
import { keyOf, makeCdxjLines, makeTempDir } from "./fixtures.js";

function stripNewline(line: string): string {
  return line.replace(/\n$/, "");
}

describe("ZipNumClient", () => {
  let testDir: string;
  const lines = makeCdxjLines(120);

  beforeAll(async () => {
    testDir = await makeTempDir();
    const inputPath = path.join(testDir, "input.cdxj");
    await fs.promises.writeFile(inputPath, lines.join(""));

    // Several shards
    await buildZipNum(
      resolveBuildConfig({
        input: inputPath,
        output: path.join(testDir, "multi"),
        chunkSize: "10",
        shardSize: "1kb",
      }),
      { quiet: true }
    );

    // One renamed shard
    await buildZipNum(
      resolveBuildConfig({
        input: inputPath,
        output: path.join(testDir, "single"),
        chunkSize: "10",
        singleShard: true,
      }),
      { quiet: true }
    );
  });

  afterAll(async () => {
    await fs.promises.rm(testDir, { recursive: true, force: true });
  });

  it("loads every index record", async () => {
    const client = await createClient(path.join(testDir, "multi"));
    expect(client.blocks).toHaveLength(12);
    expect(client.blocks[0].key).toBe(keyOf(0));
  });

  it("starts the block range one block before the prefix", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "multi"));
    const blocks = client.findBlocks("com,example)/page001");

    expect(blocks.map((b) => b.key)).toEqual([keyOf(0), keyOf(10)]);
  });

  it("returns every block for an empty prefix", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "multi"));
    expect(client.findBlocks("")).toHaveLength(12);
  });

  it("returns no blocks for a prefix sorted before every key", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "multi"));
    expect(client.findBlocks("a")).toEqual([]);
  });

  it("reads a single block by its byte range", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "multi"));
    const block = client.blocks[5];

    expect(await client.readBlock(block)).toEqual(lines.slice(50, 60).map(stripNewline));
  });

  it("queries lines by key prefix across shards", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "multi"));
    const result = await client.query("com,example)/page001");

    expect(result).toEqual(lines.slice(10, 20).map(stripNewline));
  });

  it("stops at the limit", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "multi"));
    const result = await client.query("com,example)/page00", { limit: 15 });

    expect(result).toEqual(lines.slice(0, 15).map(stripNewline));
  });

  it("finds an exact key", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "multi"));
    expect(await client.query(keyOf(77))).toEqual([stripNewline(lines[77])]);
  });

  it("resolves the provisional shard name of a renamed single shard", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "single"));

    expect(client.blocks[0].shard).toBe("single-01");
    expect(client.resolveShard("single-01")).toBe(path.join(testDir, "single", "single.cdx.gz"));
    expect(await client.query(keyOf(119))).toEqual([stripNewline(lines[119])]);
  });

  it("rejects a shard name from another base when only one shard exists", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "single"));

    expect(() => client.resolveShard("other-01")).toThrow("Unknown shard: other-01");
    expect(() => client.resolveShard("single-02")).toThrow("Unknown shard: single-02");
  });

  it("rejects unknown shards when several exist", async () => {
    const client = await ZipNumClient.open(path.join(testDir, "multi"));
    expect(() => client.resolveShard("other-01")).toThrow("Unknown shard: other-01");
  });

  it("throws when the index is missing", async () => {
    await expect(ZipNumClient.open(path.join(testDir, "nowhere"))).rejects.toThrow(
      "Index file not found"
    );
  });
});
