import { describe, it, expect } from "vitest";
import { gunzipSync } from "node:zlib";
import {
  chunkLines,
  compressChunk,
  calculateChunkCount,
  calculateShardCount,
} from "../src/cli/utils/chunker.js";
import type { Chunk } from "../src/types/index.js";

function toLines(count: number): Buffer[] {
  const lines: Buffer[] = [];
  for (let i = 0; i < count; i++) {
    lines.push(Buffer.from(`line ${i}\n`));
  }
  return lines;
}

async function collect(chunks: AsyncIterable<Chunk>): Promise<Chunk[]> {
  const result: Chunk[] = [];
  for await (const chunk of chunks) {
    result.push(chunk);
  }
  return result;
}

describe("chunker", () => {
  describe("chunkLines", () => {
    it("groups lines into full chunks plus a shorter last chunk", async () => {
      const chunks = await collect(chunkLines(toLines(7), 3));

      expect(chunks.map((c) => c.lines.length)).toEqual([3, 3, 1]);
      expect(chunks.map((c) => c.index)).toEqual([0, 1, 2]);
    });

    it("keeps lines in arrival order", async () => {
      const chunks = await collect(chunkLines(toLines(5), 2));
      const flattened = chunks.flatMap((c) => c.lines.map((l) => l.toString()));

      expect(flattened).toEqual(toLines(5).map((l) => l.toString()));
    });

    it("does not emit an empty trailing chunk", async () => {
      const chunks = await collect(chunkLines(toLines(6), 3));
      expect(chunks.map((c) => c.lines.length)).toEqual([3, 3]);
    });

    it("emits nothing for empty input", async () => {
      const chunks = await collect(chunkLines([], 3));
      expect(chunks).toEqual([]);
    });

    it("accepts a chunk size of one", async () => {
      const chunks = await collect(chunkLines(toLines(3), 1));
      expect(chunks).toHaveLength(3);
    });

    it("rejects a non-positive chunk size", async () => {
      await expect(collect(chunkLines(toLines(3), 0))).rejects.toThrow("Invalid chunk size");
      await expect(collect(chunkLines(toLines(3), -2))).rejects.toThrow("Invalid chunk size");
      await expect(collect(chunkLines(toLines(3), 1.5))).rejects.toThrow("Invalid chunk size");
    });
  });

  describe("compressChunk", () => {
    it("produces a gzip member holding exactly the chunk's bytes", () => {
      const chunk = { index: 0, lines: [Buffer.from("a 1 {}\n"), Buffer.from("b 2 {}\r\n")] };
      const compressed = compressChunk(chunk);

      expect(compressed.length).toBe(compressed.data.length);
      expect(compressed.data[0]).toBe(0x1f);
      expect(compressed.data[1]).toBe(0x8b);
      expect(gunzipSync(compressed.data).toString()).toBe("a 1 {}\nb 2 {}\r\n");
    });

    it("produces members that also decompress when concatenated", () => {
      const first = compressChunk({ index: 0, lines: [Buffer.from("one\n")] });
      const second = compressChunk({ index: 1, lines: [Buffer.from("two\n")] });

      const joined = Buffer.concat([first.data, second.data]);
      expect(gunzipSync(joined).toString()).toBe("one\ntwo\n");
    });

    it("compresses more at higher levels for repetitive input", () => {
      const lines = Array.from({ length: 200 }, (_, i) => Buffer.from(`com,example)/ ${i % 7} {"x": "yyyyyyyy"}\n`));
      const fast = compressChunk({ index: 0, lines }, 1);
      const small = compressChunk({ index: 0, lines }, 9);

      expect(small.length).toBeLessThanOrEqual(fast.length);
      expect(gunzipSync(fast.data).equals(gunzipSync(small.data))).toBe(true);
    });

    it("rejects compression levels outside 1-9", () => {
      const chunk = { index: 0, lines: [Buffer.from("x\n")] };
      expect(() => compressChunk(chunk, 0)).toThrow("Invalid compression level");
      expect(() => compressChunk(chunk, 10)).toThrow("Invalid compression level");
    });
  });

  describe("calculateChunkCount", () => {
    it("rounds up partial chunks", () => {
      expect(calculateChunkCount(7, 3)).toBe(3);
      expect(calculateChunkCount(6, 3)).toBe(2);
    });

    it("returns zero for no lines", () => {
      expect(calculateChunkCount(0, 3000)).toBe(0);
    });
  });

  describe("calculateShardCount", () => {
    it("divides the compressed size by the shard size", () => {
      expect(calculateShardCount(250, 100)).toBe(3);
    });

    it("returns at least one shard", () => {
      expect(calculateShardCount(0, 100)).toBe(1);
      expect(calculateShardCount(5000, Infinity)).toBe(1);
    });
  });
});
