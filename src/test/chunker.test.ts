import { describe, it, before, after } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  CHUNK_METADATA_FILE,
  chunkId,
  chunkResultFile,
  compareChunkIds,
  loadExistingResults,
  persistChunks,
  readChunkMetadata,
  splitText,
} from "../analysis/chunker.js";
import { FIXED_TIME, charCounter, chunkResult, fixedClock, tempDir } from "./helpers.js";

describe("text splitting", () => {
  it("packs whole lines up to the token limit", () => {
    assert.deepEqual(splitText("aaaa\nbbbb\ncccc", 10, charCounter), ["aaaa\nbbbb", "cccc"]);
  });

  it("keeps an oversized line as its own chunk", () => {
    const long = "x".repeat(20);
    assert.deepEqual(splitText(`ab\n${long}\ncd`, 5, charCounter), ["ab", long, "cd"]);
  });

  it("rejoins to the original text", () => {
    const text = "alpha\nbravo\n\ncharlie\ndelta\n";
    assert.equal(splitText(text, 12, charCounter).join("\n"), text);
  });

  it("returns one empty chunk for empty input", () => {
    assert.deepEqual(splitText("", 10, charCounter), [""]);
  });
});

describe("chunk ids", () => {
  it("numbers from one with three digits", () => {
    assert.equal(chunkId(0), "chunk_001");
    assert.equal(chunkId(11), "chunk_012");
    assert.equal(chunkId(999), "chunk_1000");
  });

  it("sorts by chunk number", () => {
    assert.deepEqual(["chunk_1000", "chunk_010", "chunk_999", "chunk_002"].sort(compareChunkIds), [
      "chunk_002",
      "chunk_010",
      "chunk_999",
      "chunk_1000",
    ]);
  });
});

describe("chunk persistence", () => {
  let dir: string;

  before(async () => {
    dir = await tempDir("chunker");
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes chunk files and metadata that read back", async () => {
    const chunksDir = path.join(dir, "persist");
    const metadata = await persistChunks(["aa", "bbb"], chunksDir, charCounter, { evidence_dir: "/runs/a" }, fixedClock());

    assert.deepEqual(metadata, {
      timestamp: FIXED_TIME,
      chunks_directory: chunksDir,
      total_chunks: 2,
      source: { evidence_dir: "/runs/a" },
      chunk_files: [
        { chunk_id: "chunk_001", file_path: path.join(chunksDir, "chunk_001.txt"), token_count: 2, character_count: 2 },
        { chunk_id: "chunk_002", file_path: path.join(chunksDir, "chunk_002.txt"), token_count: 3, character_count: 3 },
      ],
    });
    assert.equal(await fs.readFile(path.join(chunksDir, "chunk_002.txt"), "utf-8"), "bbb");
    assert.deepEqual(await readChunkMetadata(chunksDir), metadata);
  });

  it("reads no metadata from an empty location", async () => {
    assert.equal(await readChunkMetadata(path.join(dir, "absent")), null);
  });

  it("loads completed results and skips unreadable ones", async () => {
    const chunksDir = path.join(dir, "results");
    await fs.mkdir(chunksDir, { recursive: true });
    const done = chunkResult("chunk_002", { threat_score: 5 });
    await fs.writeFile(chunkResultFile(chunksDir, "chunk_002"), JSON.stringify(done), "utf-8");
    await fs.writeFile(chunkResultFile(chunksDir, "chunk_001"), "{ truncated", "utf-8");
    await fs.writeFile(path.join(chunksDir, "chunk_003.txt"), "text", "utf-8");
    await fs.writeFile(path.join(chunksDir, CHUNK_METADATA_FILE), "{}", "utf-8");

    const results = await loadExistingResults(chunksDir);
    assert.deepEqual([...results.keys()], ["chunk_002"]);
    assert.deepEqual(results.get("chunk_002"), done);
  });

  it("treats a missing chunk directory as no progress", async () => {
    assert.equal((await loadExistingResults(path.join(dir, "nowhere"))).size, 0);
  });
});
