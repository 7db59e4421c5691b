import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ChunkMetadataSchema, ChunkResultSchema } from "./schema.js";
import type { TokenCounter } from "./tokens.js";
import { ensureDir, isErrnoException, readJSON, writeJSON } from "../storage/index.js";
import { logger } from "../logger.js";
import type { ChunkFileInfo, ChunkMetadata, ChunkResult } from "../types.js";

export const CHUNK_METADATA_FILE = "chunks_metadata.json";

const RESULT_FILE_PATTERN = /^(chunk_.+)_result\.json$/;

const log = logger.child({ component: "chunker" });

/** `chunk_001` for index 0. */
export function chunkId(index: number): string {
  return `chunk_${String(index + 1).padStart(3, "0")}`;
}

/** Orders chunk ids by position, so `chunk_999` comes before `chunk_1000`. */
export function compareChunkIds(a: string, b: string): number {
  const byIndex = chunkNumber(a) - chunkNumber(b);
  return Number.isNaN(byIndex) || byIndex === 0 ? a.localeCompare(b) : byIndex;
}

function chunkNumber(id: string): number {
  return Number(id.slice("chunk_".length));
}

export function chunkResultFile(chunksDir: string, id: string): string {
  return path.join(chunksDir, `${id}_result.json`);
}

/**
 * Greedy first-fit split on line boundaries. Joining the chunks with "\n"
 * gives back the input. A single line over `maxTokens` becomes a chunk of
 * its own and is not subdivided.
 */
export function splitText(text: string, maxTokens: number, countTokens: TokenCounter): string[] {
  const chunks: string[] = [];
  let buffer: string[] = [];
  let bufferTokens = 0;

  for (const line of text.split("\n")) {
    const lineTokens = countTokens(line + "\n");
    if (bufferTokens + lineTokens > maxTokens && buffer.length > 0) {
      chunks.push(buffer.join("\n"));
      buffer = [line];
      bufferTokens = lineTokens;
    } else {
      buffer.push(line);
      bufferTokens += lineTokens;
    }
  }
  if (buffer.length > 0) {
    chunks.push(buffer.join("\n"));
  }
  return chunks;
}

export async function persistChunks(
  chunks: readonly string[],
  chunksDir: string,
  countTokens: TokenCounter,
  source: Record<string, string> = {},
  now: Date = new Date()
): Promise<ChunkMetadata> {
  await ensureDir(chunksDir);
  const chunkFiles: ChunkFileInfo[] = [];
  for (const [index, chunk] of chunks.entries()) {
    const id = chunkId(index);
    const filePath = path.join(chunksDir, `${id}.txt`);
    await fs.writeFile(filePath, chunk, "utf-8");
    chunkFiles.push({
      chunk_id: id,
      file_path: filePath,
      token_count: countTokens(chunk),
      character_count: chunk.length,
    });
  }

  const metadata: ChunkMetadata = {
    timestamp: now.toISOString(),
    chunks_directory: chunksDir,
    total_chunks: chunks.length,
    source,
    chunk_files: chunkFiles,
  };
  await writeJSON(path.join(chunksDir, CHUNK_METADATA_FILE), metadata);
  return metadata;
}

export async function readChunkMetadata(chunksDir: string): Promise<ChunkMetadata | null> {
  return readJSON(path.join(chunksDir, CHUNK_METADATA_FILE), ChunkMetadataSchema.nullable(), null);
}

/**
 * Completed chunk results found on disk, keyed by chunk id. A result file that
 * fails to parse is skipped so the chunk is analyzed again.
 */
export async function loadExistingResults(chunksDir: string): Promise<Map<string, ChunkResult>> {
  const results = new Map<string, ChunkResult>();
  let names: string[];
  try {
    names = await fs.readdir(chunksDir);
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") return results;
    throw err;
  }

  for (const name of names.sort()) {
    const match = RESULT_FILE_PATTERN.exec(name);
    if (!match?.[1]) continue;
    const id = match[1];
    try {
      const raw = await fs.readFile(path.join(chunksDir, name), "utf-8");
      const parsed = ChunkResultSchema.parse(JSON.parse(raw));
      results.set(id, { ...parsed, chunk_id: id });
    } catch (err: unknown) {
      log.warn("Ignoring unreadable chunk result", { file: name, error: err instanceof Error ? err.message : String(err) });
    }
  }
  return results;
}
