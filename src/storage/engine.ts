import * as fs from "node:fs/promises";
import * as path from "node:path";
import lockfile from "proper-lockfile";
import type { z } from "zod";

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function readJSON<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  defaultValue: T
): Promise<T> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return defaultValue;
    }
    throw err;
  }
  return schema.parse(JSON.parse(raw));
}

export async function writeJSON<T>(filePath: string, data: T): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2) + "\n");
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}`;
  await fs.writeFile(tmpPath, content, "utf-8");
  await fs.rename(tmpPath, filePath);
}

/** Append one JSON record as a single line. */
export async function appendJSONLine<T>(filePath: string, record: T): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.appendFile(filePath, JSON.stringify(record) + "\n", "utf-8");
}

export async function withLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  await ensureDir(path.dirname(lockPath));

  // proper-lockfile needs the target to exist
  if (!(await pathExists(lockPath))) {
    await fs.writeFile(lockPath, "", "utf-8");
  }

  const release = await lockfile.lock(lockPath, {
    stale: 10000,
    retries: {
      retries: 5,
      minTimeout: 200,
      maxTimeout: 5000,
    },
  });

  try {
    return await fn();
  } finally {
    await release();
  }
}
