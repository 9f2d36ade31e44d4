import fs from "node:fs/promises";

import { ensureDataFile, resolveDataFile } from "./dataPaths.js";

export interface AppendOptions<T> {
  readonly fileName: string;
  readonly record: T;
}

export interface ReadOptions<T> {
  readonly fileName: string;
  readonly limit?: number;
  /** Returns undefined for lines that should be skipped. */
  readonly mapper: (item: unknown) => T | undefined;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function appendNdjsonRecord<T>({ fileName, record }: AppendOptions<T>): Promise<void> {
  const filePath = await ensureDataFile(fileName);
  const line = `${JSON.stringify(record)}\n`;
  await fs.appendFile(filePath, line, { encoding: "utf8" });
}

/** Newest first. Malformed lines are reported and skipped. */
export async function readNdjsonRecords<T>({
  fileName,
  limit,
  mapper,
}: ReadOptions<T>): Promise<T[]> {
  const filePath = resolveDataFile(fileName);
  let content: string;
  try {
    content = await fs.readFile(filePath, { encoding: "utf8" });
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }

  const lines = content.split(/\r?\n/).filter(Boolean);
  const mapped: T[] = [];
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    if (limit !== undefined && mapped.length >= limit) {
      break;
    }
    try {
      const value = mapper(JSON.parse(lines[index]));
      if (value !== undefined) {
        mapped.push(value);
      }
    } catch (error) {
      console.warn(`[history] failed to parse NDJSON line in ${fileName}:`, error);
    }
  }
  return mapped;
}
