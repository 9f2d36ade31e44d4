import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DEFAULT_DATA_DIR = path.resolve(__dirname, "../../data");

/** `SIGNAL_DATA_DIR` is read on every call so tests can point storage at a temp directory. */
export function getDataDir(): string {
  const override = process.env.SIGNAL_DATA_DIR?.trim();
  return override ? path.resolve(override) : DEFAULT_DATA_DIR;
}

export async function ensureDataDir(): Promise<string> {
  const dir = getDataDir();
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export function resolveDataFile(fileName: string): string {
  return path.join(getDataDir(), fileName);
}

export async function ensureDataFile(fileName: string, initialValue = ""): Promise<string> {
  const dir = await ensureDataDir();
  const fullPath = path.join(dir, fileName);
  try {
    await fs.access(fullPath);
  } catch {
    await fs.writeFile(fullPath, initialValue, { encoding: "utf8" });
  }
  return fullPath;
}
