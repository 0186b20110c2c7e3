import path from "node:path";
import fs from "node:fs/promises";

const JPEG_EXTENSIONS = ["jpg", "jpeg"];

export function isJpegFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  return JPEG_EXTENSIONS.includes(ext);
}

/** Orders strings by Unicode code point rather than UTF-16 code unit. */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

/**
 * Names of the JPEG files directly inside `dir`, sorted by name. Symlinks
 * count when they point at a regular file. Resolves to `null` when `dir` is
 * absent or not a directory.
 */
export async function listJpegFiles(dir: string): Promise<string[] | null> {
  if (!(await isDirectory(dir))) {
    return null;
  }

  const entries = await fs.readdir(dir, { withFileTypes: true });
  const names: string[] = [];

  for (const entry of entries) {
    if (!isJpegFile(entry.name)) continue;
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkToFile(path.join(dir, entry.name))))) {
      names.push(entry.name);
    }
  }

  return names.sort(compareCodePoints);
}

// Codes under which a path is treated as absent rather than an error
const ABSENT_CODES = ["ENOENT", "ENOTDIR", "ELOOP"];

function isAbsent(err: unknown): boolean {
  const code = (err as NodeJS.ErrnoException).code;
  return code !== undefined && ABSENT_CODES.includes(code);
}

async function isLinkToFile(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch (err) {
    if (isAbsent(err)) return false;
    throw err;
  }
}

export async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (err) {
    if (isAbsent(err)) return false;
    throw err;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  const sign = bytes < 0 ? "-" : "";
  let size = Math.abs(bytes);
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return unit === 0 ? `${sign}${size} B` : `${sign}${size.toFixed(1)} ${units[unit]}`;
}

/** Percentage saved going from `original` to `compressed` bytes. */
export function reductionPercent(original: number, compressed: number): number {
  return original > 0 ? (1 - compressed / original) * 100 : 0;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}

export function digitCount(n: number): number {
  return String(Math.abs(Math.trunc(n))).length;
}

export function padIndex(index: number, width: number): string {
  return String(index).padStart(width, "0");
}

export async function getDiskSpace(dir: string): Promise<{ available: number }> {
  const target = process.platform === "win32" ? path.parse(dir).root : dir;
  try {
    const stats = await fs.statfs(target);
    return { available: stats.bavail * stats.bsize };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`Warning: could not check disk space for ${dir}: ${message}`);
    return { available: Infinity };
  }
}
