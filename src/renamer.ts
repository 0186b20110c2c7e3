import path from "node:path";
import fs from "node:fs/promises";
import { compareCodePoints, digitCount, isJpegFile, listJpegFiles, padIndex, pathExists } from "./utils.js";
import type { RenamePlan, RenameResult } from "./types.js";

export function buildRenamePlan(fileNames: string[], prefix: string): RenamePlan {
  const sources = fileNames.filter((name) => isJpegFile(name)).sort(compareCodePoints);
  const width = digitCount(sources.length);

  return {
    prefix,
    width,
    entries: sources.map((source, i) => ({
      index: i + 1,
      source,
      target: `${prefix}${padIndex(i + 1, width)}${path.extname(source).toLowerCase()}`,
    })),
  };
}

export interface RenameOptions {
  dryRun?: boolean;
}

/**
 * Renames the folder's JPEG files to `<prefix><n><ext>` in name order. A
 * target that already exists is left alone along with its source, so the
 * run is best-effort: a collision means two names stay as they were.
 */
export async function renameFolder(
  folder: string,
  prefix: string,
  options: RenameOptions = {}
): Promise<RenameResult> {
  const files = await listJpegFiles(folder);
  if (files === null) {
    throw new Error(`Folder not found: ${folder}`);
  }

  const plan = buildRenamePlan(files, prefix);
  const result: RenameResult = {
    total: plan.entries.length,
    renamed: [],
    unchanged: [],
    collisions: [],
  };

  // Names a dry run treats as present, updated as if each rename happened
  const occupied = new Set(options.dryRun ? await fs.readdir(folder) : []);

  for (const entry of plan.entries) {
    if (entry.source === entry.target) {
      result.unchanged.push(entry);
      continue;
    }

    const src = path.join(folder, entry.source);
    const dst = path.join(folder, entry.target);

    const taken = options.dryRun ? occupied.has(entry.target) : await pathExists(dst);
    if (taken) {
      console.warn(`Skipping: target already exists ${entry.target}`);
      result.collisions.push(entry);
      continue;
    }

    if (options.dryRun) {
      occupied.delete(entry.source);
      occupied.add(entry.target);
      console.log(`Would rename: ${entry.source} -> ${entry.target}`);
    } else {
      await fs.rename(src, dst);
      console.log(`Renamed: ${entry.source} -> ${entry.target}`);
    }
    result.renamed.push(entry);
  }

  return result;
}
