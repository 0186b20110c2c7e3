#!/usr/bin/env node

import { createRequire } from "node:module";
import { createInterface } from "node:readline/promises";
import { parseArgs, UsageError } from "./args.js";
import { loadCompressor, MissingDependencyError } from "./loader.js";
import { renameFolder } from "./renamer.js";
import { resolveConfig } from "./resize.js";
import { isDirectory, listJpegFiles } from "./utils.js";
import type { CompressArgs, RenameArgs } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
jpgbatch v${VERSION} — Batch resize, re-encode and rename JPEG images

Usage:
  jpgbatch compress                      Shrink JPEGs in ./muffin and ./chihuahua in place
  jpgbatch compress -f <dir...>          Shrink JPEGs in the given folders
  jpgbatch compress --ultra --backup     Aggressive preset, originals copied to <dir>_backup first
  jpgbatch rename <dir> <prefix>         Rename JPEGs to <prefix>1.jpg, <prefix>2.jpg, ...

Compress options:
  -f, --folders <dir...>  Folders to process (default: muffin chihuahua)
  --max-width <n>         Maximum width in pixels (default: 600, ultra: 400)
  --max-height <n>        Maximum height in pixels (default: 600, ultra: 400)
  -q, --quality <n>       JPEG quality 1-100 (default: 60, ultra: 40)
  -u, --ultra             Progressive encoding and size-tuned quantisation tables
  -b, --backup            Copy originals to <dir>_backup before compressing
  -y, --yes               Do not ask before overwriting originals

Rename options:
  -n, --dry-run           Print the renames without touching any file

  -h, --help              Show this help message
  -v, --version           Show version number
`.trim();

async function confirmOverwrite(): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question("This overwrites the original files. Continue? (y/n): ");
    return answer.trim().toLowerCase() === "y";
  } finally {
    rl.close();
  }
}

async function runCompress(args: CompressArgs): Promise<void> {
  // Fails before any prompt or file access when sharp is missing
  const { JpegCompressor } = await loadCompressor();
  const config = resolveConfig(args.preset, args.overrides);

  if (args.preset === "ultra") {
    console.log("Warning: ultra compression mode");
    console.log("=".repeat(60));
    console.log("This mode shrinks images aggressively and may visibly reduce quality.");
    console.log(`Settings: max ${config.maxWidth}x${config.maxHeight}, quality ${config.encode.quality}`);
    console.log("Suggested quality levels:");
    console.log("  - 50-40: acceptable loss, large savings");
    console.log("  - 40-30: visible loss, very large savings");
    console.log("  - below 30: severe loss, maximum savings");
    console.log();

    if (!args.backup && !args.yes) {
      if (!process.stdin.isTTY) {
        console.error("Error: refusing to overwrite originals without confirmation; pass --yes or --backup");
        process.exit(1);
      }
      if (!(await confirmOverwrite())) {
        console.log("Cancelled");
        return;
      }
    }
  } else {
    console.log("=".repeat(60));
    console.log("JPEG batch compression");
    console.log("=".repeat(60));
    console.log(`Settings: max ${config.maxWidth}x${config.maxHeight}, quality ${config.encode.quality}`);
  }

  const compressor = new JpegCompressor(config);
  const results = await compressor.runAll(args.folders, { backup: args.backup });

  console.log("\n" + "=".repeat(60));
  console.log("Compression completed:");
  console.log("=".repeat(60));

  if (results.processed === 0) {
    console.log("No image files found to process");
    return;
  }

  console.log(`  Total files: ${results.processed}`);
  console.log(`  Failed:      ${results.failed.length}`);
  console.log(`  Duration:    ${results.duration}`);
  console.log(`  Original:    ${results.totalSize}`);
  console.log(`  Compressed:  ${results.compressedTotal}`);
  console.log(`  Saved:       ${results.savedSize} (${results.reduction})`);

  if (results.failed.length > 0) {
    console.log("\nFailed files (left unchanged):");
    results.failed.forEach((f) => console.log(`  - ${f.file}: ${f.error}`));
  }
}

async function runRename(args: RenameArgs): Promise<void> {
  if (!(await isDirectory(args.folder))) {
    console.error(`Error: folder not found: "${args.folder}"`);
    process.exit(1);
  }

  const files = await listJpegFiles(args.folder);
  if (files === null || files.length === 0) {
    console.log("No JPG or JPEG files found in the folder.");
    return;
  }

  const result = await renameFolder(args.folder, args.prefix, { dryRun: args.dryRun });

  console.log(
    `\n${args.dryRun ? "Dry run" : "Rename"} completed: ${result.renamed.length} renamed, ` +
      `${result.unchanged.length} already named, ${result.collisions.length} skipped`
  );
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  switch (parsed.command) {
    case "help":
      console.log(HELP);
      return;
    case "version":
      console.log(VERSION);
      return;
    case "compress":
      return runCompress(parsed);
    case "rename":
      return runRename(parsed);
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  if (err instanceof UsageError) {
    console.error("Run jpgbatch --help for usage");
  }
  if (err instanceof MissingDependencyError) {
    console.error("Install it with: npm install sharp");
  }
  process.exit(1);
});
