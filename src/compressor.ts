import sharp from "sharp";
import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { computeTargetSize, orientedSize } from "./resize.js";
import {
  formatBytes,
  formatDuration,
  getDiskSpace,
  isDirectory,
  listJpegFiles,
  pathExists,
  reductionPercent,
} from "./utils.js";
import type {
  CompressionConfig,
  FileCompressionResult,
  FolderResult,
  ImageFile,
  RunOptions,
  RunSummary,
  RunTotals,
} from "./types.js";

export function emptyTotals(): RunTotals {
  return {
    folders: [],
    processed: 0,
    originalSize: 0,
    compressedSize: 0,
    failed: [],
  };
}

export function accumulate(totals: RunTotals, folder: FolderResult): RunTotals {
  return {
    folders: [...totals.folders, folder],
    processed: totals.processed + folder.processed,
    originalSize: totals.originalSize + folder.originalSize,
    compressedSize: totals.compressedSize + folder.compressedSize,
    failed: [...totals.failed, ...folder.failed],
  };
}

export function summarize(totals: RunTotals, durationMs: number): RunSummary {
  return {
    ...totals,
    duration: formatDuration(durationMs),
    totalSize: formatBytes(totals.originalSize),
    compressedTotal: formatBytes(totals.compressedSize),
    savedSize: formatBytes(totals.originalSize - totals.compressedSize),
    reduction: `${reductionPercent(totals.originalSize, totals.compressedSize).toFixed(1)}%`,
  };
}

export function backupDirFor(folder: string): string {
  const resolved = path.resolve(folder);
  return path.join(path.dirname(resolved), `${path.basename(resolved)}_backup`);
}

export class JpegCompressor {
  config: CompressionConfig;

  constructor(config: CompressionConfig) {
    this.config = config;

    // Files are rewritten in place and may be read again in the same process
    sharp.cache(false);
  }

  async runAll(folders: string[], options: RunOptions = { backup: false }): Promise<RunSummary> {
    const startTime = Date.now();
    let totals = emptyTotals();

    for (const folder of folders) {
      if (options.backup) {
        try {
          if (await isDirectory(folder)) {
            await this.backupFolder(folder);
          }
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          console.error(`\nBackup of ${folder} failed, skipping folder: ${message}`);
          continue;
        }
      }

      const result = await this.compressFolder(folder);
      totals = accumulate(totals, result);

      if (result.processed > 0) {
        this.printFolderSummary(result);
      }
    }

    return summarize(totals, Date.now() - startTime);
  }

  async compressFolder(folder: string): Promise<FolderResult> {
    const result: FolderResult = {
      folder,
      exists: false,
      processed: 0,
      originalSize: 0,
      compressedSize: 0,
      failed: [],
    };

    let files: string[] | null;
    try {
      files = await listJpegFiles(folder);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`\nWarning: cannot read folder ${folder}, skipping: ${message}`);
      return result;
    }

    if (files === null) {
      console.warn(`\nWarning: folder ${folder} does not exist, skipping`);
      return result;
    }
    result.exists = true;

    if (files.length === 0) {
      console.warn(`\nNo JPEG files found in ${folder}`);
      return result;
    }

    console.log(`\nProcessing folder: ${folder}`);
    console.log(`Found ${files.length} image files`);
    console.log(
      `Settings: max ${this.config.maxWidth}x${this.config.maxHeight}, quality ${this.config.encode.quality}`
    );
    console.log("-".repeat(60));

    for (const [i, file] of files.entries()) {
      process.stdout.write(`Processing (${i + 1}/${files.length}): ${file} ... `);

      const fileResult = await this.compressImage(path.join(folder, file));

      result.processed++;
      result.originalSize += fileResult.originalSize;
      result.compressedSize += fileResult.compressedSize;

      if (fileResult.error !== undefined) {
        result.failed.push({ file: fileResult.file, error: fileResult.error });
        console.log("skipped");
      } else if (fileResult.originalSize > 0) {
        const ratio = reductionPercent(fileResult.originalSize, fileResult.compressedSize);
        console.log(
          `done (${formatBytes(fileResult.originalSize)} -> ${formatBytes(fileResult.compressedSize)}, saved ${ratio.toFixed(1)}%)`
        );
      } else {
        console.log("done");
      }

      const every = this.config.progressEvery;
      if (every > 0 && (i + 1) % every === 0) {
        const saved = result.originalSize - result.compressedSize;
        const pct = reductionPercent(result.originalSize, result.compressedSize);
        console.log(
          `Progress: ${i + 1}/${files.length} files, saved ${formatBytes(saved)} (${pct.toFixed(1)}%)`
        );
      }
    }

    return result;
  }

  async inspect(inputPath: string): Promise<ImageFile> {
    const [stats, metadata] = await Promise.all([fs.stat(inputPath), sharp(inputPath).metadata()]);

    if (metadata.width === undefined || metadata.height === undefined) {
      throw new Error("Unable to read image dimensions");
    }

    return {
      path: inputPath,
      size: stats.size,
      ...orientedSize(metadata.width, metadata.height, metadata.orientation),
      channels: metadata.channels ?? 3,
      space: metadata.space ?? "srgb",
      hasAlpha: metadata.hasAlpha === true,
    };
  }

  /**
   * Re-encodes one image. Without `outputPath` the file is replaced in place;
   * when the input is a symlink its target is the file that gets replaced.
   */
  async compressImage(inputPath: string, outputPath?: string): Promise<FileCompressionResult> {
    let originalSize = 0;
    let tempOutput: string | undefined;

    try {
      originalSize = (await fs.stat(inputPath)).size;
      const destination = outputPath ?? (await fs.realpath(inputPath));

      const image = await this.inspect(inputPath);
      const target = computeTargetSize(image, this.config);

      tempOutput = path.join(
        path.dirname(destination),
        `.jpgbatch-${crypto.randomBytes(8).toString("hex")}.tmp`
      );

      let pipeline = sharp(inputPath, {
        failOn: "error",
        limitInputPixels: 268402689, // 16384 x 16384
        sequentialRead: true,
      }).rotate(); // Auto-rotate based on EXIF

      if (target) {
        pipeline = pipeline.resize(target.width, target.height, {
          fit: "fill",
          kernel: "lanczos3",
        });
      }

      // JPEG carries no alpha channel
      if (image.hasAlpha) {
        pipeline = pipeline.removeAlpha();
      }

      const { encode } = this.config;
      const info = await pipeline
        .jpeg({
          quality: encode.quality,
          progressive: encode.progressive,
          chromaSubsampling: encode.chromaSubsampling,
          quantisationTable: encode.quantisationTable,
          optimiseCoding: true,
        })
        .toFile(tempOutput);

      if (info.size === 0) {
        throw new Error("Generated file is empty");
      }

      // Guard against symlink at output path
      try {
        const outputLstat = await fs.lstat(destination);
        if (outputLstat.isSymbolicLink()) {
          throw new Error("Output path is a symbolic link, refusing to overwrite");
        }
      } catch (e) {
        if ((e as NodeJS.ErrnoException).code !== "ENOENT") throw e;
      }

      await fs.rename(tempOutput, destination);
      tempOutput = undefined;

      return {
        file: inputPath,
        originalSize,
        compressedSize: info.size,
        before: { width: image.width, height: image.height },
        after: { width: info.width, height: info.height },
      };
    } catch (err) {
      const partial = tempOutput;
      if (partial) {
        await fs.rm(partial, { force: true }).catch((cleanupErr: unknown) => {
          const reason = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
          console.warn(`Warning: could not remove ${partial}: ${reason}`);
        });
      }

      const message = err instanceof Error ? err.message : String(err);
      console.error(`\nError processing ${inputPath}: ${message}`);
      return {
        file: inputPath,
        originalSize,
        compressedSize: originalSize,
        error: message,
      };
    }
  }

  /**
   * Copies the folder's JPEG files to `<folder>_backup` unless that backup
   * folder already exists. Returns the backup path, or `null` when an earlier
   * backup was kept.
   */
  async backupFolder(folder: string): Promise<string | null> {
    const backupDir = backupDirFor(folder);

    if (await pathExists(backupDir)) {
      console.log(`\nBackup folder ${backupDir} already exists, keeping it`);
      return null;
    }

    const files = (await listJpegFiles(folder)) ?? [];
    const sizes = await Promise.all(files.map(async (file) => (await fs.stat(path.join(folder, file))).size));
    const requiredSpace = sizes.reduce((acc, size) => acc + size, 0);

    const { available } = await getDiskSpace(path.dirname(backupDir));
    if (available < requiredSpace * 1.2) {
      throw new Error("Insufficient disk space for backup");
    }

    console.log(`\nCreating backup folder: ${backupDir}`);
    await fs.mkdir(backupDir);

    for (const file of files) {
      const source = path.join(folder, file);
      const destination = path.join(backupDir, file);
      await fs.copyFile(source, destination);
      const { atime, mtime } = await fs.stat(source);
      await fs.utimes(destination, atime, mtime);
    }

    return backupDir;
  }

  private printFolderSummary(result: FolderResult): void {
    const pct = reductionPercent(result.originalSize, result.compressedSize);
    console.log(`\nFolder ${result.folder} summary:`);
    console.log(`  Files:      ${result.processed}`);
    console.log(`  Original:   ${formatBytes(result.originalSize)}`);
    console.log(`  Compressed: ${formatBytes(result.compressedSize)}`);
    console.log(`  Saved:      ${formatBytes(result.originalSize - result.compressedSize)} (${pct.toFixed(1)}%)`);
  }
}
