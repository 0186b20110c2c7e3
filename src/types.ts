export type PresetName = "standard" | "ultra";

export type ChromaSubsampling = "4:2:0" | "4:4:4";

export interface Dimensions {
  width: number;
  height: number;
}

export interface ResizeBounds {
  maxWidth: number;
  maxHeight: number;
}

export interface EncodeOptions {
  quality: number;
  progressive: boolean;
  chromaSubsampling: ChromaSubsampling;
  quantisationTable: number;
}

export interface CompressionConfig extends ResizeBounds {
  encode: EncodeOptions;
  /** Print a running total every N files; 0 disables it. */
  progressEvery: number;
}

export interface ConfigOverrides {
  maxWidth?: number;
  maxHeight?: number;
  quality?: number;
}

export interface ImageFile extends Dimensions {
  path: string;
  size: number;
  channels: number;
  space: string;
  hasAlpha: boolean;
}

export interface FailedFile {
  file: string;
  error: string;
}

export interface FileCompressionResult {
  file: string;
  originalSize: number;
  compressedSize: number;
  before?: Dimensions;
  after?: Dimensions;
  error?: string;
}

export interface FolderResult {
  folder: string;
  exists: boolean;
  processed: number;
  originalSize: number;
  compressedSize: number;
  failed: FailedFile[];
}

export interface RunTotals {
  folders: FolderResult[];
  processed: number;
  originalSize: number;
  compressedSize: number;
  failed: FailedFile[];
}

export interface RunSummary extends RunTotals {
  duration: string;
  totalSize: string;
  compressedTotal: string;
  savedSize: string;
  reduction: string;
}

export interface RunOptions {
  backup: boolean;
}

export interface RenameEntry {
  index: number;
  source: string;
  target: string;
}

export interface RenamePlan {
  prefix: string;
  width: number;
  entries: RenameEntry[];
}

export interface RenameResult {
  total: number;
  renamed: RenameEntry[];
  unchanged: RenameEntry[];
  collisions: RenameEntry[];
}

export interface CompressArgs {
  command: "compress";
  preset: PresetName;
  folders: string[];
  overrides: ConfigOverrides;
  backup: boolean;
  yes: boolean;
}

export interface RenameArgs {
  command: "rename";
  folder: string;
  prefix: string;
  dryRun: boolean;
}

export type ParsedArgs =
  | { command: "help" }
  | { command: "version" }
  | CompressArgs
  | RenameArgs;
