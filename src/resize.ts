import type { CompressionConfig, ConfigOverrides, Dimensions, PresetName, ResizeBounds } from "./types.js";

export const PRESETS: Record<PresetName, CompressionConfig> = {
  standard: {
    maxWidth: 600,
    maxHeight: 600,
    encode: {
      quality: 60,
      progressive: false,
      chromaSubsampling: "4:2:0",
      quantisationTable: 0,
    },
    progressEvery: 0,
  },
  ultra: {
    maxWidth: 400,
    maxHeight: 400,
    encode: {
      quality: 40,
      progressive: true,
      chromaSubsampling: "4:2:0",
      // ImageMagick tables: coarser high-frequency steps than Annex K
      quantisationTable: 3,
    },
    progressEvery: 100,
  },
};

export function clampQuality(quality: number): number {
  return Math.max(1, Math.min(Math.round(quality), 100));
}

export function resolveConfig(preset: PresetName, overrides: ConfigOverrides = {}): CompressionConfig {
  const base = PRESETS[preset];
  return {
    maxWidth: overrides.maxWidth ?? base.maxWidth,
    maxHeight: overrides.maxHeight ?? base.maxHeight,
    encode: {
      ...base.encode,
      quality: clampQuality(overrides.quality ?? base.encode.quality),
    },
    progressEvery: base.progressEvery,
  };
}

/**
 * Dimensions as displayed once EXIF orientation is applied. Orientations 5-8
 * rotate by 90 degrees and swap width and height.
 */
export function orientedSize(width: number, height: number, orientation?: number): Dimensions {
  return orientation !== undefined && orientation >= 5 && orientation <= 8
    ? { width: height, height: width }
    : { width, height };
}

export function needsResize(size: Dimensions, bounds: ResizeBounds): boolean {
  return size.width > bounds.maxWidth || size.height > bounds.maxHeight;
}

/**
 * Target size for an image that must fit inside `bounds`, or `null` when it
 * already fits. Never upscales.
 *
 * With `s = min(maxW / W, maxH / H)`, each side becomes `floor(side * s)`,
 * evaluated as an integer quotient against the winning ratio so the bounding
 * side lands exactly on its bound.
 */
export function computeTargetSize(size: Dimensions, bounds: ResizeBounds): Dimensions | null {
  if (!needsResize(size, bounds)) {
    return null;
  }

  const { width, height } = size;
  // maxW/W <= maxH/H, compared without division
  const widthBound = bounds.maxWidth * height <= bounds.maxHeight * width;
  const [num, den] = widthBound ? [bounds.maxWidth, width] : [bounds.maxHeight, height];

  return {
    width: Math.max(1, Math.floor((width * num) / den)),
    height: Math.max(1, Math.floor((height * num) / den)),
  };
}
