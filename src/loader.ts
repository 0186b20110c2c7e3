export type CompressorModule = typeof import("./compressor.js");

export class MissingDependencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MissingDependencyError";
  }
}

/**
 * Imports the compressor, which pulls in sharp. `rename` never calls this, so
 * it keeps working on machines where sharp is not installed.
 */
export async function loadCompressor(
  importer: () => Promise<CompressorModule> = () => import("./compressor.js")
): Promise<CompressorModule> {
  try {
    return await importer();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MissingDependencyError(`the sharp imaging library could not be loaded: ${message}`);
  }
}
