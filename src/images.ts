import type Sharp from "sharp";
import path from "node:path";
import fs from "node:fs/promises";
import { MissingOptionalDependencyError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

export type SharpFactory = typeof Sharp;
export type SharpLoader = () => Promise<SharpFactory>;

export const COVER_MAX_DIMENSION = 1200;
export const COVER_QUALITY = 85;

export async function loadSharp(): Promise<SharpFactory> {
  const mod = await import("sharp");
  return mod.default;
}

/**
 * Resizes cover art with sharp. When sharp cannot be loaded the images are
 * copied verbatim; the warning is logged once per run.
 */
export class ImageOptimizer {
  private sharpPromise?: Promise<SharpFactory | null>;

  constructor(
    private readonly logger: Logger,
    private readonly loader: SharpLoader = loadSharp,
  ) {}

  private resolveSharp(): Promise<SharpFactory | null> {
    this.sharpPromise ??= this.loader().then(
      (factory) => {
        factory.cache({ memory: 128 });
        return factory;
      },
      (err: unknown) => {
        const warning = new MissingOptionalDependencyError(
          "sharp",
          `sharp is unavailable (${errorMessage(err)}); cover images will be copied without optimization`,
          { cause: err },
        );
        this.logger.warn(warning.message);
        return null;
      },
    );
    return this.sharpPromise;
  }

  /** Writes the optimized (or copied) image to `outputPath`. */
  async optimize(inputPath: string, outputPath: string): Promise<"converted" | "copied"> {
    const sharp = await this.resolveSharp();
    if (!sharp) {
      await fs.copyFile(inputPath, outputPath);
      return "copied";
    }

    let pipeline = sharp(inputPath, { failOn: "error", sequentialRead: true })
      .rotate() // Auto-rotate based on EXIF
      .resize({
        width: COVER_MAX_DIMENSION,
        height: COVER_MAX_DIMENSION,
        fit: "inside",
        withoutEnlargement: true,
      });

    const ext = path.extname(inputPath).toLowerCase();
    if (ext === ".png") {
      pipeline = pipeline.png({ compressionLevel: 9 });
    } else if (ext === ".webp") {
      pipeline = pipeline.webp({ quality: COVER_QUALITY, effort: 6 });
    } else {
      pipeline = pipeline.jpeg({ quality: COVER_QUALITY, mozjpeg: true });
    }

    await pipeline.toFile(outputPath);
    return "converted";
  }
}
