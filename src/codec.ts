import sharp from "sharp";
import type { FormatTag, TargetFormat, TargetFormatName } from "./types.js";

export const TARGET_FORMATS: Record<TargetFormatName, TargetFormat> = {
  webp: { name: "webp", tag: "image/webp", extension: ".webp" },
  avif: { name: "avif", tag: "image/avif", extension: ".avif" },
};

export function isTargetFormatName(value: string): value is TargetFormatName {
  return Object.hasOwn(TARGET_FORMATS, value);
}

/**
 * Decode/encode capability the pipeline depends on. `probe` resolves to
 * `undefined` for anything it cannot identify and must not reject on bad input.
 */
export interface ImageCodec {
  probe(input: Buffer): Promise<FormatTag | undefined>;
  encode(input: Buffer, target: TargetFormat, quality: number): Promise<Buffer>;
}

const SHARP_FORMAT_TAGS: Record<string, FormatTag> = {
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  gif: "image/gif",
  tiff: "image/tiff",
  svg: "image/svg+xml",
  jp2: "image/jp2",
  jxl: "image/jxl",
  pdf: "application/pdf",
};

const MAX_INPUT_PIXELS = 268402689; // 16384 x 16384

export class SharpCodec implements ImageCodec {
  constructor(cacheMemoryMb = 512) {
    sharp.cache({ memory: cacheMemoryMb });
  }

  async probe(input: Buffer): Promise<FormatTag | undefined> {
    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(input, { limitInputPixels: MAX_INPUT_PIXELS }).metadata();
    } catch {
      return undefined;
    }

    const format: string | undefined = metadata.format;
    if (!format) return undefined;

    if (format === "heif") {
      return metadata.compression === "av1" ? "image/avif" : "image/heif";
    }
    return SHARP_FORMAT_TAGS[format] ?? `image/${format}`;
  }

  async encode(input: Buffer, target: TargetFormat, quality: number): Promise<Buffer> {
    const pipeline = sharp(input, {
      failOnError: true,
      limitInputPixels: MAX_INPUT_PIXELS,
      sequentialRead: true,
    });

    const metadata = await pipeline.metadata();

    let instance = pipeline.rotate(); // EXIF orientation

    const space: string | undefined = metadata.space;
    if (space === "rgb" || space === "display-p3") {
      instance = instance.toColorspace("srgb");
    }

    if (target.name === "avif") {
      return instance.avif({ quality, effort: 4 }).toBuffer();
    }

    return instance
      .webp({
        quality,
        effort: 6,
        alphaQuality: 100,
        lossless: false,
        smartSubsample: true,
        nearLossless: false,
      })
      .toBuffer();
  }
}
