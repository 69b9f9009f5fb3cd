import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import sharp from "sharp";
import { TARGET_FORMATS, type ImageCodec } from "../codec.js";
import type { ConversionTask, FormatTag, TargetFormat } from "../types.js";

export function tmpDir(): string {
  return path.join(os.tmpdir(), `recode-images-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

export async function writeFile(filePath: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

export async function createTestImage(
  filePath: string,
  format: "png" | "jpeg" | "gif" | "webp" = "png",
  width = 10,
  height = 10,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: { width, height, channels: 3, background: { r: 255, g: 0, b: 0 } },
  })
    .toFormat(format)
    .toFile(filePath);
}

/**
 * Reads files written as `FAKE:<tag>:<payload>`. A payload containing
 * `BROKEN` makes `encode` reject.
 */
export class FakeCodec implements ImageCodec {
  probes = 0;
  encodes = 0;

  async probe(input: Buffer): Promise<FormatTag | undefined> {
    this.probes++;
    const match = /^FAKE:([^:]+):/.exec(input.toString("utf8"));
    return match ? match[1] : undefined;
  }

  async encode(input: Buffer, target: TargetFormat, quality: number): Promise<Buffer> {
    this.encodes++;
    const text = input.toString("utf8");
    if (text.includes("BROKEN")) {
      throw new Error("encoder failed");
    }
    return Buffer.from(`${target.tag}@${quality}`);
  }
}

export function fakeImage(tag: FormatTag, payload = "pixels"): string {
  return `FAKE:${tag}:${payload}`;
}

export function makeTask(overrides: Partial<ConversionTask> & Pick<ConversionTask, "sourcePath" | "inputRoot" | "outputRoot">): ConversionTask {
  return {
    quality: 80,
    target: TARGET_FORMATS.webp,
    allowedFormats: new Set(["image/jpeg", "image/png", "image/gif"]),
    skipFormats: new Set(["image/webp"]),
    deleteOriginal: false,
    ...overrides,
  };
}
