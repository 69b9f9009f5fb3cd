import path from "node:path";
import type { FormatTag } from "./types.js";

const FORMAT_ALIASES: Record<string, string> = {
  jpg: "jpeg",
  jpe: "jpeg",
  tif: "tiff",
  svg: "svg+xml",
};

export function normalizeFormatTag(value: string): FormatTag {
  const lower = value.trim().toLowerCase();
  if (lower.includes("/")) return lower;
  return `image/${FORMAT_ALIASES[lower] ?? lower}`;
}

export function hasExtension(filePath: string, extension: string): boolean {
  return path.extname(filePath).toLowerCase() === extension.toLowerCase();
}

export function clampQuality(quality: number): number {
  return Math.max(1, Math.min(Math.round(quality), 100));
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

  return `${sign}${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}
