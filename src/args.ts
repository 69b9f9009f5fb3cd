import { isTargetFormatName } from "./codec.js";
import { DEFAULT_QUALITY } from "./converter.js";
import { UsageError } from "./errors.js";
import { clampQuality, normalizeFormatTag } from "./utils.js";
import type { ParsedArgs } from "./types.js";

const FLAGS = new Set([
  "-h", "--help",
  "-v", "--version",
  "-o", "--output",
  "-q", "--quality",
  "-f", "--format",
  "-j", "--jobs",
  "-m", "--mime-types",
  "-s", "--skip-types",
  "--delete",
]);

/**
 * List flags take every following argument up to the next flag, so
 * `-m jpeg png photos/` reads `photos/` as a type; put the path first or
 * use commas (`-m jpeg,png`).
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const positionals: string[] = [];
  const result: ParsedArgs = {
    input: ".",
    output: ".",
    quality: DEFAULT_QUALITY,
    format: "webp",
    deleteOriginal: false,
    help: false,
    version: false,
  };

  const takeValue = (flag: string, index: number): string => {
    const next = args[index];
    if (next === undefined || FLAGS.has(next)) {
      throw new UsageError(`${flag} requires a value`);
    }
    return next;
  };

  const takeList = (start: number): { values: string[]; next: number } => {
    const values: string[] = [];
    let i = start;
    while (i < args.length && !args[i].startsWith("-")) {
      values.push(...args[i].split(",").filter((v) => v.trim() !== "").map(normalizeFormatTag));
      i++;
    }
    return { values, next: i - 1 };
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "--delete") {
      result.deleteOriginal = true;
      continue;
    }

    if (arg === "-q" || arg === "--quality") {
      const next = takeValue(arg, ++i);
      const val = parseInt(next, 10);
      if (isNaN(val)) {
        throw new UsageError(`invalid quality value: ${next}`);
      }
      result.quality = clampQuality(val);
      continue;
    }

    if (arg === "-o" || arg === "--output") {
      result.output = takeValue(arg, ++i);
      continue;
    }

    if (arg === "-f" || arg === "--format") {
      const next = takeValue(arg, ++i).toLowerCase();
      if (!isTargetFormatName(next)) {
        throw new UsageError(`unsupported output format: ${next}`);
      }
      result.format = next;
      continue;
    }

    if (arg === "-j" || arg === "--jobs") {
      const next = takeValue(arg, ++i);
      const val = parseInt(next, 10);
      if (isNaN(val) || val < 1) {
        throw new UsageError(`invalid jobs value: ${next}`);
      }
      result.jobs = val;
      continue;
    }

    if (arg === "-m" || arg === "--mime-types") {
      const { values, next } = takeList(i + 1);
      result.mimeTypes = values;
      i = next;
      continue;
    }

    if (arg === "-s" || arg === "--skip-types") {
      const { values, next } = takeList(i + 1);
      result.skipTypes = values;
      i = next;
      continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`unknown option: ${arg}`);
    }

    positionals.push(arg);
  }

  if (positionals.length > 1) {
    throw new UsageError(`expected at most one input path, got ${positionals.length}`);
  }
  if (positionals.length === 1) {
    result.input = positionals[0];
  }

  return result;
}
