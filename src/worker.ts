import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { classify } from "./filter.js";
import { errorMessage } from "./errors.js";
import type { ImageCodec } from "./codec.js";
import type { ConversionTask, ConvertedOutcome, TaskOutcome } from "./types.js";

export function resolveOutputPath(task: ConversionTask): string {
  const relative = path.relative(task.inputRoot, task.sourcePath);
  const { dir, name } = path.parse(relative);
  return path.join(task.outputRoot, dir, `${name}${task.target.extension}`);
}

export interface ConvertTaskOptions {
  /** Source already converted to this task's destination; an eligible task then fails instead of overwriting it. */
  claimedBy?: string;
}

/**
 * Converts one file. Never rejects: every failure becomes an outcome so one
 * bad file cannot take down its siblings.
 */
export async function convertTask(
  task: ConversionTask,
  codec: ImageCodec,
  options: ConvertTaskOptions = {}
): Promise<TaskOutcome> {
  const source = task.sourcePath;
  let tempOutput: string | undefined;

  try {
    const input = await fs.readFile(source);
    const eligibility = classify(await codec.probe(input), task);

    if (!eligibility.eligible) {
      return { status: "skipped", source, reason: eligibility.reason, format: eligibility.format };
    }

    const dest = resolveOutputPath(task);
    if (options.claimedBy !== undefined) {
      throw new Error(`Destination ${dest} is already written by ${options.claimedBy}`);
    }

    await fs.mkdir(path.dirname(dest), { recursive: true });

    const output = await codec.encode(input, task.target, task.quality);
    if (output.length === 0) {
      throw new Error("Generated file is empty");
    }

    tempOutput = path.join(
      path.dirname(dest),
      `.${path.parse(dest).name}-${crypto.randomBytes(8).toString("hex")}.tmp`
    );
    await fs.writeFile(tempOutput, output);

    // Guard against symlink at output path
    try {
      const destLstat = await fs.lstat(dest);
      if (destLstat.isSymbolicLink()) {
        throw new Error("Output path is a symbolic link — refusing to overwrite");
      }
    } catch (e) {
      if ((e as NodeJS.ErrnoException).code !== "ENOENT") throw e;
    }

    await fs.rename(tempOutput, dest);
    tempOutput = undefined;

    const outcome: ConvertedOutcome = {
      status: "converted",
      source,
      dest,
      inputBytes: input.length,
      outputBytes: output.length,
      deleted: false,
    };

    if (task.deleteOriginal) {
      try {
        await fs.unlink(source);
        outcome.deleted = true;
      } catch (err) {
        outcome.deleteError = errorMessage(err);
      }
    }

    return outcome;
  } catch (err) {
    if (tempOutput) {
      await fs.rm(tempOutput, { force: true }).catch((rmErr: unknown) => {
        console.warn(`Warning: could not remove temporary file ${tempOutput}: ${errorMessage(rmErr)}`);
      });
    }
    return { status: "error", source, message: errorMessage(err) };
  }
}
