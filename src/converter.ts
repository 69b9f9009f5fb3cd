import path from "node:path";
import fs from "node:fs/promises";
import { catalog } from "./catalog.js";
import { SharpCodec, TARGET_FORMATS, type ImageCodec } from "./codec.js";
import { errorMessage } from "./errors.js";
import { summarize } from "./report.js";
import { defaultWidth, schedule } from "./scheduler.js";
import { clampQuality, formatBytes, normalizeFormatTag } from "./utils.js";
import { convertTask, resolveOutputPath } from "./worker.js";
import type { BatchResult, ConversionTask, ConverterConfig, ConverterOptions, TaskOutcome } from "./types.js";

export const DEFAULT_QUALITY = 80;
export const DEFAULT_MIME_TYPES = ["image/jpeg", "image/png", "image/gif"];

export function resolveOptions(options: Partial<ConverterOptions> = {}): ConverterConfig {
  const target = TARGET_FORMATS[options.format ?? "webp"];

  return {
    quality: clampQuality(options.quality ?? DEFAULT_QUALITY),
    target,
    allowedFormats: new Set((options.allowedFormats ?? DEFAULT_MIME_TYPES).map(normalizeFormatTag)),
    skipFormats: new Set((options.skipFormats ?? [target.tag]).map(normalizeFormatTag)),
    deleteOriginal: options.deleteOriginal ?? false,
    concurrency: Math.max(1, Math.floor(options.concurrency ?? defaultWidth())),
    progress: options.progress ?? false,
  };
}

export class BatchConverter {
  readonly config: ConverterConfig;
  private readonly codec: ImageCodec;

  constructor(options: Partial<ConverterOptions> = {}, codec: ImageCodec = new SharpCodec()) {
    this.config = resolveOptions(options);
    this.codec = codec;
  }

  async run(input: string, output: string): Promise<BatchResult> {
    const startTime = Date.now();

    const { inputRoot, files } = await catalog(input, this.config.target.extension);
    const outputRoot = path.resolve(output);
    await fs.mkdir(outputRoot, { recursive: true });

    const tasks = files.map((sourcePath) => this.createTask(sourcePath, inputRoot, outputRoot));
    const outcomes = await this.processTasks(tasks);

    return { outcomes, report: summarize(outcomes, Date.now() - startTime) };
  }

  private createTask(sourcePath: string, inputRoot: string, outputRoot: string): ConversionTask {
    return Object.freeze({
      sourcePath,
      inputRoot,
      outputRoot,
      quality: this.config.quality,
      target: this.config.target,
      allowedFormats: this.config.allowedFormats,
      skipFormats: this.config.skipFormats,
      deleteOriginal: this.config.deleteOriginal,
    });
  }

  private async processTasks(tasks: ConversionTask[]): Promise<TaskOutcome[]> {
    const groups = groupByDestination(tasks);
    let done = 0;
    let savedBytes = 0;

    const results = await schedule(groups, {
      width: this.config.concurrency,
      run: (group) => this.convertGroup(group),
      recover: (group, err) =>
        group.map((task): TaskOutcome => ({ status: "error", source: task.sourcePath, message: errorMessage(err) })),
      onSettled: (groupOutcomes) => {
        if (!this.config.progress) return;
        for (const outcome of groupOutcomes) {
          if (outcome.status === "converted") {
            savedBytes += outcome.inputBytes - outcome.outputBytes;
          }
        }
        done += groupOutcomes.length;
        const progress = ((done / tasks.length) * 100).toFixed(1);
        process.stdout.write(`\rProgress: ${progress}% (${done}/${tasks.length}) | Saved: ${formatBytes(savedBytes)}`);
      },
    });

    if (this.config.progress && tasks.length > 0) {
      process.stdout.write("\n");
    }

    const outcomes = new Map<ConversionTask, TaskOutcome>();
    groups.forEach((group, i) => group.forEach((task, j) => outcomes.set(task, results[i][j])));

    return tasks.map(
      (task): TaskOutcome =>
        outcomes.get(task) ?? { status: "error", source: task.sourcePath, message: "Task was not scheduled" }
    );
  }

  /**
   * Runs tasks sharing one destination in catalog order; the first one
   * converted owns the file and later eligible ones fail.
   */
  private async convertGroup(group: ConversionTask[]): Promise<TaskOutcome[]> {
    const outcomes: TaskOutcome[] = [];
    let claimedBy: string | undefined;

    for (const task of group) {
      const outcome = await convertTask(task, this.codec, { claimedBy });
      if (outcome.status === "converted") claimedBy = task.sourcePath;
      outcomes.push(outcome);
    }

    return outcomes;
  }
}

function groupByDestination(tasks: ConversionTask[]): ConversionTask[][] {
  const groups = new Map<string, ConversionTask[]>();

  for (const task of tasks) {
    const dest = resolveOutputPath(task);
    const group = groups.get(dest);
    if (group) {
      group.push(task);
    } else {
      groups.set(dest, [task]);
    }
  }

  return [...groups.values()];
}
