/** Content-derived format identifier, e.g. `image/png`. */
export type FormatTag = string;

export type TargetFormatName = "webp" | "avif";

export interface TargetFormat {
  name: TargetFormatName;
  tag: FormatTag;
  extension: string;
}

export interface ConverterOptions {
  quality: number;
  format: TargetFormatName;
  allowedFormats: FormatTag[];
  skipFormats: FormatTag[];
  deleteOriginal: boolean;
  concurrency: number;
  progress: boolean;
}

export interface ConverterConfig {
  quality: number;
  target: TargetFormat;
  allowedFormats: ReadonlySet<FormatTag>;
  skipFormats: ReadonlySet<FormatTag>;
  deleteOriginal: boolean;
  concurrency: number;
  progress: boolean;
}

export interface ConversionTask {
  readonly sourcePath: string;
  readonly inputRoot: string;
  readonly outputRoot: string;
  readonly quality: number;
  readonly target: TargetFormat;
  readonly allowedFormats: ReadonlySet<FormatTag>;
  readonly skipFormats: ReadonlySet<FormatTag>;
  readonly deleteOriginal: boolean;
}

export type SkipReason =
  | "already-target-format"
  | "unknown-format"
  | "explicitly-skipped-format"
  | "unsupported-format";

export type Eligibility =
  | { eligible: true; format: FormatTag }
  | { eligible: false; reason: SkipReason; format?: FormatTag };

export interface ConvertedOutcome {
  status: "converted";
  source: string;
  dest: string;
  inputBytes: number;
  outputBytes: number;
  deleted: boolean;
  deleteError?: string;
}

export interface SkippedOutcome {
  status: "skipped";
  source: string;
  reason: SkipReason;
  format?: FormatTag;
}

export interface ErrorOutcome {
  status: "error";
  source: string;
  message: string;
}

export type TaskOutcome = ConvertedOutcome | SkippedOutcome | ErrorOutcome;

export interface BatchReport {
  total: number;
  converted: number;
  skipped: number;
  errors: number;
  deleted: number;
  deleteFailures: number;
  inputBytes: number;
  outputBytes: number;
  savedBytes: number;
  elapsedMs: number | null;
  throughput: number;
}

export interface BatchResult {
  outcomes: TaskOutcome[];
  report: BatchReport;
}

export interface CatalogEntry {
  inputRoot: string;
  files: string[];
}

export interface ParsedArgs {
  input: string;
  output: string;
  quality: number;
  format: TargetFormatName;
  mimeTypes?: FormatTag[];
  skipTypes?: FormatTag[];
  deleteOriginal: boolean;
  jobs?: number;
  help: boolean;
  version: boolean;
}
