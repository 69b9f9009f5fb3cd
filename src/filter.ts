import type { ConversionTask, Eligibility, FormatTag } from "./types.js";

export type EligibilityRules = Pick<ConversionTask, "target" | "allowedFormats" | "skipFormats">;

/**
 * Decides from the content-derived format whether a file gets converted.
 * The target check runs first, so a file already in the output format is
 * never re-encoded whatever the allow and skip sets say; the skip set wins
 * over the allow set.
 */
export function classify(format: FormatTag | undefined, rules: EligibilityRules): Eligibility {
  if (format !== undefined && format === rules.target.tag) {
    return { eligible: false, reason: "already-target-format", format };
  }

  if (format === undefined) {
    return { eligible: false, reason: "unknown-format" };
  }

  if (rules.skipFormats.has(format)) {
    return { eligible: false, reason: "explicitly-skipped-format", format };
  }

  if (!rules.allowedFormats.has(format)) {
    return { eligible: false, reason: "unsupported-format", format };
  }

  return { eligible: true, format };
}
