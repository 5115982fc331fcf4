import { extractVerdict } from "./pipeline/extractor.js";
import type { InferenceOutcome, Verdict, VerdictResolution } from "./types.js";

/**
 * Substituted whenever the model gives no usable answer. Risk-raising fields
 * default to false; residential_use and owner_verification, whose false value
 * is the risk signal, default to true.
 */
export const FALLBACK_VERDICT: Readonly<Verdict> = Object.freeze({
  excessive_loan: false,
  rights_restriction: false,
  trust_property: false,
  residential_use: true,
  tax_delinquency: false,
  owner_verification: true,
});

export function fallbackVerdict(): Verdict {
  return { ...FALLBACK_VERDICT };
}

export function resolveVerdict(outcome: InferenceOutcome): VerdictResolution {
  switch (outcome.status) {
    case "timed_out":
      return { source: "fallback", reason: "timed_out", verdict: fallbackVerdict() };
    case "upstream_failure":
      return {
        source: "fallback",
        reason: "upstream_failure",
        verdict: fallbackVerdict(),
        detail: outcome.reason,
      };
    case "success": {
      const extracted = extractVerdict(outcome.rawText);
      if (extracted.ok) {
        return { source: "model", verdict: extracted.verdict };
      }
      return {
        source: "fallback",
        reason: "extraction_failed",
        verdict: fallbackVerdict(),
        detail: extracted.error,
      };
    }
  }
}
