import { z } from "zod";

import type { Verdict } from "../types.js";

export type JsonObject = Record<string, unknown>;

export type ExtractionStrategy = (text: string) => JsonObject | undefined;

const TRUTHY_TOKENS = new Set(["true", "1", "yes"]);

/**
 * Total coercion of an upstream verdict value. `true`, the number 1 and the
 * strings "true", "1" and "yes" (any case, surrounding whitespace ignored)
 * are true; every other value is false.
 */
export function normalizeFlag(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value === 1;
  }
  if (typeof value === "string") {
    return TRUTHY_TOKENS.has(value.trim().toLowerCase());
  }
  return false;
}

function parseObject(candidate: string): JsonObject | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(parsed));
}

const FENCED_JSON = /```json\s*(\{[\s\S]*?\})\s*```/i;
const INLINE_VERDICT = /\{[^{}]*"excessive_loan"[^{}]*\}/;

export const fencedJsonBlock: ExtractionStrategy = (text) => {
  const match = FENCED_JSON.exec(text);
  return match?.[1] === undefined ? undefined : parseObject(match[1]);
};

export const inlineVerdictObject: ExtractionStrategy = (text) => {
  const match = INLINE_VERDICT.exec(text);
  return match ? parseObject(match[0]) : undefined;
};

export const wholeText: ExtractionStrategy = (text) => parseObject(text.trim());

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  fencedJsonBlock,
  inlineVerdictObject,
  wholeText,
];

const flag = z
  .unknown()
  .refine((value) => value !== undefined, { message: "Required" })
  .transform(normalizeFlag);

export const verdictSchema: z.ZodType<Verdict, z.ZodTypeDef, unknown> = z.object({
  excessive_loan: flag,
  rights_restriction: flag,
  trust_property: flag,
  residential_use: flag,
  tax_delinquency: flag,
  owner_verification: flag,
});

export function extractCandidate(
  text: string,
  strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES,
): JsonObject | undefined {
  for (const strategy of strategies) {
    const candidate = strategy(text);
    if (candidate) {
      return candidate;
    }
  }
  return undefined;
}

export type ExtractionResult =
  | { ok: true; verdict: Verdict }
  | { ok: false; error: string };

export function extractVerdict(text: string): ExtractionResult {
  const candidate = extractCandidate(text);
  if (!candidate) {
    return { ok: false, error: "no JSON object found in model response" };
  }
  const parsed = verdictSchema.safeParse(candidate);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    return { ok: false, error: `model response is missing verdict fields: ${missing}` };
  }
  return { ok: true, verdict: parsed.data };
}
