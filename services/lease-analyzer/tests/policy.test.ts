import { describe, expect, it } from "vitest";

import { FALLBACK_VERDICT, fallbackVerdict, resolveVerdict } from "../src/policy.js";
import { fencedVerdict } from "./fixtures/documents.js";

const expectedFallback = {
  excessive_loan: false,
  rights_restriction: false,
  trust_property: false,
  residential_use: true,
  tax_delinquency: false,
  owner_verification: true,
};

describe("fallback verdict", () => {
  it("is the fixed conservative constant", () => {
    expect(FALLBACK_VERDICT).toEqual(expectedFallback);
    expect(Object.isFrozen(FALLBACK_VERDICT)).toBe(true);
  });

  it("hands out independent copies", () => {
    const first = fallbackVerdict();
    first.excessive_loan = true;
    expect(fallbackVerdict()).toEqual(expectedFallback);
  });
});

describe("resolveVerdict", () => {
  it("uses the model answer when it validates", () => {
    const verdict = { ...expectedFallback, excessive_loan: true, owner_verification: false };
    expect(resolveVerdict({ status: "success", rawText: fencedVerdict(verdict) })).toEqual({
      source: "model",
      verdict,
    });
  });

  it("falls back on timeout", () => {
    expect(resolveVerdict({ status: "timed_out" })).toEqual({
      source: "fallback",
      reason: "timed_out",
      verdict: expectedFallback,
    });
  });

  it("falls back on upstream failure", () => {
    expect(resolveVerdict({ status: "upstream_failure", reason: "503 Service Unavailable" })).toEqual({
      source: "fallback",
      reason: "upstream_failure",
      verdict: expectedFallback,
      detail: "503 Service Unavailable",
    });
  });

  it("falls back when extraction fails", () => {
    expect(resolveVerdict({ status: "success", rawText: '{"excessive_loan": true}' })).toEqual({
      source: "fallback",
      reason: "extraction_failed",
      verdict: expectedFallback,
      detail:
        "model response is missing verdict fields: rights_restriction, trust_property, residential_use, tax_delinquency, owner_verification",
    });
  });
});
