import { describe, expect, it } from "vitest";
import { createInputValidator } from "../input-validation";
import { ValidationError } from "../runtime/errors";

const validate = createInputValidator();

const issuesOf = (payload: unknown): unknown => {
  try {
    validate(payload);
  } catch (error) {
    if (error instanceof ValidationError) return error.details?.issues;
    throw error;
  }
  throw new Error("Expected the input to be rejected.");
};

describe("createInputValidator", () => {
  it("treats a missing input as empty", () => {
    expect(validate(undefined)).toEqual({});
    expect(validate(null)).toEqual({});
  });

  it("accepts a well-formed input", () => {
    const input = {
      targets: ["数据安全法"],
      concurrencyLimit: 4,
      strategyOrder: ["direct_url", "browser_search"],
      identities: [{ host: "10.0.0.5", port: "3128", tier: "free" }],
      levelThresholds: { low: { consecutiveBlocks: 2, blockRate: 0.2 } },
    };
    expect(validate(input)).toEqual(input);
  });

  it("reports each problem with its location", () => {
    expect(issuesOf({ concurrencyLimit: 60 })).toEqual(["/concurrencyLimit must be <= 50."]);
    expect(issuesOf({ bogus: 1 })).toEqual(["/ has unknown field 'bogus'."]);
    expect(issuesOf({ identities: [{ host: "10.0.0.5" }] })).toEqual([
      "/identities/0 missing required field 'port'.",
    ]);
    expect(issuesOf({ strategyOrder: ["carrier_pigeon"] })).toEqual([
      "/strategyOrder/0 must be equal to one of the allowed values.",
    ]);
  });
});
