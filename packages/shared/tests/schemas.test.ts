import { describe, expect, it } from "vitest";
import { DecisionRequestInputSchema, OpinionDraftSchema, describeIssues } from "../src/schemas.js";

describe("DecisionRequestInputSchema", () => {
  it("defaults the currency and payload", () => {
    expect(DecisionRequestInputSchema.parse({ actionType: "spend", amount: 10 })).toEqual({
      actionType: "spend",
      amount: 10,
      currency: "USDC",
      payload: {},
    });
  });

  it("rejects unknown keys, negative amounts and bad timestamps", () => {
    expect(DecisionRequestInputSchema.safeParse({ actionType: "spend", extra: 1 }).success).toBe(false);
    expect(DecisionRequestInputSchema.safeParse({ actionType: "spend", amount: -1 }).success).toBe(false);
    expect(DecisionRequestInputSchema.safeParse({ actionType: "spend", deadline: "tomorrow" }).success).toBe(false);
    expect(DecisionRequestInputSchema.safeParse({ actionType: "spend", deadline: "2026-01-01T00:00:00+02:00" }).success).toBe(true);
  });
});

describe("OpinionDraftSchema", () => {
  it("bounds confidence to [0, 1]", () => {
    expect(OpinionDraftSchema.safeParse({ vote: "approve", confidence: 1, rationale: "" }).success).toBe(true);
    expect(OpinionDraftSchema.safeParse({ vote: "approve", confidence: 1.01, rationale: "" }).success).toBe(false);
  });
});

describe("describeIssues", () => {
  it("joins issues with their paths", () => {
    const result = DecisionRequestInputSchema.safeParse({ actionType: "spend", amount: "ten" });
    if (result.success) throw new Error("expected a failure");
    expect(describeIssues(result.error)).toBe("amount: Expected number, received string");
  });
});
