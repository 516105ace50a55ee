import { describe, it, expect } from "vitest";
import { SELECTION_STEPS, SESSION_PURPOSES } from "../../../platform/session";
import { allocateStepBudget, BUDGET_SHARES } from "../budgetAllocation";

describe("budgetAllocation", () => {
  it("gives every purpose shares summing to 100", () => {
    for (const purpose of SESSION_PURPOSES) {
      const total = SELECTION_STEPS.reduce((sum, c) => sum + BUDGET_SHARES[purpose][c], 0);
      expect(total).toBe(100);
    }
  });

  it("allocates the purpose share of the total budget", () => {
    expect(allocateStepBudget(1_000_000, 1_000_000, "gaming", "gpu")).toBe(350_000);
    expect(allocateStepBudget(1_000_000, 1_000_000, "workstation", "cpu")).toBe(300_000);
  });

  it("floors fractional amounts", () => {
    expect(allocateStepBudget(333_333, 333_333, "general", "cooler")).toBe(13_333);
  });

  it("never exceeds what remains", () => {
    expect(allocateStepBudget(1_000_000, 100_000, "gaming", "gpu")).toBe(100_000);
  });

  it("is zero once the budget is overspent", () => {
    expect(allocateStepBudget(1_000_000, -5_000, "gaming", "case")).toBe(0);
  });
});
