import { describe, it, expect } from "vitest";
import type { ComponentSpec } from "../../../platform/catalog/graph";
import type { SelectedComponent, StepCategory } from "../../../platform/session";
import { DEFAULT_ENGINE_CONFIG } from "../../config";
import { checkBudget, checkMotherboardCaseFormFactor, validateBuild } from "../buildValidationService";

const psuRule = DEFAULT_ENGINE_CONFIG.psu;

const STEP_OF: Record<StepCategory, number> = {
  cpu: 1,
  motherboard: 2,
  memory: 3,
  gpu: 4,
  storage: 5,
  psu: 6,
  case: 7,
  cooler: 8,
};

function picked(category: StepCategory, spec: ComponentSpec, raw = "", price = 100_000): SelectedComponent {
  return { step: STEP_OF[category], category, componentId: `${category}_1`, name: category, price, spec, raw };
}

function fullBuild(overrides: Partial<Record<StepCategory, SelectedComponent>> = {}): SelectedComponent[] {
  const base: Record<StepCategory, SelectedComponent> = {
    cpu: picked("cpu", { category: "cpu", socket: "AM5", tdp: 120 }),
    motherboard: picked("motherboard", { category: "motherboard", socket: "AM5", memoryType: "DDR5", formFactor: "ATX" }),
    memory: picked("memory", { category: "memory", memoryType: "DDR5" }),
    gpu: picked("gpu", { category: "gpu", tdp: 220, lengthMm: 301 }),
    storage: picked("storage", { category: "storage" }),
    psu: picked("psu", { category: "psu", wattage: 850 }),
    case: picked("case", { category: "case", formFactor: "ATX", maxGpuMm: 365, maxCoolerMm: 165 }, "CASE ATX / MATX"),
    cooler: picked("cooler", { category: "cooler", heightMm: 155 }),
  };
  return Object.values({ ...base, ...overrides });
}

describe("buildValidationService", () => {
  it("passes a compatible build with every rule reported", () => {
    const report = validateBuild(fullBuild(), 3_000_000, psuRule);
    expect(report.compatible).toBe(true);
    expect(report.results.map((r) => [r.ruleId, r.severity])).toEqual([
      ["cpu_motherboard_socket", "info"],
      ["memory_motherboard_type", "info"],
      ["motherboard_case_form_factor", "info"],
      ["gpu_case_length", "info"],
      ["psu_capacity", "info"],
      ["cooler_case_height", "info"],
      ["budget", "info"],
    ]);
    expect(report.results[4].message).toBe("850W PSU covers the 520W requirement");
  });

  it("reports violations as errors", () => {
    const report = validateBuild(
      fullBuild({
        memory: picked("memory", { category: "memory", memoryType: "DDR4" }),
        gpu: picked("gpu", { category: "gpu", tdp: 450, lengthMm: 301 }),
        psu: picked("psu", { category: "psu", wattage: 750 }),
      }),
      3_000_000,
      psuRule,
    );
    expect(report.compatible).toBe(false);
    expect(report.results.filter((r) => !r.passed).map((r) => r.message)).toEqual([
      "DDR4 memory does not fit a DDR5 motherboard",
      "750W PSU is below the 850W requirement",
    ]);
  });

  it("treats unknown values as passing warnings", () => {
    const report = validateBuild(
      fullBuild({ cpu: picked("cpu", { category: "cpu" }) }),
      3_000_000,
      psuRule,
    );
    expect(report.compatible).toBe(true);
    expect(report.results[0]).toEqual({
      ruleId: "cpu_motherboard_socket",
      passed: true,
      severity: "warning",
      message: "Socket unknown for CPU or motherboard",
    });
  });

  it("compares case form factors directly when the case has no catalog text", () => {
    const result = checkMotherboardCaseFormFactor(
      picked("motherboard", { category: "motherboard", formFactor: "ATX" }),
      picked("case", { category: "case", formFactor: "ITX" }),
    );
    expect(result).toEqual({
      ruleId: "motherboard_case_form_factor",
      passed: false,
      severity: "error",
      message: "Case is ITX, motherboard is ATX",
    });
  });

  it("flags a total over budget", () => {
    const result = checkBudget([picked("cpu", { category: "cpu" }), picked("gpu", { category: "gpu" })], 150_000);
    expect(result.passed).toBe(false);
    expect(result.message).toBe("Total 200000 exceeds budget 150000 by 50000");
  });

  it("only runs rules whose parts are both selected", () => {
    const report = validateBuild([picked("cpu", { category: "cpu", socket: "AM5" })], 1_000_000, psuRule);
    expect(report.results.map((r) => r.ruleId)).toEqual(["budget"]);
  });

  it("has nothing to check for an empty build", () => {
    expect(validateBuild([], 1_000_000, psuRule)).toEqual({ compatible: true, results: [] });
  });
});
