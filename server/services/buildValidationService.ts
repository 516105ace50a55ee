import { specFields } from "../../platform/catalog/graph";
import type { SelectedComponent, StepCategory } from "../../platform/session";
import { requiredPsuWattage, type PsuRuleConfig } from "../config";
import { caseMentionsFormFactor } from "../graph/compatibilityRules";

export type RuleSeverity = "error" | "warning" | "info";

export type RuleResult = Readonly<{
  ruleId: string;
  passed: boolean;
  severity: RuleSeverity;
  message: string;
}>;

export type BuildReport = Readonly<{
  compatible: boolean;
  results: RuleResult[];
}>;

type Picked = Partial<Record<StepCategory, SelectedComponent>>;

function ok(ruleId: string, message: string): RuleResult {
  return { ruleId, passed: true, severity: "info", message };
}

function unknown(ruleId: string, message: string): RuleResult {
  return { ruleId, passed: true, severity: "warning", message };
}

function fail(ruleId: string, message: string): RuleResult {
  return { ruleId, passed: false, severity: "error", message };
}

export function checkCpuMotherboardSocket(cpu: SelectedComponent, mb: SelectedComponent): RuleResult {
  const id = "cpu_motherboard_socket";
  const a = specFields(cpu.spec).socket;
  const b = specFields(mb.spec).socket;
  if (a === undefined || b === undefined) return unknown(id, "Socket unknown for CPU or motherboard");
  return a === b
    ? ok(id, `CPU and motherboard share socket ${a}`)
    : fail(id, `CPU socket ${a} does not fit motherboard socket ${b}`);
}

export function checkMemoryMotherboardType(memory: SelectedComponent, mb: SelectedComponent): RuleResult {
  const id = "memory_motherboard_type";
  const a = specFields(memory.spec).memoryType;
  const b = specFields(mb.spec).memoryType;
  if (a === undefined || b === undefined) return unknown(id, "Memory type unknown for memory or motherboard");
  return a === b
    ? ok(id, `Memory and motherboard both use ${a}`)
    : fail(id, `${a} memory does not fit a ${b} motherboard`);
}

export function checkMotherboardCaseFormFactor(mb: SelectedComponent, pcCase: SelectedComponent): RuleResult {
  const id = "motherboard_case_form_factor";
  const formFactor = specFields(mb.spec).formFactor;
  if (formFactor === undefined) return unknown(id, "Motherboard form factor unknown");
  if (!pcCase.raw) {
    const caseFormFactor = specFields(pcCase.spec).formFactor;
    if (caseFormFactor === undefined) return unknown(id, "Case form factor unknown");
    return caseFormFactor === formFactor
      ? ok(id, `Case supports ${formFactor}`)
      : fail(id, `Case is ${caseFormFactor}, motherboard is ${formFactor}`);
  }
  if (specFields(pcCase.spec).formFactor === undefined) return unknown(id, "Case form factor unknown");
  return caseMentionsFormFactor(pcCase.raw, formFactor)
    ? ok(id, `Case supports ${formFactor}`)
    : fail(id, `Case does not list ${formFactor} support`);
}

export function checkGpuCaseLength(gpu: SelectedComponent, pcCase: SelectedComponent): RuleResult {
  const id = "gpu_case_length";
  const length = specFields(gpu.spec).lengthMm;
  const limit = specFields(pcCase.spec).maxGpuMm;
  if (length === undefined || limit === undefined) return unknown(id, "GPU length or case clearance unknown");
  return length <= limit
    ? ok(id, `${length}mm GPU fits ${limit}mm clearance`)
    : fail(id, `${length}mm GPU exceeds ${limit}mm clearance`);
}

export function checkPsuCapacity(gpu: SelectedComponent, psu: SelectedComponent, rule: PsuRuleConfig): RuleResult {
  const id = "psu_capacity";
  const wattage = specFields(psu.spec).wattage;
  if (wattage === undefined) return unknown(id, "PSU wattage unknown");
  const required = requiredPsuWattage(specFields(gpu.spec).tdp, rule);
  return wattage >= required
    ? ok(id, `${wattage}W PSU covers the ${required}W requirement`)
    : fail(id, `${wattage}W PSU is below the ${required}W requirement`);
}

export function checkCoolerCaseHeight(cooler: SelectedComponent, pcCase: SelectedComponent): RuleResult {
  const id = "cooler_case_height";
  const height = specFields(cooler.spec).heightMm;
  const limit = specFields(pcCase.spec).maxCoolerMm;
  if (height === undefined || limit === undefined) return unknown(id, "Cooler height or case clearance unknown");
  return height <= limit
    ? ok(id, `${height}mm cooler fits ${limit}mm clearance`)
    : fail(id, `${height}mm cooler exceeds ${limit}mm clearance`);
}

export function checkBudget(selections: readonly SelectedComponent[], budget: number): RuleResult {
  const total = selections.reduce((sum, s) => sum + s.price, 0);
  return total <= budget
    ? ok("budget", `Total ${total} within budget ${budget}`)
    : fail("budget", `Total ${total} exceeds budget ${budget} by ${total - budget}`);
}

/**
 * Runs every pairwise rule whose two parts are both selected, then the
 * budget rule. The build is compatible when no rule reports an error.
 */
export function validateBuild(
  selections: readonly SelectedComponent[],
  budget: number,
  psuRule: PsuRuleConfig,
): BuildReport {
  const picked: Picked = {};
  for (const s of selections) picked[s.category] = s;
  const { cpu, motherboard, memory, gpu, psu, cooler } = picked;
  const pcCase = picked.case;

  const results: RuleResult[] = [];
  if (cpu && motherboard) results.push(checkCpuMotherboardSocket(cpu, motherboard));
  if (memory && motherboard) results.push(checkMemoryMotherboardType(memory, motherboard));
  if (motherboard && pcCase) results.push(checkMotherboardCaseFormFactor(motherboard, pcCase));
  if (gpu && pcCase) results.push(checkGpuCaseLength(gpu, pcCase));
  if (gpu && psu) results.push(checkPsuCapacity(gpu, psu, psuRule));
  if (cooler && pcCase) results.push(checkCoolerCaseHeight(cooler, pcCase));
  if (selections.length > 0) results.push(checkBudget(selections, budget));

  return { compatible: results.every((r) => r.severity !== "error"), results };
}
