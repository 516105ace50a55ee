import type { ConstraintKey } from "@shared/schema";
import type { ComponentNode, FormFactor } from "../../platform/catalog/graph";
import { specFields } from "../../platform/catalog/graph";
import type { SelectionSession, StepCategory } from "../../platform/session";
import { requiredPsuWattage, type PsuRuleConfig } from "../config";
import { capacityCovers, caseMentionsFormFactor, valuesMatch } from "../graph/compatibilityRules";

/**
 * What a step's candidates must satisfy, derived from the session's earlier
 * selections. Undefined fields impose nothing.
 */
export type StepRequirements = Readonly<{
  socket?: string;
  memoryType?: string;
  formFactor?: FormFactor;
  minPsuWattage?: number;
  gpuLengthMm?: number;
  maxCoolerMm?: number;
  allocatedBudget: number;
}>;

export type CandidateConstraint = Readonly<{
  key: ConstraintKey;
  accepts: (node: ComponentNode) => boolean;
}>;

export type FilterOutcome = Readonly<{
  survivors: ComponentNode[];
  /** Active constraints that rejected at least one node; empty when survivors exist. */
  blocking: ConstraintKey[];
}>;

export function stepRequirements(
  session: SelectionSession,
  allocatedBudget: number,
  psu: PsuRuleConfig,
): StepRequirements {
  const c = session.constraints;
  return {
    socket: c.socket,
    memoryType: c.memoryType,
    formFactor: c.formFactor,
    minPsuWattage: c.gpuTdp !== undefined ? requiredPsuWattage(c.gpuTdp, psu) : undefined,
    gpuLengthMm: c.gpuLengthMm,
    maxCoolerMm: c.caseMaxCoolerMm,
    allocatedBudget,
  };
}

/**
 * Hard filters for one step. Equality rules let an unknown candidate value
 * through; threshold rules need the candidate's value to be known.
 */
export function constraintsFor(category: StepCategory, req: StepRequirements): CandidateConstraint[] {
  const list: CandidateConstraint[] = [];
  const { socket, memoryType, formFactor, minPsuWattage, gpuLengthMm, maxCoolerMm } = req;

  switch (category) {
    case "motherboard":
      if (socket !== undefined) {
        list.push({ key: "socket", accepts: (n) => valuesMatch(socket, specFields(n.spec).socket) });
      }
      if (memoryType !== undefined) {
        list.push({ key: "memory_type", accepts: (n) => valuesMatch(memoryType, specFields(n.spec).memoryType) });
      }
      break;
    case "memory":
      if (memoryType !== undefined) {
        list.push({ key: "memory_type", accepts: (n) => valuesMatch(memoryType, specFields(n.spec).memoryType) });
      }
      break;
    case "psu":
      if (minPsuWattage !== undefined) {
        list.push({ key: "psu_capacity", accepts: (n) => capacityCovers(specFields(n.spec).wattage, minPsuWattage) });
      }
      break;
    case "case":
      if (formFactor !== undefined) {
        list.push({
          key: "form_factor",
          accepts: (n) => specFields(n.spec).formFactor === undefined || caseMentionsFormFactor(n.raw, formFactor),
        });
      }
      if (gpuLengthMm !== undefined) {
        list.push({ key: "gpu_length", accepts: (n) => capacityCovers(specFields(n.spec).maxGpuMm, gpuLengthMm) });
      }
      break;
    case "cooler":
      // Coolers list every supported socket; the extracted one is only the first.
      if (socket !== undefined) {
        list.push({
          key: "socket",
          accepts: (n) => specFields(n.spec).socket === undefined || n.raw.includes(socket),
        });
      }
      if (maxCoolerMm !== undefined) {
        list.push({
          key: "cooler_height",
          accepts: (n) => {
            const height = specFields(n.spec).heightMm;
            return height !== undefined && height <= maxCoolerMm;
          },
        });
      }
      break;
    case "cpu":
    case "gpu":
    case "storage":
      break;
  }

  const budget = req.allocatedBudget;
  list.push({ key: "budget", accepts: (n) => n.price <= budget });
  return list;
}

export function filterCandidates(
  nodes: readonly ComponentNode[],
  constraints: readonly CandidateConstraint[],
  relax: readonly ConstraintKey[] = [],
): FilterOutcome {
  const active = constraints.filter((c) => !relax.includes(c.key));
  const survivors = nodes.filter((n) => active.every((c) => c.accepts(n)));
  if (survivors.length > 0) return { survivors, blocking: [] };

  const blocking: ConstraintKey[] = [];
  for (const c of active) {
    if (!blocking.includes(c.key) && nodes.some((n) => !c.accepts(n))) blocking.push(c.key);
  }
  return { survivors, blocking };
}
