import type { SessionPurpose, StepCategory } from "../../platform/session";

/**
 * Percentage of the total budget each step may spend, per purpose. Each
 * column sums to 100.
 */
export const BUDGET_SHARES: Readonly<Record<SessionPurpose, Readonly<Record<StepCategory, number>>>> = {
  gaming: {
    cpu: 22,
    motherboard: 12,
    memory: 10,
    gpu: 35,
    storage: 8,
    psu: 5,
    case: 5,
    cooler: 3,
  },
  workstation: {
    cpu: 30,
    motherboard: 12,
    memory: 18,
    gpu: 15,
    storage: 12,
    psu: 5,
    case: 5,
    cooler: 3,
  },
  general: {
    cpu: 25,
    motherboard: 12,
    memory: 12,
    gpu: 25,
    storage: 10,
    psu: 6,
    case: 6,
    cooler: 4,
  },
};

export const PURPOSE_KEYWORDS: Readonly<Record<SessionPurpose, readonly string[]>> = {
  gaming: ["high-fps", "gaming", "graphics"],
  workstation: ["rendering", "multi-core", "productivity"],
  general: ["office", "everyday", "value"],
};

/**
 * Spending cap for one step: the purpose share of the total budget, never
 * more than what is left.
 */
export function allocateStepBudget(
  budget: number,
  remaining: number,
  purpose: SessionPurpose,
  category: StepCategory,
): number {
  const percent = BUDGET_SHARES[purpose][category];
  return Math.max(0, Math.min(Math.floor((budget * percent) / 100), remaining));
}
