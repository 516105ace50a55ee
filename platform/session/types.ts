import type { ComponentCategory, ComponentSpec, FormFactor } from "../catalog/graph";

// ============================================================================
// Enumerations
// ============================================================================

export const SESSION_PURPOSES = ["gaming", "workstation", "general"] as const;

export type SessionPurpose = (typeof SESSION_PURPOSES)[number];

/**
 * Ordered selection steps. Step n selects a component of
 * `SELECTION_STEPS[n - 1]`.
 */
export const SELECTION_STEPS = [
  "cpu",
  "motherboard",
  "memory",
  "gpu",
  "storage",
  "psu",
  "case",
  "cooler",
] as const satisfies readonly ComponentCategory[];

export type StepCategory = (typeof SELECTION_STEPS)[number];

export const FINAL_STEP = SELECTION_STEPS.length;

export type SessionStatus = "not_started" | "in_progress" | "complete";

// ============================================================================
// Session state
// ============================================================================

export type SelectedComponent = Readonly<{
  step: number;
  category: StepCategory;
  componentId: string;
  name: string;
  price: number;
  spec: ComponentSpec;
  /** Uppercased catalog text; empty for parts recorded from caller data only. */
  raw: string;
}>;

/**
 * Requirements carried forward from earlier selections.
 *
 * socket / memoryType / formFactor are equality requirements; gpuTdp,
 * gpuLengthMm and caseMaxCoolerMm feed the numeric threshold rules.
 * totalTdp sums CPU and GPU power for display.
 */
export type SessionConstraints = Readonly<{
  socket?: string;
  memoryType?: string;
  formFactor?: FormFactor;
  gpuTdp?: number;
  gpuLengthMm?: number;
  caseMaxCoolerMm?: number;
  totalTdp: number;
}>;

/**
 * A staged build in progress.
 *
 * `step` counts completed steps: 0 before the first selection, 8 once the
 * build is complete. `selections` is ordered by step.
 */
export type SelectionSession = Readonly<{
  sessionId: string;
  budget: number;
  purpose: SessionPurpose;
  step: number;
  selections: readonly SelectedComponent[];
  remainingBudget: number;
  constraints: SessionConstraints;
  createdAt: string;
  updatedAt: string;
}>;

export function sessionStatus(session: SelectionSession): SessionStatus {
  if (session.step === 0) return "not_started";
  return session.step >= FINAL_STEP ? "complete" : "in_progress";
}

export function stepCategory(step: number): StepCategory | null {
  if (!Number.isInteger(step) || step < 1 || step > FINAL_STEP) return null;
  return SELECTION_STEPS[step - 1];
}
