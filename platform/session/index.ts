export type {
  SessionPurpose,
  StepCategory,
  SessionStatus,
  SelectedComponent,
  SessionConstraints,
  SelectionSession,
} from "./types";
export {
  SESSION_PURPOSES,
  SELECTION_STEPS,
  FINAL_STEP,
  sessionStatus,
  stepCategory,
} from "./types";
export * from "./store";
