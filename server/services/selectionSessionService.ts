import { sessionPurposeSchema, type ComponentData, type ConstraintKey } from "@shared/schema";
import type { AuditEventType } from "../../platform/audit";
import type { ComponentSpec, FormFactor } from "../../platform/catalog/graph";
import { specFields } from "../../platform/catalog/graph";
import {
  CategoryMismatch,
  InvalidBudget,
  InvalidStep,
  SequenceViolation,
  SessionConflict,
  UnknownSession,
} from "../../platform/errors";
import {
  FINAL_STEP,
  sessionStatus,
  stepCategory,
  type SelectedComponent,
  type SelectionSession,
  type SessionConstraints,
  type SessionPurpose,
  type SessionStatus,
  type StepCategory,
  type VersionedSession,
} from "../../platform/session";
import type { EngineConfig } from "../config";
import type { EngineContext } from "../engineContext";
import { mergeSpec, normalizePersistedSpec, specFromPersisted } from "../graph/specCodec";
import { allocateStepBudget, PURPOSE_KEYWORDS } from "./budgetAllocation";
import { validateBuild, type BuildReport } from "./buildValidationService";
import { constraintsFor, filterCandidates, stepRequirements, type StepRequirements } from "./candidateFilter";
import type { RetrievedDocument } from "./collaborators";
import { rankCandidates, type RankedCandidate } from "./rankingService";

export type StepContext = Readonly<{
  purpose: SessionPurpose;
  purposeKeywords: readonly string[];
  socketRequirement: string | null;
  memoryTypeRequirement: string | null;
  formFactorRequirement: FormFactor | null;
  gpuTdp: number | null;
  minPsuWattage: number | null;
  gpuLengthMm: number | null;
  maxCoolerMm: number | null;
  totalTdp: number;
  searchQuery: string;
}>;

export type StepCandidatesResult = Readonly<{
  sessionId: string;
  step: number;
  category: StepCategory;
  candidates: RankedCandidate[];
  allocatedBudget: number;
  remainingBudget: number;
  context: StepContext;
  relaxationNeeded: boolean;
  blockingConstraints: ConstraintKey[];
  nextStep: number | null;
  isFinalStep: boolean;
}>;

export type StepQueryOptions = Readonly<{
  /** Defaults to the session's next step. */
  step?: number;
  topK?: number;
  relax?: readonly ConstraintKey[];
}>;

export type SelectComponentInput = Readonly<{
  step: number;
  componentId: string;
  componentData?: ComponentData;
}>;

export type SessionSummary = Readonly<{
  sessionId: string;
  purpose: SessionPurpose;
  totalBudget: number;
  totalPrice: number;
  remainingBudget: number;
  status: SessionStatus;
  currentStep: number;
  nextStep: number | null;
  selections: readonly SelectedComponent[];
  constraints: SessionConstraints;
  compatibility: BuildReport;
}>;

function translateStoreError(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  if (msg.startsWith("SESSIONSTORE_CONFLICT:")) {
    throw new SessionConflict(msg);
  }
  throw err instanceof Error ? err : new Error(msg);
}

async function requireSession(ctx: EngineContext, sessionId: string): Promise<VersionedSession> {
  const record = await ctx.sessions.get(sessionId);
  if (!record) throw new UnknownSession(sessionId);
  return record;
}

async function emitAuditEvent(
  ctx: EngineContext,
  session: SelectionSession,
  eventType: AuditEventType,
  entityId: string,
  metadata?: Record<string, unknown>,
): Promise<void> {
  await ctx.audit.emit({
    eventId: ctx.newEventId(),
    sessionId: session.sessionId,
    eventType,
    entityId,
    step: session.step,
    timestamp: ctx.now().toISOString(),
    metadata,
  });
}

export async function startSession(
  ctx: EngineContext,
  budget: number,
  purpose?: string,
): Promise<SelectionSession> {
  if (!Number.isInteger(budget) || budget < ctx.config.minSessionBudget) {
    throw new InvalidBudget(
      `Budget must be an integer of at least ${ctx.config.minSessionBudget}, got ${budget}`,
    );
  }

  const normalized = purpose?.trim().toLowerCase();
  const parsedPurpose = sessionPurposeSchema.safeParse(normalized);
  let resolvedPurpose: SessionPurpose = "general";
  if (parsedPurpose.success) {
    resolvedPurpose = parsedPurpose.data;
  } else if (normalized) {
    console.warn(`[session] unknown purpose "${purpose}", using general`);
  }

  const now = ctx.now().toISOString();
  const session: SelectionSession = {
    sessionId: ctx.newSessionId(),
    budget,
    purpose: resolvedPurpose,
    step: 0,
    selections: [],
    remainingBudget: budget,
    constraints: { totalTdp: 0 },
    createdAt: now,
    updatedAt: now,
  };

  try {
    await ctx.sessions.put(session, { expectedVersion: 0 });
  } catch (e) {
    translateStoreError(e);
  }
  await emitAuditEvent(ctx, session, "SESSION_STARTED", session.sessionId, { budget, purpose: resolvedPurpose });
  console.log(`[session] started ${session.sessionId} (${resolvedPurpose}, budget ${budget})`);
  return session;
}

export async function getSession(ctx: EngineContext, sessionId: string): Promise<SelectionSession> {
  return ctx.sessions.withLock(sessionId, async () => (await requireSession(ctx, sessionId)).session);
}

/**
 * Query text for an external retriever: purpose and category, the
 * requirement that matters for the category, and two purpose keywords.
 */
export function buildStepQuery(
  purpose: SessionPurpose,
  category: StepCategory,
  req: Pick<StepRequirements, "socket" | "memoryType" | "formFactor">,
): string {
  const parts: string[] = [purpose, category];
  if ((category === "motherboard" || category === "cooler") && req.socket) parts.push(req.socket);
  if (category === "memory" && req.memoryType) parts.push(req.memoryType);
  if (category === "case" && req.formFactor) parts.push(req.formFactor);
  parts.push(...PURPOSE_KEYWORDS[purpose].slice(0, 2));
  return parts.join(" ");
}

function requireStepCategory(step: number): StepCategory {
  const category = stepCategory(step);
  if (!category) throw new InvalidStep(step);
  return category;
}

/**
 * Ranked candidates for one step. Read-only: the session is not touched,
 * and repeated calls against the same state return the same result.
 */
export async function getStepCandidates(
  ctx: EngineContext,
  sessionId: string,
  opts: StepQueryOptions = {},
): Promise<StepCandidatesResult> {
  const session = await getSession(ctx, sessionId);
  const step = opts.step ?? session.step + 1;
  const category = requireStepCategory(step);

  const allocatedBudget = allocateStepBudget(session.budget, session.remainingBudget, session.purpose, category);
  const req = stepRequirements(session, allocatedBudget, ctx.config.psu);
  const { survivors, blocking } = filterCandidates(
    ctx.graph.componentsOf(category),
    constraintsFor(category, req),
    opts.relax,
  );

  const topK = opts.topK ?? ctx.config.defaultTopK;
  const selectionIds = session.selections.map((s) => s.componentId);
  const candidates = rankCandidates(survivors, selectionIds, ctx.scorer, topK);

  const relaxationNeeded = survivors.length === 0;
  if (relaxationNeeded) {
    console.log(
      `[session] ${sessionId} step ${step} (${category}): no candidates; blocking ${blocking.join(", ") || "none"}`,
    );
  }

  return {
    sessionId,
    step,
    category,
    candidates,
    allocatedBudget,
    remainingBudget: session.remainingBudget,
    context: {
      purpose: session.purpose,
      purposeKeywords: PURPOSE_KEYWORDS[session.purpose],
      socketRequirement: req.socket ?? null,
      memoryTypeRequirement: req.memoryType ?? null,
      formFactorRequirement: req.formFactor ?? null,
      gpuTdp: session.constraints.gpuTdp ?? null,
      minPsuWattage: req.minPsuWattage ?? null,
      gpuLengthMm: req.gpuLengthMm ?? null,
      maxCoolerMm: req.maxCoolerMm ?? null,
      totalTdp: session.constraints.totalTdp,
      searchQuery: buildStepQuery(session.purpose, category, req),
    },
    relaxationNeeded,
    blockingConstraints: blocking,
    nextStep: step < FINAL_STEP ? step + 1 : null,
    isFinalStep: step === FINAL_STEP,
  };
}

// Settles with whichever comes first: `promise` or `signal`'s abort.
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Documents from the configured retriever for a step's query. Empty when no
 * retriever is configured; rejects with the signal's reason once it aborts.
 */
export async function fetchStepDocuments(
  ctx: EngineContext,
  sessionId: string,
  step: number,
  topK: number,
  signal: AbortSignal,
): Promise<RetrievedDocument[]> {
  const session = await getSession(ctx, sessionId);
  const category = requireStepCategory(step);
  if (!ctx.retriever) return [];

  const allocatedBudget = allocateStepBudget(session.budget, session.remainingBudget, session.purpose, category);
  const query = buildStepQuery(session.purpose, category, stepRequirements(session, allocatedBudget, ctx.config.psu));
  return abortable(ctx.retriever.retrieve(query, category, topK, signal), signal);
}

function resolveSelection(
  ctx: EngineContext,
  step: number,
  category: StepCategory,
  componentId: string,
  data?: ComponentData,
): SelectedComponent {
  const node = ctx.graph.getComponent(componentId);
  if (node && node.category !== category) {
    throw new CategoryMismatch(componentId, category, node.category);
  }
  if (!node && !data) {
    console.warn(`[session] component ${componentId} not in catalog; recording without specs`);
  }

  const overrides = data?.specs ? normalizePersistedSpec(data.specs) : undefined;
  let spec: ComponentSpec;
  if (node) spec = overrides ? mergeSpec(node.spec, overrides) : node.spec;
  else spec = specFromPersisted(category, overrides ?? {});

  return {
    step,
    category,
    componentId,
    name: data?.name ?? node?.name ?? componentId,
    price: data?.price ?? node?.price ?? 0,
    spec,
    raw: node?.raw ?? "",
  };
}

/**
 * Carries a selection's requirements forward. Pure; returns the next
 * constraints without touching the input.
 */
export function applyConstraints(
  current: SessionConstraints,
  selection: SelectedComponent,
  config: Pick<EngineConfig, "psu">,
): SessionConstraints {
  const spec = specFields(selection.spec);
  switch (selection.category) {
    case "cpu":
      return {
        ...current,
        socket: spec.socket ?? current.socket,
        memoryType: spec.memoryType ?? current.memoryType,
        totalTdp: current.totalTdp + (spec.tdp ?? 0),
      };
    case "motherboard":
      return {
        ...current,
        socket: current.socket ?? spec.socket,
        memoryType: current.memoryType ?? spec.memoryType,
        formFactor: spec.formFactor ?? current.formFactor,
      };
    case "gpu": {
      const tdp = spec.tdp ?? config.psu.defaultGpuTdp;
      return {
        ...current,
        gpuTdp: (current.gpuTdp ?? 0) + tdp,
        gpuLengthMm: spec.lengthMm ?? current.gpuLengthMm,
        totalTdp: current.totalTdp + tdp,
      };
    }
    case "case":
      return { ...current, caseMaxCoolerMm: spec.maxCoolerMm ?? current.caseMaxCoolerMm };
    case "memory":
    case "storage":
    case "psu":
    case "cooler":
      return current;
  }
}

/**
 * Records the component for `step` and advances the session.
 *
 * Only `session.step + 1` is accepted. Repeating the most recent successful
 * selection returns the session unchanged, so a caller may retry after a
 * lost response. Every rejection leaves the session as it was.
 */
export async function selectComponent(
  ctx: EngineContext,
  sessionId: string,
  input: SelectComponentInput,
): Promise<SelectionSession> {
  return ctx.sessions.withLock(sessionId, async () => {
    const record = await requireSession(ctx, sessionId);
    const session = record.session;
    const { step, componentId } = input;

    const last = session.selections[session.selections.length - 1];
    if (last && step === session.step && last.step === step && last.componentId === componentId) {
      return session;
    }
    if (step !== session.step + 1) {
      throw new SequenceViolation(session.step + 1, step);
    }

    const category = requireStepCategory(step);
    const selection = resolveSelection(ctx, step, category, componentId, input.componentData);
    const next: SelectionSession = {
      ...session,
      step,
      selections: [...session.selections, selection],
      remainingBudget: session.remainingBudget - selection.price,
      constraints: applyConstraints(session.constraints, selection, ctx.config),
      updatedAt: ctx.now().toISOString(),
    };

    try {
      await ctx.sessions.put(next, { expectedVersion: record.version });
    } catch (e) {
      translateStoreError(e);
    }
    await emitAuditEvent(ctx, next, "COMPONENT_SELECTED", componentId, { price: selection.price });
    console.log(`[session] ${sessionId} step ${step} (${category}) -> ${componentId}`);
    return next;
  });
}

export async function getSummary(ctx: EngineContext, sessionId: string): Promise<SessionSummary> {
  const session = await getSession(ctx, sessionId);
  const status = sessionStatus(session);
  return {
    sessionId: session.sessionId,
    purpose: session.purpose,
    totalBudget: session.budget,
    totalPrice: session.selections.reduce((sum, s) => sum + s.price, 0),
    remainingBudget: session.remainingBudget,
    status,
    currentStep: session.step,
    nextStep: status === "complete" ? null : session.step + 1,
    selections: session.selections,
    constraints: session.constraints,
    compatibility: validateBuild(session.selections, session.budget, ctx.config.psu),
  };
}
