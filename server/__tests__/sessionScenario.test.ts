import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryComponentGraphStore } from "../../platform/catalog/store";
import { specFields } from "../../platform/catalog/graph";
import { SequenceViolation } from "../../platform/errors";
import { createEngineContext, type EngineContext } from "../engineContext";
import {
  getSession,
  getStepCandidates,
  getSummary,
  selectComponent,
  startSession,
} from "../services/selectionSessionService";
import { scenarioCatalog, testConfig } from "./fixtures/components";

function makeCtx(): EngineContext {
  let n = 0;
  return createEngineContext(InMemoryComponentGraphStore.fromGraph(scenarioCatalog()), testConfig(), {
    now: () => new Date("2026-05-01T00:00:00.000Z"),
    newSessionId: () => `s-${++n}`,
  });
}

async function pick(ctx: EngineContext, sessionId: string, ...componentIds: string[]): Promise<void> {
  for (const componentId of componentIds) {
    const { step } = await getSession(ctx, sessionId);
    await selectComponent(ctx, sessionId, { step: step + 1, componentId });
  }
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("gaming build session", () => {
  it("offers only boards that match the chosen CPU", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 2_000_000, "gaming");
    await pick(ctx, sessionId, "cpu_i5");

    const result = await getStepCandidates(ctx, sessionId);

    expect(result.step).toBe(2);
    expect(result.allocatedBudget).toBe(240_000);
    expect(result.candidates.map((c) => c.componentId)).toEqual(["mb_lga_matx", "mb_lga_atx"]);
    expect(result.candidates.every((c) => specFields(c.spec).socket === "LGA1700")).toBe(true);
    expect(result.context.socketRequirement).toBe("LGA1700");
    expect(result.context.searchQuery).toBe("gaming motherboard LGA1700 high-fps gaming");
  });

  it("ranks a GPU linked to the CPU by a popular build above one it would otherwise trail", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 2_000_000, "gaming");
    await pick(ctx, sessionId, "cpu_i5", "mb_lga_atx", "mem_d5");

    const result = await getStepCandidates(ctx, sessionId);

    // mean of the selections is [0.4667, 0.7222]; gpu_4060 is 0.8823 before its 0.1 boost
    expect(result.candidates.map((c) => c.componentId)).toEqual(["gpu_long", "gpu_4060", "gpu_4090"]);
    expect(result.candidates[1].score).toBeCloseTo(0.9823, 3);
    expect(result.candidates[2].score).toBeCloseTo(0.9777, 3);
  });

  it("requires an 850W supply behind a 450W GPU", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 2_000_000, "gaming");
    await pick(ctx, sessionId, "cpu_i5", "mb_lga_atx", "mem_d5", "gpu_4090", "ssd_1");

    const result = await getStepCandidates(ctx, sessionId);

    expect(result.remainingBudget).toBe(680_000);
    expect(result.allocatedBudget).toBe(100_000);
    expect(result.context.minPsuWattage).toBe(850);
    expect(result.context.gpuTdp).toBe(450);
    expect(result.context.totalTdp).toBe(515);
    expect(result.candidates.map((c) => c.componentId).sort()).toEqual(["psu_1000", "psu_850"]);
  });

  it("reports the blocking constraints when no case fits and relaxes on request", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 2_000_000, "gaming");
    await pick(ctx, sessionId, "cpu_i5", "mb_lga_atx", "mem_d5", "gpu_long", "ssd_1", "psu_1000");

    const strict = await getStepCandidates(ctx, sessionId);
    expect(strict.step).toBe(7);
    expect(strict.candidates).toEqual([]);
    expect(strict.relaxationNeeded).toBe(true);
    expect(strict.blockingConstraints).toEqual(["form_factor", "gpu_length"]);

    const relaxed = await getStepCandidates(ctx, sessionId, { relax: ["gpu_length"] });
    expect(relaxed.relaxationNeeded).toBe(false);
    expect(relaxed.blockingConstraints).toEqual([]);
    expect(relaxed.candidates.map((c) => c.componentId)).toEqual(["case_atx"]);
  });

  it("leaves the session untouched when a step is queried", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 2_000_000, "gaming");
    await pick(ctx, sessionId, "cpu_i5");
    const before = await getSession(ctx, sessionId);

    const first = await getStepCandidates(ctx, sessionId, { step: 4 });
    const second = await getStepCandidates(ctx, sessionId, { step: 4 });

    expect(second).toEqual(first);
    expect(await getSession(ctx, sessionId)).toEqual(before);
  });

  it("rejects skipping a step and keeps the session as it was", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 2_000_000, "gaming");
    await pick(ctx, sessionId, "cpu_i5");
    const before = await getSession(ctx, sessionId);

    await expect(selectComponent(ctx, sessionId, { step: 3, componentId: "mem_d5" })).rejects.toBeInstanceOf(
      SequenceViolation,
    );
    expect(await getSession(ctx, sessionId)).toEqual(before);
  });

  it("treats a retried selection as a no-op", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 2_000_000, "gaming");
    const first = await selectComponent(ctx, sessionId, { step: 1, componentId: "cpu_i5" });
    const retry = await selectComponent(ctx, sessionId, { step: 1, componentId: "cpu_i5" });

    expect(retry).toEqual(first);
    expect(retry.remainingBudget).toBe(1_750_000);
    expect(retry.selections).toHaveLength(1);
  });

  it("serializes concurrent selections for one session", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 2_000_000, "gaming");

    const outcomes = await Promise.allSettled([
      selectComponent(ctx, sessionId, { step: 1, componentId: "cpu_i5" }),
      selectComponent(ctx, sessionId, { step: 1, componentId: "cpu_r7" }),
    ]);

    expect(outcomes[0].status).toBe("fulfilled");
    expect(outcomes[1].status).toBe("rejected");
    const session = await getSession(ctx, sessionId);
    expect(session.selections.map((s) => s.componentId)).toEqual(["cpu_i5"]);
  });

  it("summarizes a complete, compatible build", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 2_000_000, "gaming");
    await pick(ctx, sessionId, "cpu_i5", "mb_lga_atx", "mem_d5", "gpu_4060", "ssd_1", "psu_850", "case_atx");

    const last = await getStepCandidates(ctx, sessionId);
    expect(last.isFinalStep).toBe(true);
    expect(last.nextStep).toBeNull();
    expect(last.allocatedBudget).toBe(60_000);
    expect(last.context.maxCoolerMm).toBe(165);
    expect(last.candidates.map((c) => c.componentId).sort()).toEqual(["cooler_low", "cooler_tall"]);

    await pick(ctx, sessionId, "cooler_tall");
    const summary = await getSummary(ctx, sessionId);

    expect(summary.status).toBe("complete");
    expect(summary.currentStep).toBe(8);
    expect(summary.nextStep).toBeNull();
    expect(summary.totalPrice).toBe(1_365_000);
    expect(summary.remainingBudget).toBe(635_000);
    expect(summary.constraints).toEqual({
      socket: "LGA1700",
      memoryType: "DDR5",
      formFactor: "ATX",
      gpuTdp: 115,
      gpuLengthMm: 199,
      caseMaxCoolerMm: 165,
      totalTdp: 180,
    });
    expect(summary.compatibility.compatible).toBe(true);
    expect(summary.compatibility.results).toHaveLength(7);
    expect(summary.compatibility.results.every((r) => r.passed && r.severity === "info")).toBe(true);
    expect(summary.compatibility.results.find((r) => r.ruleId === "psu_capacity")?.message).toBe(
      "850W PSU covers the 415W requirement",
    );
  });

  it("reports a fresh session as not started", async () => {
    const ctx = makeCtx();
    const { sessionId } = await startSession(ctx, 1_000_000);
    const summary = await getSummary(ctx, sessionId);
    expect(summary).toMatchObject({ status: "not_started", currentStep: 0, nextStep: 1, totalPrice: 0 });
    expect(summary.compatibility).toEqual({ compatible: true, results: [] });
  });
});
