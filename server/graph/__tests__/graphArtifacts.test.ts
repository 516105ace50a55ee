import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import type { ComponentGraphData } from "../../../platform/catalog/graph";
import { DataNotFound, InvalidCatalogData } from "../../../platform/errors";
import { ARTIFACT_FILES, readGraphArtifacts, splitEdges, writeGraphArtifacts } from "../graphArtifacts";
import { part } from "../../__tests__/fixtures/components";

const graph: ComponentGraphData = {
  nodes: [
    part("cpu_1", { category: "cpu", socket: "AM5", tdp: 65 }, { price: 259000, tier: "Performance" }),
    part("gpu_2", { category: "gpu", tdp: 220, lengthMm: 301 }),
    { id: "cat_cpu", kind: "category", name: "cpu", category: "cpu" },
    { id: "attr_socket_AM5", kind: "attribute", name: "AM5", attrKey: "socket", value: "AM5" },
    { id: "game_7", kind: "purpose", name: "Epic", tier: "High" },
  ],
  edges: [
    { source: "cpu_1", target: "gpu_2", kind: "SYNERGY_WITH", weight: 1.0, rule: "tier_match" },
    { source: "gpu_2", target: "game_7", kind: "SUITABLE_FOR", weight: 1.0, rule: "min_requirement" },
    { source: "cpu_1", target: "cat_cpu", kind: "BELONGS_TO", weight: 1.0 },
    { source: "cpu_1", target: "attr_socket_AM5", kind: "HAS_ATTRIBUTE", weight: 1.0 },
  ],
};

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "graph-artifacts-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("graphArtifacts", () => {
  it("routes edges to their artifact file by kind", () => {
    const files = splitEdges([
      { source: "a", target: "b", kind: "COMPATIBLE_WITH", weight: 1.0, rule: "socket" },
      ...graph.edges,
    ]);
    expect(files.compatibility).toEqual([{ source: "a", target: "b", type: "COMPATIBLE_WITH", rule: "socket" }]);
    expect(files.synergy).toHaveLength(2);
    expect(files.attributes).toEqual([
      { source: "cpu_1", target: "cat_cpu", type: "BELONGS_TO" },
      { source: "cpu_1", target: "attr_socket_AM5", type: "HAS_ATTRIBUTE" },
    ]);
  });

  it("wraps each file in a versioned envelope", async () => {
    const written = await writeGraphArtifacts(dir, graph, { now: new Date("2026-03-04T10:00:00Z") });
    expect(written).toEqual([
      path.join(dir, ARTIFACT_FILES.nodes),
      path.join(dir, ARTIFACT_FILES.compatibility),
      path.join(dir, ARTIFACT_FILES.synergy),
      path.join(dir, ARTIFACT_FILES.attributes),
    ]);

    const nodes = JSON.parse(await fs.readFile(path.join(dir, ARTIFACT_FILES.nodes), "utf-8"));
    expect(nodes.version).toBe("1.0.0");
    expect(nodes.updated_at).toBe("2026-03-04");
    expect(nodes.data[0]).toEqual({
      id: "cpu_1",
      type: "component",
      name: "cpu_1",
      category: "cpu",
      brand: "Generic",
      price: 259000,
      tier: "Performance",
      specs: { socket: "AM5", tdp: 65 },
      raw: "CPU_1",
    });
  });

  it("reads back the graph it wrote", async () => {
    await writeGraphArtifacts(dir, graph);
    await expect(readGraphArtifacts(dir)).resolves.toEqual(graph);
  });

  it("fails with DataNotFound when a file is missing", async () => {
    await writeGraphArtifacts(dir, graph);
    await fs.rm(path.join(dir, ARTIFACT_FILES.synergy));
    await expect(readGraphArtifacts(dir)).rejects.toBeInstanceOf(DataNotFound);
  });

  it("fails with InvalidCatalogData on a malformed record", async () => {
    await writeGraphArtifacts(dir, graph);
    await fs.writeFile(
      path.join(dir, ARTIFACT_FILES.compatibility),
      JSON.stringify({ version: "1.0.0", updated_at: "2026-03-04", data: [{ source: "a" }] }),
    );
    await expect(readGraphArtifacts(dir)).rejects.toBeInstanceOf(InvalidCatalogData);
  });
});
