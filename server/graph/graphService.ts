import type { ComponentGraphData } from "../../platform/catalog/graph";
import { InMemoryComponentGraphStore } from "../../platform/catalog/store";
import type { EngineConfig } from "../config";
import { loadRawCatalog, loadReferenceData } from "./catalogLoader";
import { readGraphArtifacts, writeGraphArtifacts } from "./graphArtifacts";
import { buildComponentGraph, type GraphBuildResult } from "./graphBuilder";

/**
 * Batch pipeline: raw catalog + reference lists -> built graph. The catalog
 * must exist; reference lists are optional.
 */
export async function buildGraphFromSources(config: EngineConfig): Promise<GraphBuildResult> {
  const parts = await loadRawCatalog(config.catalogPath);
  const { popularBuilds, games } = await loadReferenceData(config.referenceDataDir);
  console.log(
    `[graph-builder] loaded ${parts.length} parts, ${popularBuilds.length} builds, ${games.length} games`,
  );
  return buildComponentGraph({ parts, popularBuilds, games }, config);
}

export async function buildAndPersistGraph(config: EngineConfig): Promise<GraphBuildResult & { files: string[] }> {
  const result = await buildGraphFromSources(config);
  const files = await writeGraphArtifacts(config.graphDataDir, result.graph);
  return { ...result, files };
}

export function createGraphStore(
  graph: ComponentGraphData,
  config: Pick<EngineConfig, "fuzzyNameMatch">,
): InMemoryComponentGraphStore {
  return InMemoryComponentGraphStore.fromGraph(graph, { fuzzyNames: config.fuzzyNameMatch });
}

/** Loads persisted artifacts into a read-only store. */
export async function loadGraphStore(config: EngineConfig): Promise<InMemoryComponentGraphStore> {
  const graph = await readGraphArtifacts(config.graphDataDir);
  const store = createGraphStore(graph, config);
  const stats = store.stats();
  console.log(
    `[graph-store] loaded ${stats.totalNodes} nodes, ${stats.totalEdges} edges from ${config.graphDataDir}`,
  );
  return store;
}
