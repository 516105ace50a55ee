/**
 * Component Graph Module
 *
 * Public exports for the component graph contract.
 *
 * @module platform/catalog/graph
 */

export type {
  ComponentCategory,
  PerformanceTier,
  NodeKind,
  EdgeKind,
  FormFactor,
  CpuSpec,
  MotherboardSpec,
  MemorySpec,
  GpuSpec,
  StorageSpec,
  PsuSpec,
  CaseSpec,
  CoolerSpec,
  UnknownSpec,
  ComponentSpec,
  SpecKey,
  SpecFields,
  ComponentNode,
  CategoryNode,
  AttributeNode,
  PurposeNode,
  GraphNode,
  GraphEdge,
  ComponentGraphData,
} from "./types";

export {
  COMPONENT_CATEGORIES,
  PERFORMANCE_TIERS,
  FORM_FACTORS,
  isComponentNode,
  tierOrdinal,
  specFields,
} from "./types";
