import type { StepCategory } from "../../platform/session";

export type RetrievedDocument = Readonly<{
  id: string;
  content: string;
  score: number;
  metadata?: Record<string, unknown>;
}>;

/**
 * Free-text retrieval over an external index. The engine only composes the
 * query; implementations own their I/O and must honor `signal`.
 */
export interface Retriever {
  retrieve(
    query: string,
    category: StepCategory,
    topK: number,
    signal: AbortSignal,
  ): Promise<RetrievedDocument[]>;
}
