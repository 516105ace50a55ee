import { randomUUID } from "crypto";
import type { AuditSink } from "../platform/audit";
import { InMemoryAuditSink } from "../platform/audit";
import type { ComponentGraphStore } from "../platform/catalog/store";
import type { SessionStore } from "../platform/session";
import { InMemorySessionStore } from "../platform/session";
import type { EngineConfig } from "./config";
import type { Retriever } from "./services/collaborators";
import { createDefaultScorer, type SimilarityScorer } from "./services/similarityScorer";

/**
 * Everything a session operation needs, passed explicitly. The graph is
 * shared read-only; sessions are owned by the session store.
 */
export type EngineContext = Readonly<{
  config: EngineConfig;
  graph: ComponentGraphStore;
  sessions: SessionStore;
  scorer: SimilarityScorer;
  audit: AuditSink;
  retriever?: Retriever;
  now: () => Date;
  newSessionId: () => string;
  newEventId: () => string;
}>;

export type EngineContextOverrides = Partial<
  Pick<EngineContext, "sessions" | "scorer" | "audit" | "retriever" | "now" | "newSessionId" | "newEventId">
>;

export function createEngineContext(
  graph: ComponentGraphStore,
  config: EngineConfig,
  overrides: EngineContextOverrides = {},
): EngineContext {
  return {
    config,
    graph,
    sessions: overrides.sessions ?? new InMemorySessionStore(),
    scorer: overrides.scorer ?? createDefaultScorer(graph, config.synergyBoost),
    audit: overrides.audit ?? new InMemoryAuditSink(),
    retriever: overrides.retriever,
    now: overrides.now ?? (() => new Date()),
    newSessionId: overrides.newSessionId ?? (() => randomUUID()),
    newEventId: overrides.newEventId ?? (() => randomUUID()),
  };
}
