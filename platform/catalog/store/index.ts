export type { ComponentGraphStore } from "./ComponentGraphStore";
export type { GraphStats, GraphStoreOptions } from "./types";
export type { NameMatch, NameLookupOptions } from "./NameIndex";
export { InMemoryComponentGraphStore } from "./InMemoryComponentGraphStore";
export { NameIndex, normalizeName } from "./NameIndex";
