import fs from "fs/promises";
import path from "path";
import type { z } from "zod";
import {
  gameRequirementSchema,
  popularBuildSchema,
  rawCatalogSchema,
  artifactFileSchema,
  type GameRequirement,
  type PopularBuild,
  type RawPartRecord,
} from "@shared/schema";
import { DataNotFound, InvalidCatalogData } from "../../platform/errors";

export const POPULAR_BUILDS_FILE = "popular_builds.json";
export const GAME_REQUIREMENTS_FILE = "game_requirements.json";

export type ReferenceData = Readonly<{
  popularBuilds: PopularBuild[];
  games: GameRequirement[];
}>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Reads and parses a JSON file. A missing file is DataNotFound; unreadable
 * JSON is InvalidCatalogData.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) throw new DataNotFound(filePath);
    throw err;
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidCatalogData(`${filePath}: ${reason}`);
  }
}

export function parseWithSchema<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  label: string,
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new InvalidCatalogData(`${label}: ${details}`);
  }
  return result.data;
}

export async function loadRawCatalog(filePath: string): Promise<RawPartRecord[]> {
  const parsed = parseWithSchema(rawCatalogSchema, await readJsonFile(filePath), filePath);
  return Array.isArray(parsed) ? parsed : parsed.data;
}

/**
 * Curated reference lists. Either file may be absent: the graph is simply
 * built without the edges it would contribute.
 */
export async function loadReferenceData(dir: string): Promise<ReferenceData> {
  const popularBuilds = await loadOptionalList(
    path.join(dir, POPULAR_BUILDS_FILE),
    popularBuildSchema,
  );
  const games = await loadOptionalList(
    path.join(dir, GAME_REQUIREMENTS_FILE),
    gameRequirementSchema,
  );
  return { popularBuilds, games };
}

async function loadOptionalList<T extends z.ZodTypeAny>(
  filePath: string,
  item: T,
): Promise<Array<z.infer<T>>> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    if (err instanceof DataNotFound) {
      console.warn(`[catalog] ${path.basename(filePath)} not found, skipping`);
      return [];
    }
    throw err;
  }
  const list: Array<z.infer<T>> = Array.isArray(raw)
    ? parseWithSchema(item.array(), raw, filePath)
    : parseWithSchema(artifactFileSchema(item), raw, filePath).data;
  return list;
}

/**
 * Integer price from a number or a formatted string ("245,000"). Anything
 * unparseable is 0, which the engine treats as unknown.
 */
export function parsePrice(value: number | string | undefined): number {
  if (value === undefined) return 0;
  const n = typeof value === "number" ? value : parseFloat(value.replace(/[^\d.]/g, ""));
  return Number.isFinite(n) && n > 0 ? Math.round(n) : 0;
}

/**
 * Uppercased concatenation of a record's values: id, name, every field
 * value in insertion order, then price.
 */
export function rawText(record: RawPartRecord): string {
  const parts: string[] = [record.id, record.name];
  for (const value of Object.values(record.fields ?? {})) {
    if (value !== null && value !== "") parts.push(String(value));
  }
  if (record.price !== undefined) parts.push(String(record.price));
  return parts.join(" ").toUpperCase();
}
