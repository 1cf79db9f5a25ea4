import { readFileSync } from "node:fs";
import { extractionSchemaSchema, type ExtractionSchema } from "../types";

export type SchemaName = "event-listing" | "event" | "fighter-profile";

const cache = new Map<SchemaName, ExtractionSchema>();

/**
 * Load and validate an extraction schema shipped in ./schemas.
 * Throws on a missing or malformed file: that is a deployment error, not a scrape failure.
 */
export function loadSchema(name: SchemaName): ExtractionSchema {
  const cached = cache.get(name);
  if (cached) return cached;

  const file = new URL(`./schemas/${name}.json`, import.meta.url);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not read extraction schema "${name}": ${message}`);
  }

  const parsed = extractionSchemaSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid extraction schema "${name}": ${parsed.error.issues[0]?.message}`);
  }
  cache.set(name, parsed.data);
  return parsed.data;
}
