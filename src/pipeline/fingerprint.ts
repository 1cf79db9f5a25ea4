import { createHash } from "crypto";

export type HashableValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | Date
  | HashableValue[]
  | { [key: string]: HashableValue };

/**
 * Serialize a value as JSON with object keys sorted at every depth.
 * Dates become ISO strings; undefined object members are dropped.
 */
export function canonicalJson(value: HashableValue): string {
  if (value === undefined || value === null) return "null";
  if (value instanceof Date) return JSON.stringify(value.toISOString());
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (typeof value === "object") {
    const members = Object.keys(value)
      .sort()
      .flatMap((key) => {
        const member = value[key];
        return member === undefined ? [] : [`${JSON.stringify(key)}:${canonicalJson(member)}`];
      });
    return `{${members.join(",")}}`;
  }
  return JSON.stringify(value);
}

/**
 * Generate a deterministic content hash for scraped data.
 * Used to detect unchanged events and fighter profiles and skip re-writing them.
 */
export function generateContentHash(value: HashableValue): string {
  return createHash("sha256").update(canonicalJson(value)).digest("hex");
}
