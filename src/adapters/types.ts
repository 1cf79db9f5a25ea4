import { z } from "zod";

/** A value produced by the schema extractor: text, a nested record, or a list of records */
export type ExtractedValue = string | null | ExtractedRecord | ExtractedRecord[];

export interface ExtractedRecord {
  [field: string]: ExtractedValue;
}

/** One field of an extraction schema; `selector` is relative to the enclosing element */
export type ExtractionField =
  | { name: string; selector?: string; type: "text" }
  | { name: string; selector?: string; type: "html" }
  | { name: string; selector?: string; type: "attribute"; attribute: string }
  | { name: string; selector: string; type: "nested"; fields: ExtractionField[] }
  | { name: string; selector: string; type: "list"; fields: ExtractionField[] };

/** CSS extraction schema: one record per `baseSelector` match */
export interface ExtractionSchema {
  name: string;
  baseSelector: string;
  fields: ExtractionField[];
}

const fieldSchema: z.ZodType<ExtractionField> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ name: z.string().min(1), selector: z.string().optional(), type: z.literal("text") }),
    z.object({ name: z.string().min(1), selector: z.string().optional(), type: z.literal("html") }),
    z.object({
      name: z.string().min(1),
      selector: z.string().optional(),
      type: z.literal("attribute"),
      attribute: z.string().min(1),
    }),
    z.object({
      name: z.string().min(1),
      selector: z.string().min(1),
      type: z.literal("nested"),
      fields: z.array(fieldSchema),
    }),
    z.object({
      name: z.string().min(1),
      selector: z.string().min(1),
      type: z.literal("list"),
      fields: z.array(fieldSchema),
    }),
  ]),
);

export const extractionSchemaSchema: z.ZodType<ExtractionSchema> = z.object({
  name: z.string().min(1),
  baseSelector: z.string().min(1),
  fields: z.array(fieldSchema).min(1),
});

/**
 * Extraction collaborator: fetch a page and apply a schema.
 * Resolves to null when the page could not be fetched after retries; never rejects.
 */
export type Extractor = (url: string, schema: ExtractionSchema) => Promise<ExtractedRecord[] | null>;

/** Event page header as scraped (strings as shown on the page) */
export type ScrapedEventHeader = {
  name: string | null;
  dateText: string | null; // e.g. "Saturday 06.28.2025 at 06:30 PM ET"
  promotion: string | null;
  venue: string | null;
  location: string | null;
  broadcast: string | null;
  boutCount: number | null;
  imageUrl: string | null;
};

export type ScrapedFighterRef = {
  name: string | null;
  url: string | null; // absolute profile URL
};

/** One bout from an event's fight card */
export type ScrapedBout = {
  fighter1: ScrapedFighterRef;
  fighter2: ScrapedFighterRef;
  result1: string | null; // raw result label, e.g. "W", "Loss", "Cancelled"
  result2: string | null;
  boutOrder: number | null; // position on the card, 1 = opener as listed
  fightType: string | null; // "Main Event", "Prelim", ...
  weightClass: string | null;
  finishMethod: string | null;
  finishDetails: string | null;
  roundFormat: string | null; // e.g. "3 x 5"
};

export type ScrapedEvent = {
  header: ScrapedEventHeader | null;
  bouts: ScrapedBout[];
};

/** Fighter profile page fields as scraped */
export type ScrapedFighterProfile = {
  name: string | null;
  nickname: string | null;
  age: string | null;
  dateOfBirth: string | null;
  height: string | null; // e.g. `5'11" (180cm)`
  weightClass: string | null;
  lastWeighIn: string | null; // e.g. "155.5 lbs"
  lastFightDate: string | null;
  born: string | null;
  headCoach: string | null;
  otherCoaches: string | null;
  affiliation: string | null;
  record: string | null; // e.g. "20-3-1, 1 NC"
  currentStreak: string | null;
  imageUrl: string | null;
};

/** One event entry from a promotion's listing page */
export interface ListingEntry {
  url: string;
  name: string | null;
  dateText: string | null;
}
