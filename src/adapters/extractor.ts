import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import { safeFetch, UnsafeUrlError } from "./safe-fetch";
import { cleanText } from "./utils";
import type {
  ExtractedRecord,
  ExtractedValue,
  ExtractionField,
  ExtractionSchema,
  Extractor,
} from "./types";

const USER_AGENT = "Mozilla/5.0 (compatible; cagesync)";
const REQUEST_TIMEOUT_MS = 30_000;

/** HTTP or network failure while loading a page */
export class FetchPageError extends Error {
  constructor(
    message: string,
    readonly transient: boolean,
    readonly status?: number,
  ) {
    super(message);
    this.name = "FetchPageError";
  }
}

export interface ExtractorOptions {
  retryAttempts?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  /** Injected in tests to skip real waits */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Delay before retry number `attempt` (1-based): doubles from the initial value, capped. */
export function backoffDelay(attempt: number, initialMs = 2_000, maxMs = 10_000): number {
  return Math.min(initialMs * 2 ** (attempt - 1), maxMs);
}

function readField($: CheerioAPI, scope: Cheerio<AnyNode>, field: ExtractionField): ExtractedValue {
  switch (field.type) {
    case "list":
      return scope
        .find(field.selector)
        .toArray()
        .map((el) => readRecord($, $(el), field.fields));
    case "nested": {
      const target = scope.find(field.selector).first();
      return target.length ? readRecord($, target, field.fields) : null;
    }
    default: {
      const target: Cheerio<AnyNode> = field.selector ? scope.find(field.selector).first() : scope;
      if (!target.length) return null;
      if (field.type === "attribute") return cleanText(target.attr(field.attribute));
      if (field.type === "html") return target.html()?.trim() || null;
      return cleanText(target.text());
    }
  }
}

function readRecord($: CheerioAPI, scope: Cheerio<AnyNode>, fields: ExtractionField[]): ExtractedRecord {
  const record: ExtractedRecord = {};
  for (const field of fields) {
    record[field.name] = readField($, scope, field);
  }
  return record;
}

/**
 * Apply a CSS extraction schema to an HTML document.
 * Returns one record per `baseSelector` match (empty when nothing matches).
 */
export function extractFromHtml(html: string, schema: ExtractionSchema): ExtractedRecord[] {
  const $ = cheerio.load(html);
  return $(schema.baseSelector)
    .toArray()
    .map((el) => readRecord($, $(el), schema.fields));
}

/** Load a page body; throws FetchPageError, flagged transient for network errors, 429 and 5xx. */
export async function fetchPage(url: string): Promise<string> {
  let response: Response;
  try {
    response = await safeFetch(url, {
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FetchPageError(`Fetch failed: ${message}`, !(err instanceof UnsafeUrlError));
  }

  if (!response.ok) {
    const transient = response.status === 429 || response.status >= 500;
    throw new FetchPageError(`HTTP ${response.status}: ${response.statusText}`, transient, response.status);
  }
  return response.text();
}

/**
 * Build the extraction collaborator.
 * Transient failures are retried with exponential backoff; after the last
 * attempt (or on a permanent failure) the result is null. Never rejects.
 */
export function createExtractor(options: ExtractorOptions = {}): Extractor {
  const attempts = Math.max(1, options.retryAttempts ?? 3);
  const initialBackoffMs = options.initialBackoffMs ?? 2_000;
  const maxBackoffMs = options.maxBackoffMs ?? 10_000;
  const sleep = options.sleep ?? defaultSleep;

  return async (url, schema) => {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const html = await fetchPage(url);
        return extractFromHtml(html, schema);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        const transient = err instanceof FetchPageError && err.transient;
        if (!transient || attempt === attempts) {
          console.error(`[extractor] ${schema.name} extraction failed for ${url}: ${message}`);
          return null;
        }
        const delay = backoffDelay(attempt, initialBackoffMs, maxBackoffMs);
        console.warn(
          `[extractor] Attempt ${attempt}/${attempts} failed for ${url}: ${message}; retrying in ${delay}ms`,
        );
        await sleep(delay);
      }
    }
    return null;
  };
}
