/**
 * SSRF-safe fetch wrapper for listing and profile pages.
 * Every URL, including each redirect target, is checked against private and
 * reserved ranges before it is requested. Redirects are followed by hand.
 */
import { validateSourceUrl } from "./utils";

const MAX_REDIRECTS = 5;

/** The URL (or a redirect target) may not be fetched; retrying will not help */
export class UnsafeUrlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsafeUrlError";
  }
}

function assertFetchable(url: string): void {
  try {
    validateSourceUrl(url);
  } catch (err) {
    throw new UnsafeUrlError(err instanceof Error ? err.message : String(err));
  }
}

export async function safeFetch(url: string, init?: RequestInit): Promise<Response> {
  assertFetchable(url);
  let currentUrl = url;

  for (let redirects = 0; redirects <= MAX_REDIRECTS; redirects++) {
    const response = await fetch(currentUrl, { ...init, redirect: "manual" });
    const location = response.status >= 300 && response.status < 400 ? response.headers.get("location") : null;
    if (!location) return response;
    currentUrl = new URL(location, currentUrl).toString();
    assertFetchable(currentUrl);
  }
  throw new UnsafeUrlError(`Too many redirects (>${MAX_REDIRECTS}) from ${url}`);
}
