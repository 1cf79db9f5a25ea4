import { describe, it, expect, vi, afterEach } from "vitest";
import { backoffDelay, createExtractor, extractFromHtml } from "./extractor";
import type { ExtractionSchema } from "./types";

const CARD_HTML = `
<html><body>
<div class="event">
  <h1>  UFC   300 </h1>
  <img class="poster" src="/images/ufc-300.jpg">
  <ul class="card">
    <li class="bout"><a class="f1" href="/fighters/1-alex">Alex One</a><span class="method">KO/TKO</span></li>
    <li class="bout"><a class="f1" href="/fighters/2-bo">Bo Two</a></li>
  </ul>
  <div class="notes"><b>Sold</b> out</div>
</div>
</body></html>`;

const SCHEMA: ExtractionSchema = {
  name: "test-event",
  baseSelector: "div.event",
  fields: [
    { name: "name", selector: "h1", type: "text" },
    { name: "poster", selector: "img.poster", type: "attribute", attribute: "src" },
    { name: "notes", selector: ".notes", type: "html" },
    { name: "missing", selector: ".nope", type: "text" },
    {
      name: "info",
      selector: ".notes",
      type: "nested",
      fields: [{ name: "bold", selector: "b", type: "text" }],
    },
    {
      name: "bouts",
      selector: "li.bout",
      type: "list",
      fields: [
        { name: "fighter", selector: "a.f1", type: "text" },
        { name: "url", selector: "a.f1", type: "attribute", attribute: "href" },
        { name: "method", selector: ".method", type: "text" },
      ],
    },
  ],
};

describe("extractFromHtml", () => {
  it("builds one record per base selector match", () => {
    expect(extractFromHtml(CARD_HTML, SCHEMA)).toEqual([
      {
        name: "UFC 300",
        poster: "/images/ufc-300.jpg",
        notes: "<b>Sold</b> out",
        missing: null,
        info: { bold: "Sold" },
        bouts: [
          { fighter: "Alex One", url: "/fighters/1-alex", method: "KO/TKO" },
          { fighter: "Bo Two", url: "/fighters/2-bo", method: null },
        ],
      },
    ]);
  });

  it("returns an empty list when the base selector matches nothing", () => {
    expect(extractFromHtml("<p>nothing</p>", SCHEMA)).toEqual([]);
  });

  it("returns null for a nested field whose selector is absent", () => {
    const [record] = extractFromHtml(CARD_HTML, {
      name: "nested",
      baseSelector: "div.event",
      fields: [{ name: "info", selector: ".absent", type: "nested", fields: [] }],
    });
    expect(record).toEqual({ info: null });
  });
});

describe("backoffDelay", () => {
  it("doubles from 2s and caps at 10s", () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(n))).toEqual([2000, 4000, 8000, 10000]);
  });
});

describe("createExtractor", () => {
  const url = "https://www.tapology.com/fightcenter/events/1-test";

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fetches and extracts a page", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(new Response(CARD_HTML, { status: 200 }));
    const extract = createExtractor({ sleep: vi.fn(async () => {}) });

    const records = await extract(url, SCHEMA);
    expect(records).toHaveLength(1);
    expect(records?.[0].name).toBe("UFC 300");
  });

  it("retries transient failures with backoff, then succeeds", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(new Response("busy", { status: 503, statusText: "Service Unavailable" }))
      .mockResolvedValueOnce(new Response(CARD_HTML, { status: 200 }));
    const sleep = vi.fn(async (_ms: number) => {});
    const extract = createExtractor({ retryAttempts: 3, sleep });

    const records = await extract(url, SCHEMA);
    expect(records).toHaveLength(1);
    expect(fetchSpy).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it("returns null after exhausting attempts", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => new Response("slow down", { status: 429 }));
    const extract = createExtractor({ retryAttempts: 3, sleep: vi.fn(async () => {}) });

    await expect(extract(url, SCHEMA)).resolves.toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(3);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("does not retry a 404", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValueOnce(new Response("Not found", { status: 404, statusText: "Not Found" }));
    const sleep = vi.fn(async () => {});
    const extract = createExtractor({ sleep });

    await expect(extract(url, SCHEMA)).resolves.toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("does not fetch blocked URLs", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchSpy = vi.spyOn(globalThis, "fetch");
    const extract = createExtractor({ sleep: vi.fn(async () => {}) });

    await expect(extract("http://127.0.0.1/admin", SCHEMA)).resolves.toBeNull();
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
