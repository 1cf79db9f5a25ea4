import { describe, it, expect } from "vitest";
import { loadSchema } from "./schemas";

describe("loadSchema", () => {
  it.each(["event-listing", "event", "fighter-profile"] as const)("loads the %s schema", (name) => {
    const schema = loadSchema(name);
    expect(schema.name).toBe(name);
    expect(schema.fields.length).toBeGreaterThan(0);
  });

  it("returns the cached instance on repeat loads", () => {
    expect(loadSchema("event")).toBe(loadSchema("event"));
  });

  it("declares the bout list on the event schema", () => {
    const bouts = loadSchema("event").fields.find((f) => f.name === "bouts");
    expect(bouts?.type).toBe("list");
  });
});
