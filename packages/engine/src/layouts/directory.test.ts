/**
 * Template Directory Tests
 */

import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { InvalidTemplateError } from "../errors.js";
import { aggregateSite } from "../site/aggregate.js";
import { authored } from "../test/helpers.js";
import { loadTemplateDirectory, moduleTemplate } from "./directory.js";
import { layoutHelpers } from "./registry.js";

const fixture = (name: string) => fileURLToPath(new URL(`./__fixtures__/${name}`, import.meta.url));

const site = aggregateSite([], { title: "Casebook", baseUrl: "" });
const document = authored({ slug: "scandal", title: "A Scandal" });
const context = { document, site, helpers: layoutHelpers };

describe("loadTemplateDirectory", () => {
  it("loads one layout per module", async () => {
    const templates = await loadTemplateDirectory(fixture("templates"));
    expect(Object.keys(templates).sort()).toEqual(["broken", "card", "dated", "post"]);
  });

  it("renders string templates as is", async () => {
    const templates = await loadTemplateDirectory(fixture("templates"));
    expect(templates.post(context)).toBe("<article><h1>A Scandal</h1><p>Casebook</p></article>");
  });

  it("renders React elements to a document", async () => {
    const templates = await loadTemplateDirectory(fixture("templates"));
    expect(templates.card(context)).toBe("<!DOCTYPE html><html><head></head><body>A Scandal</body></html>");
  });

  it("rejects templates that return anything else", async () => {
    const templates = await loadTemplateDirectory(fixture("templates"));
    expect(() => templates.broken(context)).toThrow(
      "template returned neither a string nor a React element",
    );
  });

  it("passes display helpers to template modules", async () => {
    const templates = await loadTemplateDirectory(fixture("templates"));
    expect(templates.dated(context)).toBe("Jan 2023 · scandal");
  });

  it("returns no layouts for a missing directory", async () => {
    expect(await loadTemplateDirectory(fixture("does-not-exist"))).toEqual({});
  });

  it("requires a default export function", async () => {
    await expect(loadTemplateDirectory(fixture("no-default"))).rejects.toMatchObject({
      kind: "InvalidTemplate",
      name: "page",
      reason: "default export must be a function",
    });
  });

  it("rejects two modules for the same layout", async () => {
    await expect(loadTemplateDirectory(fixture("duplicate"))).rejects.toMatchObject({
      kind: "InvalidTemplate",
      name: "post",
      reason: "another module already defines this layout",
    });
  });

  it("reports modules that fail to load", async () => {
    const result = loadTemplateDirectory(fixture("throws"));
    await expect(result).rejects.toBeInstanceOf(InvalidTemplateError);
    await expect(result).rejects.toMatchObject({ name: "bad", reason: "exploded" });
  });
});

describe("moduleTemplate", () => {
  it("passes the layout context through", () => {
    const template = moduleTemplate(({ document }) => document.slug);
    expect(template(context)).toBe("scandal");
  });
});
