import { describe, expect, it } from "vitest";
import { RenderFailureError, UnknownLayoutError } from "../errors.js";
import { aggregateSite } from "../site/aggregate.js";
import { authored } from "../test/helpers.js";
import { createTemplateRegistry, renderPage, resolveLayout, type Template } from "./registry.js";

const site = aggregateSite([], { title: "Casebook", baseUrl: "" });
const titleTemplate: Template = ({ document, site }) => `<h1>${document.title}</h1><p>${site.title}</p>`;

describe("createTemplateRegistry", () => {
  it("looks up templates by name", () => {
    const registry = createTemplateRegistry({ post: titleTemplate });
    expect(registry.has("post")).toBe(true);
    expect(registry.get("post")).toBe(titleTemplate);
    expect(registry.get("page")).toBeUndefined();
  });

  it("lists names sorted", () => {
    const registry = createTemplateRegistry({ tag: titleTemplate, index: titleTemplate, post: titleTemplate });
    expect(registry.names()).toEqual(["index", "post", "tag"]);
  });

  it("does not see later changes to the source record", () => {
    const record: Record<string, Template> = { post: titleTemplate };
    const registry = createTemplateRegistry(record);
    record.page = titleTemplate;
    expect(registry.has("page")).toBe(false);
  });
});

describe("resolveLayout", () => {
  it("fails for an unregistered layout", () => {
    const registry = createTemplateRegistry({});
    const doc = authored({ slug: "scandal", layout: "post" });

    expect(() => resolveLayout(registry, doc)).toThrow(UnknownLayoutError);
    expect(() => resolveLayout(registry, doc)).toThrow('scandal: unknown layout "post"');
  });
});

describe("renderPage", () => {
  it("renders through the named layout", () => {
    const registry = createTemplateRegistry({ post: titleTemplate });
    const doc = authored({ slug: "scandal", title: "A Scandal" });

    expect(renderPage(doc, site, registry)).toEqual({ document: doc, html: "<h1>A Scandal</h1><p>Casebook</p>" });
  });

  it("wraps template errors", () => {
    const registry = createTemplateRegistry({
      post: () => {
        throw new Error("boom");
      },
    });
    const doc = authored({ slug: "scandal" });

    try {
      renderPage(doc, site, registry);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RenderFailureError);
      expect(err).toMatchObject({ kind: "RenderFailure", slug: "scandal", message: "scandal: render failed: boom" });
    }
  });
});
