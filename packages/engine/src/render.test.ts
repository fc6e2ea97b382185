import { describe, test, expect } from "vitest";
import { parseMarkdownDocument } from "./document.js";
import { RenderError } from "./errors.js";
import { parsePlaceholderLocations } from "./placeholders.js";
import { renderDocument, renderTemplate, replaceSubstring } from "./render.js";
import { createVariables } from "./variables.js";
import type { FilterContext, VariableTable } from "./types.js";

const context: FilterContext = {
  renderMarkdown: (body) => `<md>${body.trim()}</md>`,
};

const MARKDOWN = ":meta\ntitle = Meta title\nauthor = John Doe\n:meta\n# Markdown title\nThis is my content";

function vars(entries: Record<string, string>): VariableTable {
  return new Map(Object.entries(entries));
}

function renderError(fn: () => unknown): RenderError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RenderError) return err;
    throw err;
  }
  throw new Error("expected a RenderError");
}

describe("replaceSubstring", () => {
  test("replaces a half-open range", () => {
    expect(replaceSubstring("Hello, World!", 7, 12, "there")).toBe("Hello, there!");
    expect(replaceSubstring("abc", 1, 1, "-")).toBe("a-bc");
  });
});

describe("renderTemplate", () => {
  test("returns a template without placeholders unchanged", () => {
    const template = "<html>\n  <p>{{ not one }} £price</p>\n</html>\n";
    expect(renderTemplate(template, vars({}), context)).toBe(template);
  });

  test("applies filters to the value", () => {
    expect(renderTemplate("<p>{{ £variable | UPPERCASE }}</p>", vars({ variable: "hi" }), context)).toBe(
      "<p>HI</p>"
    );
  });

  test("substitutes the same variable at several places", () => {
    const template = "<title>{{ £title }}</title><h1>{{ £title | uppercase }}</h1>";
    expect(renderTemplate(template, vars({ title: "Hi there" }), context)).toBe(
      "<title>Hi there</title><h1>HI THERE</h1>"
    );
  });

  test("gives the same result as replacing every span at once", () => {
    const template = "A{{ £a }}B{{ £b | reverse }}C{{ £a | uppercase }}D";
    const variables = vars({ a: "xy", b: "long value" });

    // Rebuild from the original offsets, left to right
    const ordered = parsePlaceholderLocations(template).slice().reverse();
    const rendered = ["xy", "eulav gnol", "XY"];
    let simultaneous = "";
    let from = 0;
    ordered.forEach((placeholder, index) => {
      simultaneous += template.slice(from, placeholder.selection.start.offset) + rendered[index];
      from = placeholder.selection.end.offset;
    });
    simultaneous += template.slice(from);

    const output = renderTemplate(template, variables, context);
    expect(output).toBe("AxyBeulav gnolCXYD");
    expect(output).toBe(simultaneous);
  });

  test("fails on an undefined variable", () => {
    const err = renderError(() => renderTemplate("<p>\n{{ £missing }}</p>", vars({}), context));
    expect(err.kind).toBe("UndefinedVariable");
    expect(err.position).toEqual({ line: 2, offset: 4 });
    expect(err.message).toBe('Undefined variable "missing" (line 2, offset 4)');
  });

  test("fails when a numeric filter gets text", () => {
    const err = renderError(() => renderTemplate("{{ £price | ceil }}", vars({ price: "free" }), context));
    expect(err.kind).toBe("InvalidFilterInput");
    expect(err.message).toBe('ceil expects a number, got "free" in "price" (line 1, offset 0)');
  });

  test("reports an out-of-range round precision as a malformed placeholder", () => {
    const err = renderError(() => renderTemplate("{{ £n | round = 9999999999 }}", vars({ n: "1.5" }), context));
    expect(err.kind).toBe("MalformedPlaceholder");
    expect(err.message).toBe('"precision" of round must be at most 100, got "9999999999" (line 1, offset 8)');
  });

  test("renders large integers through ceil without exponent form", () => {
    expect(renderTemplate("{{ £n | ceil }}", vars({ n: "1000000000000000000000.1" }), context)).toBe(
      "1000000000000000000001"
    );
  });
});

describe("parseMarkdownDocument", () => {
  test("splits metadata, title and body", () => {
    expect(parseMarkdownDocument(MARKDOWN)).toEqual({
      meta: [
        { key: "title", value: "Meta title" },
        { key: "author", value: "John Doe" },
      ],
      title: "Markdown title",
      body: "\nThis is my content",
    });
  });

  test("accepts a missing heading when metadata has a title", () => {
    expect(parseMarkdownDocument(":meta\ntitle = Only meta\n:meta\nJust text")).toEqual({
      meta: [{ key: "title", value: "Only meta" }],
      title: null,
      body: "Just text",
    });
  });

  test("fails without any title", () => {
    const err = renderError(() => parseMarkdownDocument(":meta\nauthor = A\n:meta\nJust text"));
    expect(err.kind).toBe("MissingTitle");
    expect(err.position).toEqual({ line: 4, offset: 23 });
  });
});

describe("createVariables", () => {
  const document = {
    meta: [
      { key: "title", value: "From meta" },
      { key: "tag", value: "a" },
      { key: "tag", value: "b" },
    ],
    title: "From heading",
    body: "Body",
  };

  test("metadata wins by default", () => {
    const variables = createVariables(document);
    expect(variables.get("title")).toBe("From meta");
    expect(variables.get("content")).toBe("Body");
  });

  test("derived values win when asked", () => {
    const variables = createVariables(document, { precedence: "derived" });
    expect(variables.get("title")).toBe("From heading");
  });

  test("a repeated key keeps its last value", () => {
    expect(createVariables(document).get("tag")).toBe("b");
  });

  test("metadata can replace content", () => {
    const variables = createVariables({ meta: [{ key: "content", value: "Override" }], title: "T", body: "Body" });
    expect(variables.get("content")).toBe("Override");
    expect(createVariables({ meta: [{ key: "content", value: "Override" }], title: "T", body: "Body" }, {
      precedence: "derived",
    }).get("content")).toBe("Body");
  });
});

describe("renderDocument", () => {
  const template = "<title>{{ £title }}</title><p>{{ £author }}</p>{{ £content | markdown }}";

  test("renders metadata, title and content", () => {
    const result = renderDocument(MARKDOWN, template, context);
    expect(result.html).toBe("<title>Meta title</title><p>John Doe</p><md>This is my content</md>");
    expect(result.placeholders.map((p) => p.name)).toEqual(["content", "author", "title"]);
  });

  test("uses the heading when derived values win", () => {
    const result = renderDocument(MARKDOWN, template, { ...context, precedence: "derived" });
    expect(result.html).toBe("<title>Markdown title</title><p>John Doe</p><md>This is my content</md>");
  });

  test("works without metadata", () => {
    const result = renderDocument("# Plain\nText", "<h1>{{ £title | text = kebab }}</h1>{{ £content }}", context);
    expect(result.html).toBe("<h1>plain</h1>\nText");
  });

  test("fails before substituting anything", () => {
    const err = renderError(() => renderDocument("# T\n", "{{ £title }} {{ £nope }}", context));
    expect(err.kind).toBe("UndefinedVariable");
  });
});
