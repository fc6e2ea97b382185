import { Cursor } from "./cursor.js";
import { RenderError } from "./errors.js";
import { readMetadata } from "./meta.js";
import { parseTitle } from "./title.js";
import type { MetaEntry } from "./types.js";

/** A Markdown source split into its parts */
export interface MarkdownDocument {
  meta: MetaEntry[];
  /** Heading text, or null when the metadata supplies the title instead */
  title: string | null;
  body: string;
}

/**
 * Split a Markdown source into metadata, title and body.
 *
 * A document without a heading is accepted when its metadata declares
 * `title`; the whole text after the metadata is then the body.
 *
 * @throws RenderError of kind `MalformedMetadataBlock` or `MissingTitle`
 */
export function parseMarkdownDocument(markdown: string): MarkdownDocument {
  const { entries, rest } = readMetadata(Cursor.from(markdown));

  const title = parseTitle(rest);
  if (title.ok) {
    return { meta: entries, title: title.value, body: title.rest.fragment };
  }

  if (entries.some((entry) => entry.key === "title")) {
    return { meta: entries, title: null, body: rest.fragment };
  }
  throw RenderError.fromFailure(title.error, "MissingTitle");
}
