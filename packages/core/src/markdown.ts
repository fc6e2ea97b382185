import MarkdownIt from "markdown-it";
import taskLists from "markdown-it-task-lists";
import type { MarkdownConfig } from "./config.js";

export type MarkdownRenderer = (body: string) => string;

/**
 * Build a CommonMark renderer.
 *
 * Void tags are written XHTML style (`<br />`) and the trailing newline
 * markdown-it adds after the last block is removed, so the fragment can be
 * dropped into a template inline.
 */
export function createMarkdownRenderer(options: MarkdownConfig = {}): MarkdownRenderer {
  const md = new MarkdownIt({
    html: options.html ?? true,
    xhtmlOut: true,
    linkify: options.linkify ?? false,
    breaks: false,
    typographer: options.typographer ?? false,
  });
  if (options.taskLists ?? true) {
    md.use(taskLists, { label: true, labelAfter: true });
  }

  return (body) => md.render(body).replace(/\n$/, "");
}

/** Renderer with the default options */
export const renderMarkdown: MarkdownRenderer = createMarkdownRenderer();
