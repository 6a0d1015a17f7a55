import { DEFAULT_SIMILARITY_THRESHOLD, displayDiff, parseDiff, rawDiff } from "./diff.js";
import { PageSnapshot, PreviewLinkStyle } from "./types.js";
import { charWidth } from "./utils.js";

export const DEFAULT_PREVIEW_MAX_CHARS = 80;

const MARKDOWN_LINK = /\[([^[\]]+)\]\((https?:\/\/[^\s)]+)\)/g;
const BARE_URL = /https?:\/\/[^\s<>"')\]]+/g;

/**
 * Builds the next snapshot for a page. The diff is kept only when at least
 * one added line survives normalization.
 */
export function buildSnapshot(
  pageName: string,
  content: string,
  timestamp: string | null,
  previous?: PageSnapshot | null
): PageSnapshot {
  const diff = rawDiff(previous?.content, content);
  const meaningful = diff !== null && parseDiff(diff).added.length > 0;
  return { pageName, content, timestamp, diff: meaningful ? diff : null };
}

type Segment = { link: true; text: string; label: string } | { link: false; text: string };

function splitMarkdownLinks(text: string): Segment[] {
  const segments: Segment[] = [];
  let last = 0;
  for (const match of text.matchAll(MARKDOWN_LINK)) {
    const index = match.index ?? 0;
    if (index > last) segments.push({ link: false, text: text.slice(last, index) });
    segments.push({ link: true, text: match[0], label: match[1] });
    last = index + match[0].length;
  }
  if (last < text.length) segments.push({ link: false, text: text.slice(last) });
  return segments;
}

/**
 * Rewrites wiki and markdown links for chat display. In `plain` style every
 * link becomes its label; in `markdown` style wiki links to absolute URLs
 * become `[label](url)` tokens and existing ones are kept. Bare URLs are
 * always removed.
 */
export function convertLinks(text: string, style: PreviewLinkStyle = "plain"): string {
  const withWikiLinks = text
    .replace(/\[\[([^[\]>]+)>([^[\]]+)\]\]/g, (_m: string, label: string, target: string) =>
      style === "markdown" && /^https?:\/\//.test(target) ? `[${label}](${target})` : label
    )
    .replace(/\[\[([^[\]]+)\]\]/g, "$1");

  return splitMarkdownLinks(withWikiLinks)
    .map((segment) => {
      if (segment.link) return style === "markdown" ? segment.text : segment.label;
      return segment.text.replace(BARE_URL, "");
    })
    .join("")
    .replace(/[ \t]{2,}/g, " ");
}

/**
 * Cuts `text` to `maxWidth` display columns (wide characters count 2).
 * Markdown link tokens are never split and do not consume the budget.
 */
export function truncateDisplay(text: string, maxWidth: number): string {
  let used = 0;
  let out = "";
  for (const segment of splitMarkdownLinks(text)) {
    if (segment.link) {
      out += segment.text;
      continue;
    }
    for (const char of segment.text) {
      const width = charWidth(char);
      if (used + width > maxWidth) return out;
      used += width;
      out += char;
    }
  }
  return out;
}

export interface PreviewOptions {
  maxChars?: number;
  fullDiffPageNames?: readonly string[];
  linkStyle?: PreviewLinkStyle;
  similarityThreshold?: number;
}

export function contentDiffPreview(
  snapshot: PageSnapshot | null | undefined,
  options: PreviewOptions = {}
): string | null {
  if (!snapshot || !snapshot.diff) return null;
  const {
    maxChars = DEFAULT_PREVIEW_MAX_CHARS,
    fullDiffPageNames = [],
    linkStyle = "plain",
    similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD,
  } = options;

  const fullDiff = fullDiffPageNames.some((name) => name.toLowerCase() === snapshot.pageName.toLowerCase());
  const display = displayDiff(snapshot.diff, !fullDiff, similarityThreshold);
  if (!display) return null;

  const firstLine = convertLinks(display, linkStyle).split("\n")[0];
  const preview = truncateDisplay(firstLine.trim(), maxChars).trim();
  return preview ? preview : null;
}
