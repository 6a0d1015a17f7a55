import crypto from "node:crypto";

export function md5(input: string): string {
  return crypto.createHash("md5").update(input).digest("hex");
}

export function normalizeLink(link: string): string {
  return link.trim().replace(/\/+$/, "");
}

export function pageKey(pageName: string): string {
  return normalizeLink(pageName);
}

export function seenKey(pageName: string): string {
  return `page/${pageKey(pageName)}`;
}

export function contentKey(pageName: string): string {
  return `content_${pageKey(pageName)}`;
}

export function pageUrl(wikiUrl: string, pageName: string): string {
  return wikiUrl ? `${wikiUrl.replace(/\/+$/, "")}/?${pageName}` : pageName;
}

// East Asian Wide and Fullwidth blocks
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2329, 0x232a],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xa960, 0xa97f],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1b000, 0x1b001],
  [0x1f200, 0x1f251],
  [0x1f300, 0x1f64f],
  [0x1f900, 0x1f9ff],
  [0x20000, 0x3fffd],
];

export function charWidth(char: string): number {
  const code = char.codePointAt(0);
  if (code === undefined) return 0;
  for (const [start, end] of WIDE_RANGES) {
    if (code >= start && code <= end) return 2;
  }
  return 1;
}

export function displayWidth(text: string): number {
  let width = 0;
  for (const char of text) width += charWidth(char);
  return width;
}
