type DiffOp = { type: " " | "-" | "+"; text: string; aIndex: number; bIndex: number };

const CONTEXT_LINES = 3;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.9;
// Ratios are compared at this many decimal places.
const SIMILARITY_PRECISION = 1;
// Above this many table cells a changed run is reported as replaced wholesale.
const MAX_LCS_CELLS = 4_000_000;
// Above this many removed×added pairs only exact rewrites are suppressed.
const MAX_SIMILARITY_PAIRS = 40_000;

function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Line edit script between `a` and `b`. Common prefix and suffix are peeled
 * off before the LCS table is built; within a changed run removals come
 * before additions. A middle too large for the table is treated as one
 * replaced block.
 */
function diffLines(a: string[], b: string[]): DiffOp[] {
  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix++;
  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++;
  }

  const midA = a.slice(prefix, a.length - suffix);
  const midB = b.slice(prefix, b.length - suffix);
  const n = midA.length;
  const m = midB.length;
  const width = m + 1;
  const tabulate = (n + 1) * width <= MAX_LCS_CELLS;
  const lcs = new Uint32Array(tabulate ? (n + 1) * width : 0);
  if (tabulate) {
    for (let i = n - 1; i >= 0; i--) {
      for (let j = m - 1; j >= 0; j--) {
        lcs[i * width + j] =
          midA[i] === midB[j]
            ? lcs[(i + 1) * width + j + 1] + 1
            : Math.max(lcs[(i + 1) * width + j], lcs[i * width + j + 1]);
      }
    }
  }

  const ops: DiffOp[] = [];
  for (let k = 0; k < prefix; k++) ops.push({ type: " ", text: a[k], aIndex: k, bIndex: k });

  let i = 0;
  let j = 0;
  let removed: DiffOp[] = [];
  let added: DiffOp[] = [];
  const flush = () => {
    ops.push(...removed, ...added);
    removed = [];
    added = [];
  };
  while (i < n || j < m) {
    if (tabulate && i < n && j < m && midA[i] === midB[j]) {
      flush();
      ops.push({ type: " ", text: midA[i], aIndex: prefix + i, bIndex: prefix + j });
      i++;
      j++;
    } else if (j >= m || (i < n && (!tabulate || lcs[(i + 1) * width + j] >= lcs[i * width + j + 1]))) {
      removed.push({ type: "-", text: midA[i], aIndex: prefix + i, bIndex: prefix + j });
      i++;
    } else {
      added.push({ type: "+", text: midB[j], aIndex: prefix + i, bIndex: prefix + j });
      j++;
    }
  }
  flush();

  for (let k = 0; k < suffix; k++) {
    const aIndex = a.length - suffix + k;
    const bIndex = b.length - suffix + k;
    ops.push({ type: " ", text: a[aIndex], aIndex, bIndex });
  }
  return ops;
}

function formatRange(start: number, length: number): string {
  const beginning = start + 1;
  if (length === 1) return `${beginning}`;
  return `${length === 0 ? beginning - 1 : beginning},${length}`;
}

/**
 * Unified diff of two page bodies. `null` when there is nothing to compare
 * against (empty previous body) or the bodies have the same lines.
 */
export function rawDiff(previous: string | null | undefined, current: string): string | null {
  if (!previous) return null;

  const a = splitLines(previous);
  const b = splitLines(current);
  const ops = diffLines(a, b);
  const changed = ops.map((op, idx) => (op.type === " " ? -1 : idx)).filter((idx) => idx >= 0);
  if (changed.length === 0) return null;

  // Group changes into hunks with shared context.
  const hunks: Array<[number, number]> = [];
  for (const idx of changed) {
    const start = Math.max(0, idx - CONTEXT_LINES);
    const end = Math.min(ops.length, idx + CONTEXT_LINES + 1);
    const last = hunks[hunks.length - 1];
    if (last && start <= last[1]) {
      last[1] = Math.max(last[1], end);
    } else {
      hunks.push([start, end]);
    }
  }

  const out: string[] = ["--- previous", "+++ current"];
  for (const [start, end] of hunks) {
    const slice = ops.slice(start, end);
    const first = slice[0];
    const aLen = slice.filter((op) => op.type !== "+").length;
    const bLen = slice.filter((op) => op.type !== "-").length;
    out.push(`@@ -${formatRange(first.aIndex, aLen)} +${formatRange(first.bIndex, bLen)} @@`);
    for (const op of slice) out.push(`${op.type}${op.text}`);
  }
  return out.join("\n");
}

function isDroppedLine(line: string): boolean {
  if (!line) return true;
  if (line.startsWith("//")) return true;
  if (line.startsWith("|")) return true;
  if (line === "#br" || line === "#br;") return true;
  return line.startsWith("#");
}

/**
 * Cleans one diff line for display. `null` means the line carries no
 * readable content (comments, plugin blocks, directives, bare bullets).
 */
export function normalizeLine(content: string): string | null {
  let line = content.trim().replace(/^[\s-]+/, "");
  if (isDroppedLine(line)) return null;

  line = line
    .replace(/'''(.+?)'''/g, "$1")
    .replace(/''(.+?)''/g, "$1")
    .replace(/&color\([^)]*\)\{([^{}]*)\};?/g, "$1")
    .replace(/&color\([^)]*\);?/g, "")
    .replace(/&size\([^)]*\)\{([^{}]*)\};?/g, "$1")
    .replace(/&br(?:\(\);?|;)/g, "")
    .replace(
      /&(?:\s*[A-Za-z_][\w-]*\([^)]*\)|[A-Za-z_][\w-]*)(?:\{([^{}]*)\})?;/g,
      (_match: string, inner: string | undefined) => inner ?? ""
    )
    .replace(/%%%(.+?)%%%/g, "__$1__")
    .replace(/%%(.+?)%%/g, "~~$1~~")
    .replace(/\{([^{}]*)\}/g, "$1")
    .replace(/\s*\[#[^\]]*\]\s*$/, "")
    .replace(/^\*+\s*/, "")
    .trim();

  return line ? line : null;
}

export interface ParsedDiff {
  removed: string[];
  added: string[];
}

export function parseDiff(diff: string | string[]): ParsedDiff {
  const lines = Array.isArray(diff) ? diff : splitLines(diff);
  const removed: string[] = [];
  const added: string[] = [];
  let inBody = false;

  for (const line of lines) {
    if (!inBody && (line.startsWith("---") || line.startsWith("+++"))) continue;
    inBody = true;
    if (line.startsWith("-")) {
      const cleaned = normalizeLine(line.slice(1));
      if (cleaned !== null) removed.push(cleaned);
    } else if (line.startsWith("+")) {
      const cleaned = normalizeLine(line.slice(1));
      if (cleaned !== null) added.push(cleaned);
    }
  }
  return { removed, added };
}

function longestMatch(
  a: string[],
  b: string[],
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): [number, number, number] {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  let prev = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (let j = blo; j < bhi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (prev.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > bestSize) {
        bestI = i - size + 1;
        bestJ = j - size + 1;
        bestSize = size;
      }
    }
    prev = next;
  }
  return [bestI, bestJ, bestSize];
}

/** Total length of matching blocks, found by recursive longest-match splitting. */
function matchingCharacters(a: string[], b: string[]): number {
  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const [i, j, size] = longestMatch(a, b, alo, ahi, blo, bhi);
    if (size === 0) continue;
    total += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }
  return total;
}

export function similarity(left: string, right: string): number {
  const a = Array.from(left);
  const b = Array.from(right);
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(a, b)) / length;
}

/**
 * Drops added lines that are rewrites of a removed line, so a reworded
 * sentence is not reported as new content.
 */
export function suppressNearDuplicateEdits(
  removed: string[],
  added: string[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): string[] {
  if (removed.length === 0) return [...added];
  const exact = new Set(removed);
  const fuzzy = removed.length * added.length <= MAX_SIMILARITY_PAIRS;
  const scale = 10 ** SIMILARITY_PRECISION;
  const rounded = (ratio: number) => Math.round(ratio * scale) / scale;

  return added.filter((line) => {
    if (exact.has(line)) return false;
    if (!fuzzy) return true;
    const length = Array.from(line).length;
    return !removed.some((old) => {
      const oldLength = Array.from(old).length;
      // Upper bound on the ratio from the lengths alone.
      const bound = (2 * Math.min(length, oldLength)) / (length + oldLength || 1);
      return rounded(bound) >= threshold && rounded(similarity(old, line)) >= threshold;
    });
  });
}

export function displayDiff(
  diff: string | null | undefined,
  applySuppression: boolean = true,
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): string | null {
  if (!diff) return null;
  const { removed, added } = parseDiff(diff);
  const lines = applySuppression ? suppressNearDuplicateEdits(removed, added, threshold) : added;
  return lines.length > 0 ? lines.join("\n") : null;
}

/** Raw added lines (marker stripped, no normalization). */
export function addedLines(diff: string | null | undefined): string[] {
  if (!diff) return [];
  const out: string[] = [];
  let inBody = false;
  for (const line of splitLines(diff)) {
    if (!inBody && (line.startsWith("---") || line.startsWith("+++"))) continue;
    inBody = true;
    if (line.startsWith("+")) out.push(line.slice(1));
  }
  return out;
}
