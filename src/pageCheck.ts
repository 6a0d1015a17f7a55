import { displayDiff } from "./diff.js";
import { buildSnapshot, contentDiffPreview } from "./snapshot.js";
import { MonitorConfig, PageData, PageSnapshot, SnapshotMap, State, WatchEvent } from "./types.js";
import { contentKey, md5, pageKey, pageUrl, seenKey } from "./utils.js";

export const Emoji = {
  initial: "🔔",
  update: "📝",
  new: "🆕",
} as const;

export type PageStatus = "initial" | "unchanged" | "insignificant" | "updated" | "empty";

export interface PageCheck {
  pageName: string;
  status: PageStatus;
  event: WatchEvent | null;
  contentHash: string | null; // null: leave the stored hash as it is
  snapshot: PageSnapshot | null; // null: no new snapshot this cycle
  closed: boolean;
}

export type StateView = Pick<State, "seen" | "contentHashes">;

const PAGE_LINK = /\[\[([^\]]+)\]\]/g;

/** Page names referenced as `[[Page]]`, `[[label>Page]]` or `[[Page#anchor]]`, in first-seen order. */
export function extractPageNames(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(PAGE_LINK)) {
    const inner = match[1];
    const target = inner.includes(">") ? inner.slice(inner.lastIndexOf(">") + 1) : inner;
    const name = target.split("#")[0].trim();
    if (!name || /^https?:\/\//.test(name)) continue;
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

export function isPageClosed(body: string | null | undefined, marker: string): boolean {
  if (!body) return false;
  for (const line of body.split("\n")) {
    const stripped = line.trim();
    if (!stripped) continue;
    const heading = /^\*\s*(.*)$/.exec(stripped);
    return heading !== null && heading[1].startsWith(marker);
  }
  return false;
}

export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => new RegExp(`^(?:${pattern})`));
}

export function matchesPattern(pageName: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((re) => re.test(pageName));
}

export function initialEvent(config: MonitorConfig, pageName: string, page: PageData): WatchEvent {
  return {
    title: `${Emoji.initial} 【${page.title}】 の通知が設定されました。`,
    url: pageUrl(config.wikiUrl, pageName),
    pageName,
    date: page.timestamp,
    diffPreview: null,
    isInitial: true,
  };
}

export function updatedEvent(config: MonitorConfig, pageName: string, page: PageData, preview: string | null): WatchEvent {
  return {
    title: `${Emoji.update} 【${page.title}】 が更新されました。`,
    url: pageUrl(config.wikiUrl, pageName),
    pageName,
    date: page.timestamp,
    diffPreview: preview,
    isInitial: false,
  };
}

export function pageListEvent(
  config: MonitorConfig,
  kind: "created" | "tracked",
  pageNames: readonly string[],
  date: string | null
): WatchEvent {
  const title =
    kind === "created"
      ? `${Emoji.new} ページが${pageNames.length}件 新規作成されました`
      : `${Emoji.initial} ページが${pageNames.length}件 通知登録されました`;
  return {
    title,
    url: config.wikiUrl,
    pageName: config.recentCreatedPage,
    date,
    diffPreview: pageNames.map((name) => `・${name}`).join("\n"),
    isInitial: false,
  };
}

/**
 * Classifies one fetched page against the stored state and computes what
 * should change for it. Pure: the caller applies the result.
 */
export function evaluatePage(
  pageName: string,
  page: PageData,
  state: StateView,
  snapshots: SnapshotMap,
  config: MonitorConfig,
  fullDiff: boolean = false
): PageCheck {
  const key = pageKey(pageName);
  const body = page.body ? page.body : null;
  const base = { pageName, closed: isPageClosed(body, config.closedMarker) };

  if (body === null) {
    return { ...base, status: "empty", event: null, contentHash: null, snapshot: null };
  }

  const oldHash = state.contentHashes[contentKey(pageName)];
  const newHash = md5(body);

  if (oldHash === undefined) {
    return {
      ...base,
      status: "initial",
      event: initialEvent(config, pageName, page),
      contentHash: newHash,
      snapshot: buildSnapshot(key, body, page.timestamp, null),
    };
  }

  const snapshot = newHash !== oldHash ? buildSnapshot(key, body, page.timestamp, snapshots.get(key)) : null;
  const result = { ...base, contentHash: newHash, snapshot, event: null };

  const storedDate = state.seen[seenKey(pageName)];
  if (!page.timestamp || storedDate === page.timestamp) {
    return { ...result, status: "unchanged" };
  }
  if (!snapshot || displayDiff(snapshot.diff, !fullDiff, config.similarityThreshold) === null) {
    return { ...result, status: "insignificant" };
  }

  const preview = contentDiffPreview(snapshot, {
    maxChars: config.previewMaxChars,
    fullDiffPageNames: fullDiff ? [key] : [],
    linkStyle: config.previewLinkStyle,
    similarityThreshold: config.similarityThreshold,
  });
  return { ...result, status: "updated", event: updatedEvent(config, pageName, page, preview) };
}

export interface MonitoredSet {
  pageNames: readonly string[];
  dynamicPages: ReadonlySet<string>;
  monitorRecentCreated: boolean;
  recentChangesPage: string;
  recentCreatedPage: string;
}

export function monitoredPageNames(set: MonitoredSet): Set<string> {
  const names = new Set<string>([...set.pageNames, ...set.dynamicPages].map(pageKey));
  if (set.monitorRecentCreated) names.add(pageKey(set.recentCreatedPage));
  if (set.pageNames.length > 0 || set.dynamicPages.size > 0) names.add(pageKey(set.recentChangesPage));
  return names;
}

/** Drops seen and hash entries for pages that are no longer monitored. */
export function cleanMonitoredState(
  seen: Record<string, string>,
  contentHashes: Record<string, string>,
  set: MonitoredSet
): { seen: Record<string, string>; contentHashes: Record<string, string> } {
  const names = [...monitoredPageNames(set)];
  const seenKeys = new Set(names.map(seenKey));
  const hashKeys = new Set(names.map(contentKey));

  return {
    seen: Object.fromEntries(
      Object.entries(seen).filter(([k]) => seenKeys.has(k) || !k.startsWith("page/"))
    ),
    contentHashes: Object.fromEntries(Object.entries(contentHashes).filter(([k]) => hashKeys.has(k))),
  };
}

/** Caps `seen` at `maxItems`, dropping entries with the smallest timestamps first. */
export function pruneSeen(seen: Record<string, string>, maxItems: number): Record<string, string> {
  const entries = Object.entries(seen);
  if (entries.length <= maxItems) return { ...seen };
  const oldest = entries
    .slice()
    .sort(([, a], [, b]) => (a < b ? -1 : a > b ? 1 : 0))
    .slice(0, entries.length - maxItems)
    .map(([k]) => k);
  const drop = new Set(oldest);
  return Object.fromEntries(entries.filter(([k]) => !drop.has(k)));
}
