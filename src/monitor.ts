import { addedLines } from "./diff.js";
import { fetchBatch } from "./fetcher.js";
import {
  cleanMonitoredState,
  compilePatterns,
  evaluatePage,
  extractPageNames,
  isPageClosed,
  matchesPattern,
  MonitoredSet,
  monitoredPageNames,
  PageCheck,
  pageListEvent,
  pruneSeen,
  StateView,
} from "./pageCheck.js";
import { buildSnapshot } from "./snapshot.js";
import { describeLoadError, emptyState } from "./store.js";
import {
  DeliveryResult,
  EventSink,
  LoadResult,
  MonitorConfig,
  PageData,
  PageSnapshot,
  PageSource,
  SnapshotMap,
  SnapshotStore,
  State,
  StateStore,
  WatchEvent,
} from "./types.js";
import { contentKey, md5, pageKey, seenKey } from "./utils.js";

export interface MonitorDeps {
  config: MonitorConfig;
  source: PageSource;
  sink: EventSink;
  stateStore: StateStore;
  snapshotStore: SnapshotStore;
  now?: () => Date;
}

export interface CycleReport {
  events: WatchEvent[];
  deliveries: DeliveryResult[];
  checkedPages: string[];
  skippedPages: string[];
  autoTrackedPages: string[];
  state: State;
}

function coalesce<T>(result: LoadResult<T>, fallback: () => T, label: string): T {
  if (result.ok) return result.value;
  console.warn(`[STORE] Failed to load ${label} (${describeLoadError(result.error)}); starting empty`);
  return fallback();
}

/**
 * In-memory state for one cycle. Fetch workers never touch it: every
 * mutation goes through `apply`/`track` on the driving side after a batch
 * returns.
 */
class CycleContext {
  readonly seen: Record<string, string>;
  readonly contentHashes: Record<string, string>;
  readonly dynamicPages: Set<string>;
  readonly snapshots: SnapshotMap;
  readonly updatedSnapshots: SnapshotMap = new Map();
  readonly events: WatchEvent[] = [];
  readonly processed = new Set<string>();
  readonly skipped: string[] = [];
  readonly autoTracked: string[] = [];

  constructor(state: State, snapshots: SnapshotMap) {
    this.seen = { ...state.seen };
    this.contentHashes = { ...state.contentHashes };
    this.dynamicPages = new Set([...state.dynamicMonitoredPages].map(pageKey));
    this.snapshots = new Map(snapshots);
  }

  view(): StateView {
    return { seen: this.seen, contentHashes: this.contentHashes };
  }

  apply(check: PageCheck, emit: boolean = true): void {
    const key = pageKey(check.pageName);
    this.processed.add(key);
    if (check.contentHash) this.contentHashes[contentKey(key)] = check.contentHash;
    if (check.snapshot) this.putSnapshot(key, check.snapshot);
    if (check.closed && this.dynamicPages.delete(key)) {
      console.log(`[MONITOR] '${key}' is closed; no longer tracking it`);
    }
    if (emit && check.event) this.events.push(check.event);
  }

  /** Starts tracking a page without a first-run notification of its own. */
  track(pageName: string, page: PageData, body: string): void {
    const key = pageKey(pageName);
    this.dynamicPages.add(key);
    this.processed.add(key);
    this.contentHashes[contentKey(key)] = md5(body);
    if (page.timestamp) this.seen[seenKey(key)] = page.timestamp;
    this.putSnapshot(key, buildSnapshot(key, body, page.timestamp, null));
    this.autoTracked.push(key);
  }

  private putSnapshot(key: string, snapshot: PageSnapshot): void {
    this.snapshots.set(key, snapshot);
    this.updatedSnapshots.set(key, snapshot);
  }
}

export class ChangeMonitor {
  private readonly config: MonitorConfig;
  private readonly patterns: RegExp[];
  private readonly staticPages: Set<string>;
  private readonly fullDiffPages: Set<string>;

  constructor(private readonly deps: MonitorDeps) {
    this.config = deps.config;
    this.patterns = compilePatterns(deps.config.autoTrackPatterns);
    this.staticPages = new Set(deps.config.pageNames.map(pageKey));
    this.fullDiffPages = new Set(
      [...deps.config.fullDiffPageNames, deps.config.recentChangesPage, deps.config.recentCreatedPage].map((name) =>
        pageKey(name).toLowerCase()
      )
    );
  }

  async runOnce(): Promise<CycleReport> {
    const { stateStore, snapshotStore, sink } = this.deps;
    const now = this.deps.now ?? (() => new Date());

    const state = coalesce(await stateStore.load(), emptyState, "state");
    const snapshots = coalesce(await snapshotStore.loadAll(), (): SnapshotMap => new Map(), "snapshots");
    const cycle = new CycleContext(state, snapshots);

    if (this.config.pollMonitoredPages) {
      await this.checkPages(cycle, [...this.staticPages, ...cycle.dynamicPages]);
    }
    await this.checkRecentChanges(cycle);
    await this.checkRecentCreated(cycle);

    let deliveries: DeliveryResult[] = [];
    if (cycle.events.length > 0) {
      console.log(`[MONITOR] Sending ${cycle.events.length} event(s)`);
      deliveries = await sink.sendEvents(cycle.events, this.config.notifyHeader);
    }

    for (const event of cycle.events) {
      if (event.date) cycle.seen[seenKey(event.pageName)] = event.date;
    }
    const monitoredSet: MonitoredSet = {
      pageNames: this.config.pageNames,
      dynamicPages: cycle.dynamicPages,
      monitorRecentCreated: this.config.monitorRecentCreated,
      recentChangesPage: this.config.recentChangesPage,
      recentCreatedPage: this.config.recentCreatedPage,
    };
    const cleaned = cleanMonitoredState(cycle.seen, cycle.contentHashes, monitoredSet);

    const updatedState: State = {
      seen: pruneSeen(cleaned.seen, this.config.maxSeenEntries),
      updatedAt: now().toISOString(),
      contentHashes: cleaned.contentHashes,
      dynamicMonitoredPages: cycle.dynamicPages,
    };

    const monitored = monitoredPageNames(monitoredSet);
    const merged: SnapshotMap = new Map(
      [...snapshots, ...cycle.updatedSnapshots].filter(([key]) => monitored.has(pageKey(key)))
    );
    if (cycle.updatedSnapshots.size > 0 || merged.size !== snapshots.size) {
      await snapshotStore.saveAll(merged);
    }
    await stateStore.save(updatedState);

    return {
      events: cycle.events,
      deliveries,
      checkedPages: [...cycle.processed],
      skippedPages: cycle.skipped,
      autoTrackedPages: cycle.autoTracked,
      state: updatedState,
    };
  }

  private isFullDiff(pageName: string): boolean {
    return this.fullDiffPages.has(pageKey(pageName).toLowerCase());
  }

  private async checkPages(cycle: CycleContext, pageNames: readonly string[]): Promise<void> {
    const pending = [...new Set(pageNames.map(pageKey))].filter((name) => !cycle.processed.has(name));
    if (pending.length === 0) return;

    const results = await fetchBatch(pending, this.deps.source, {
      maxWorkers: this.config.fetchConcurrency,
      timeoutMs: this.config.fetchBatchTimeoutMs,
    });

    for (const name of pending) {
      const outcome = results.get(name);
      if (outcome === undefined || outcome instanceof Error) cycle.skipped.push(name);
    }
    // Map order is completion order.
    for (const [name, outcome] of results) {
      if (outcome instanceof Error) continue;
      const check = this.evaluate(cycle, name, outcome, this.isFullDiff(name));
      if (check) cycle.apply(check);
    }
  }

  /** Evaluates one page; a failure skips the page for this cycle only. */
  private evaluate(cycle: CycleContext, name: string, page: PageData, fullDiff: boolean): PageCheck | null {
    try {
      return evaluatePage(name, page, cycle.view(), cycle.snapshots, this.config, fullDiff);
    } catch (err) {
      console.error(`[MONITOR] Failed to evaluate '${name}':`, err instanceof Error ? err.message : err);
      cycle.skipped.push(name);
      return null;
    }
  }

  private async fetchOne(pageName: string): Promise<PageData | null> {
    const results = await fetchBatch([pageName], this.deps.source, {
      maxWorkers: 1,
      timeoutMs: this.config.fetchBatchTimeoutMs,
    });
    const outcome = results.get(pageName);
    if (outcome === undefined || outcome instanceof Error) return null;
    return outcome;
  }

  private async checkRecentChanges(cycle: CycleContext): Promise<void> {
    const monitored = new Set([...this.staticPages, ...cycle.dynamicPages]);
    if (monitored.size === 0) return;

    const name = this.config.recentChangesPage;
    const page = await this.fetchOne(name);
    if (!page) {
      cycle.skipped.push(name);
      return;
    }

    const check = this.evaluate(cycle, name, page, true);
    if (!check) return;
    // The feed itself is only announced once; its updates surface as page events.
    cycle.apply(check, check.status === "initial");
    if (check.status !== "updated" || !check.snapshot) return;

    const referenced = extractPageNames(addedLines(check.snapshot.diff).join("\n")).filter((p) =>
      monitored.has(pageKey(p))
    );
    if (referenced.length > 0) {
      console.log(`[MONITOR] ${name} references ${referenced.length} monitored page(s): ${referenced.join(", ")}`);
      await this.checkPages(cycle, referenced);
    }
  }

  private async checkRecentCreated(cycle: CycleContext): Promise<void> {
    if (!this.config.monitorRecentCreated) return;

    const name = this.config.recentCreatedPage;
    const page = await this.fetchOne(name);
    if (!page) {
      cycle.skipped.push(name);
      return;
    }

    const check = this.evaluate(cycle, name, page, true);
    if (!check) return;
    cycle.apply(check, false);

    if (check.status === "initial" && page.body) {
      const tracked = await this.autoTrack(cycle, extractPageNames(page.body));
      if (tracked.length > 0) cycle.events.push(pageListEvent(this.config, "tracked", tracked, page.timestamp));
      if (check.event) cycle.events.push(check.event);
      return;
    }

    if (check.status !== "updated" || !check.snapshot) return;
    const created = extractPageNames(addedLines(check.snapshot.diff).join("\n"));
    if (created.length > 0) cycle.events.push(pageListEvent(this.config, "created", created, page.timestamp));
    const tracked = await this.autoTrack(cycle, created);
    if (tracked.length > 0) cycle.events.push(pageListEvent(this.config, "tracked", tracked, page.timestamp));
  }

  private async autoTrack(cycle: CycleContext, pageNames: readonly string[]): Promise<string[]> {
    const tracked: string[] = [];
    for (const candidate of pageNames) {
      const key = pageKey(candidate);
      if (!matchesPattern(key, this.patterns)) continue;
      if (this.staticPages.has(key) || cycle.dynamicPages.has(key)) continue;

      const page = await this.fetchOne(key);
      if (!page || !page.body) continue;
      if (isPageClosed(page.body, this.config.closedMarker)) {
        console.log(`[MONITOR] Not tracking '${key}': page is closed`);
        continue;
      }
      cycle.track(key, page, page.body);
      tracked.push(key);
    }
    if (tracked.length > 0) {
      console.log(`[MONITOR] Auto-tracking ${tracked.length} page(s): ${tracked.join(", ")}`);
    }
    return tracked;
  }
}

export async function runMonitorOnce(deps: MonitorDeps): Promise<CycleReport> {
  return new ChangeMonitor(deps).runOnce();
}
