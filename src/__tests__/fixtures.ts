import { emptyState } from '../store.js';
import type {
  DeliveryResult,
  EventSink,
  LoadResult,
  MonitorConfig,
  PageData,
  PageSource,
  SnapshotMap,
  SnapshotStore,
  State,
  StateStore,
  WatchEvent,
} from '../types.js';
import { WikiApiError } from '../wiki.js';

export function makeConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    wikiUrl: 'https://wiki.example/w',
    pageNames: [],
    autoTrackPatterns: [],
    fullDiffPageNames: [],
    monitorRecentCreated: false,
    pollMonitoredPages: true,
    recentChangesPage: 'RecentChanges',
    recentCreatedPage: 'RecentCreated',
    closedMarker: '【終了】',
    previewMaxChars: 80,
    previewLinkStyle: 'plain',
    similarityThreshold: 0.9,
    fetchConcurrency: 4,
    fetchBatchTimeoutMs: 1000,
    maxSeenEntries: 5000,
    notifyHeader: null,
    ...overrides,
  };
}

export class FakeWiki implements PageSource {
  readonly pages = new Map<string, PageData>();
  readonly failing = new Set<string>();
  calls: string[] = [];

  set(name: string, body: string, timestamp: string, title: string = name): this {
    this.pages.set(name, { title, timestamp, body });
    return this;
  }

  async getPage(pageName: string): Promise<PageData> {
    this.calls.push(pageName);
    if (this.failing.has(pageName)) throw new Error('unavailable');
    const page = this.pages.get(pageName);
    if (!page) throw new WikiApiError('HTTP 404: not found', 404);
    return { ...page };
  }
}

export class RecordingSink implements EventSink {
  readonly sent: { events: WatchEvent[]; header: string | null | undefined }[] = [];
  fail = false;

  async sendEvents(events: WatchEvent[], header?: string | null): Promise<DeliveryResult[]> {
    if (this.fail) throw new Error('webhook down');
    this.sent.push({ events: [...events], header });
    return events.map(() => ({ status: 'ok' }));
  }
}

function cloneState(state: State): State {
  return {
    seen: { ...state.seen },
    updatedAt: state.updatedAt,
    contentHashes: { ...state.contentHashes },
    dynamicMonitoredPages: new Set(state.dynamicMonitoredPages),
  };
}

export class MemoryStateStore implements StateStore {
  current: State | null = null;
  loadResult: LoadResult<State> | null = null;
  saves = 0;

  async load(): Promise<LoadResult<State>> {
    if (this.loadResult) return this.loadResult;
    return { ok: true, value: cloneState(this.current ?? emptyState()) };
  }

  async save(state: State): Promise<void> {
    this.current = cloneState(state);
    this.saves += 1;
  }
}

export class MemorySnapshotStore implements SnapshotStore {
  current: SnapshotMap = new Map();
  saves = 0;

  async loadAll(): Promise<LoadResult<SnapshotMap>> {
    return { ok: true, value: new Map(this.current) };
  }

  async saveAll(snapshots: SnapshotMap): Promise<void> {
    this.current = new Map(snapshots);
    this.saves += 1;
  }
}
