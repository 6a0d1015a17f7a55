export interface PageData {
  title: string;
  timestamp: string | null; // opaque version stamp, compared for equality only
  body: string | null;
}

export interface PageSnapshot {
  pageName: string;
  content: string;
  timestamp: string | null;
  diff: string | null; // unified diff against the previous body
}

export type SnapshotMap = Map<string, PageSnapshot>;

export interface State {
  seen: Record<string, string>;
  updatedAt: string | null;
  contentHashes: Record<string, string>;
  dynamicMonitoredPages: Set<string>;
}

export interface WatchEvent {
  title: string;
  url: string;
  pageName: string;
  date: string | null;
  diffPreview: string | null;
  isInitial: boolean;
}

export type DeliveryResult = Record<string, unknown>;

export interface PageSource {
  getPage(pageName: string, options?: { signal?: AbortSignal }): Promise<PageData>;
}

export interface EventSink {
  sendEvents(events: WatchEvent[], header?: string | null): Promise<DeliveryResult[]>;
}

export interface LoadError {
  source: string;
  reason: string;
}

export type LoadResult<T> = { ok: true; value: T } | { ok: false; error: LoadError };

export interface StateStore {
  load(): Promise<LoadResult<State>>;
  save(state: State): Promise<void>;
}

export interface SnapshotStore {
  loadAll(): Promise<LoadResult<SnapshotMap>>;
  saveAll(snapshots: SnapshotMap): Promise<void>;
}

export type PreviewLinkStyle = "plain" | "markdown";

export interface MonitorConfig {
  wikiUrl: string;
  pageNames: readonly string[];
  autoTrackPatterns: readonly string[];
  fullDiffPageNames: readonly string[];
  monitorRecentCreated: boolean;
  pollMonitoredPages: boolean;
  recentChangesPage: string;
  recentCreatedPage: string;
  closedMarker: string;
  previewMaxChars: number;
  previewLinkStyle: PreviewLinkStyle;
  similarityThreshold: number;
  fetchConcurrency: number;
  fetchBatchTimeoutMs: number;
  maxSeenEntries: number;
  notifyHeader: string | null;
}
