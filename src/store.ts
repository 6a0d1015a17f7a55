import fs from "node:fs";
import path from "node:path";
import type admin from "firebase-admin";
import { z } from "zod";
import {
  LoadError,
  LoadResult,
  PageSnapshot,
  SnapshotMap,
  SnapshotStore,
  State,
  StateStore,
} from "./types.js";

const stateFileSchema = z.object({
  seen: z.record(z.string()).catch({}),
  updated_at: z.string().nullable().catch(null),
  content_hashes: z.record(z.string()).catch({}),
  dynamic_monitored_pages: z.array(z.string()).catch([]),
});

const snapshotEntrySchema = z.object({
  page_name: z.string(),
  content: z.string(),
  timestamp: z.string().nullable().catch(null),
  diff: z.string().nullable().catch(null),
});

type StateFile = z.infer<typeof stateFileSchema>;
type SnapshotEntry = z.infer<typeof snapshotEntrySchema>;

export function emptyState(): State {
  return { seen: {}, updatedAt: null, contentHashes: {}, dynamicMonitoredPages: new Set() };
}

function ok<T>(value: T): LoadResult<T> {
  return { ok: true, value };
}

function fail<T>(source: string, err: unknown): LoadResult<T> {
  const reason = err instanceof Error ? err.message : String(err);
  return { ok: false, error: { source, reason } };
}

export function describeLoadError(error: LoadError): string {
  return `${error.source}: ${error.reason}`;
}

export function parseState(data: unknown, source: string): LoadResult<State> {
  const parsed = stateFileSchema.safeParse(data);
  if (!parsed.success) return fail(source, "state is not an object");
  return ok({
    seen: parsed.data.seen,
    updatedAt: parsed.data.updated_at,
    contentHashes: parsed.data.content_hashes,
    dynamicMonitoredPages: new Set(parsed.data.dynamic_monitored_pages),
  });
}

export function serializeState(state: State): StateFile {
  return {
    seen: state.seen,
    updated_at: state.updatedAt,
    content_hashes: state.contentHashes,
    dynamic_monitored_pages: [...state.dynamicMonitoredPages].sort(),
  };
}

function toSnapshot(entry: SnapshotEntry): PageSnapshot {
  return { pageName: entry.page_name, content: entry.content, timestamp: entry.timestamp, diff: entry.diff };
}

function toEntry(snapshot: PageSnapshot): SnapshotEntry {
  return {
    page_name: snapshot.pageName,
    content: snapshot.content,
    timestamp: snapshot.timestamp,
    diff: snapshot.diff,
  };
}

export function parseSnapshots(data: unknown, source: string): LoadResult<SnapshotMap> {
  const parsed = z.record(z.unknown()).safeParse(data);
  if (!parsed.success) return fail(source, "snapshots are not an object");

  const snapshots: SnapshotMap = new Map();
  for (const [pageName, raw] of Object.entries(parsed.data)) {
    const entry = snapshotEntrySchema.safeParse(raw);
    if (!entry.success) {
      console.warn(`[STORE] Skipping malformed snapshot for '${pageName}' in ${source}`);
      continue;
    }
    snapshots.set(pageName, toSnapshot(entry.data));
  }
  return ok(snapshots);
}

function readJson(p: string): LoadResult<unknown> {
  if (!fs.existsSync(p)) return ok(undefined);
  try {
    return ok(JSON.parse(fs.readFileSync(p, "utf8")));
  } catch (err) {
    return fail(p, err);
  }
}

// Written beside the target and renamed over it, so readers never see a partial file.
function writeJsonAtomic(p: string, data: unknown): void {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  const tmp = `${p}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(data, null, 2), "utf8");
  fs.renameSync(tmp, p);
}

export class JsonStateStore implements StateStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<LoadResult<State>> {
    const raw = readJson(this.filePath);
    if (!raw.ok) return raw;
    if (raw.value === undefined) return ok(emptyState());
    return parseState(raw.value, this.filePath);
  }

  async save(state: State): Promise<void> {
    writeJsonAtomic(this.filePath, serializeState(state));
  }
}

export class JsonSnapshotStore implements SnapshotStore {
  constructor(private readonly filePath: string) {}

  async loadAll(): Promise<LoadResult<SnapshotMap>> {
    const raw = readJson(this.filePath);
    if (!raw.ok) return raw;
    if (raw.value === undefined) return ok(new Map());
    return parseSnapshots(raw.value, this.filePath);
  }

  async saveAll(snapshots: SnapshotMap): Promise<void> {
    const data: Record<string, SnapshotEntry> = {};
    for (const [pageName, snapshot] of snapshots) data[pageName] = toEntry(snapshot);
    writeJsonAtomic(this.filePath, data);
  }
}

const STATE_DOC_ID = "state";
// Firestore caps a batch at 500 writes.
const FIRESTORE_BATCH_SIZE = 400;

export class FirestoreStateStore implements StateStore {
  constructor(
    private readonly db: admin.firestore.Firestore,
    private readonly collection: string
  ) {}

  async load(): Promise<LoadResult<State>> {
    const source = `firestore:${this.collection}/${STATE_DOC_ID}`;
    try {
      const doc = await this.db.collection(this.collection).doc(STATE_DOC_ID).get();
      if (!doc.exists) return ok(emptyState());
      return parseState(doc.data(), source);
    } catch (err) {
      return fail(source, err);
    }
  }

  async save(state: State): Promise<void> {
    await this.db.collection(this.collection).doc(STATE_DOC_ID).set(serializeState(state));
  }
}

export class FirestoreSnapshotStore implements SnapshotStore {
  constructor(
    private readonly db: admin.firestore.Firestore,
    private readonly collection: string
  ) {}

  async loadAll(): Promise<LoadResult<SnapshotMap>> {
    const source = `firestore:${this.collection}`;
    try {
      const query = await this.db.collection(this.collection).get();
      const data: Record<string, unknown> = {};
      for (const doc of query.docs) {
        const entry = snapshotEntrySchema.safeParse(doc.data());
        if (entry.success) data[entry.data.page_name] = entry.data;
      }
      return parseSnapshots(data, source);
    } catch (err) {
      return fail(source, err);
    }
  }

  async saveAll(snapshots: SnapshotMap): Promise<void> {
    const entries = [...snapshots.values()];
    const collection = this.db.collection(this.collection);
    for (let i = 0; i < entries.length; i += FIRESTORE_BATCH_SIZE) {
      const batch = this.db.batch();
      for (const snapshot of entries.slice(i, i + FIRESTORE_BATCH_SIZE)) {
        batch.set(collection.doc(encodeURIComponent(snapshot.pageName)), toEntry(snapshot));
      }
      await batch.commit();
    }
  }
}
