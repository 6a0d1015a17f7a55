import { z } from "zod";
import path from "node:path";
import { MonitorConfig } from "./types.js";

const bool = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.trim().toLowerCase() === "true");

const int = (fallback: number, min: number = 1) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => Math.max(min, parseInt(v, 10) || fallback));

// Blank falls back like an unset variable.
const ratio = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((v, ctx): number => {
      const raw = v.trim();
      if (!raw) return fallback;
      const value = Number(raw);
      if (!Number.isFinite(value) || value < 0 || value > 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a number between 0 and 1" });
        return z.NEVER;
      }
      return value;
    });

const list = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean)
  );

// Patterns may contain commas, so a JSON array is accepted as well.
const patternList = z
  .string()
  .default("")
  .transform((v, ctx): string[] => {
    const raw = v.trim();
    let patterns: string[];
    if (raw.startsWith("[")) {
      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch {
        json = undefined;
      }
      const parsed = z.array(z.string()).safeParse(json);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON array of strings" });
        return z.NEVER;
      }
      patterns = parsed.data;
    } else {
      patterns = raw.split(",").map((s) => s.trim()).filter(Boolean);
    }
    for (const pattern of patterns) {
      try {
        new RegExp(pattern);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid regular expression: ${pattern}` });
        return z.NEVER;
      }
    }
    return patterns;
  });

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const schema = z.object({
  WIKI_ID: z.string().min(1),
  WIKI_API_KEY_ID: z.string().min(1),
  WIKI_API_SECRET: z.string().min(1),
  WIKI_API_BASE_URL: z.string().url().default("https://api.wikiwiki.jp"),
  WIKI_URL: z.string().default(""),
  DISCORD_WEBHOOK_URL: z.string().url(),
  WIKI_PAGE_NAMES: list,
  AUTO_TRACK_PATTERNS: patternList,
  FULL_DIFF_PAGE_NAMES: list,
  MONITOR_RECENT_CREATED: bool("true"),
  POLL_MONITORED_PAGES: bool("true"),
  RECENT_CHANGES_PAGE: z.string().min(1).default("RecentChanges"),
  RECENT_CREATED_PAGE: z.string().min(1).default("RecentCreated"),
  CLOSED_MARKER: z.string().min(1).default("【終了】"),
  PREVIEW_MAX_CHARS: int(80),
  PREVIEW_LINK_STYLE: z.enum(["plain", "markdown"]).default("plain"),
  SIMILARITY_THRESHOLD: ratio(0.9),
  FETCH_CONCURRENCY: int(8),
  FETCH_BATCH_TIMEOUT_MS: int(10_000),
  HTTP_TIMEOUT_MS: int(10_000),
  MAX_SEEN_ENTRIES: int(5000),
  STATE_PATH: z.string().default("./data/state.json"),
  SNAPSHOTS_DIR: z.string().default("./data/snapshots"),
  NOTIFY_HEADER: optionalString,
  CRON_SCHEDULE: optionalString,
  FIRESTORE_COLLECTION: z.string().default("wiki_snapshots"),
  FIRESTORE_STATE_COLLECTION: z.string().default("wiki_state"),
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  FIREBASE_SERVICE_ACCOUNT_JSON: optionalString,
});

export type AppConfig = z.infer<typeof schema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    // Paths and messages only; values may be secrets.
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigError(`Invalid configuration: ${errs}`);
  }
  return parsed.data;
}

export function snapshotsFilePath(config: AppConfig): string {
  return path.join(config.SNAPSHOTS_DIR, "snapshots.json");
}

export function toMonitorConfig(config: AppConfig): Readonly<MonitorConfig> {
  return Object.freeze({
    wikiUrl: config.WIKI_URL.trim(),
    pageNames: Object.freeze([...config.WIKI_PAGE_NAMES]),
    autoTrackPatterns: Object.freeze([...config.AUTO_TRACK_PATTERNS]),
    fullDiffPageNames: Object.freeze([...config.FULL_DIFF_PAGE_NAMES]),
    monitorRecentCreated: config.MONITOR_RECENT_CREATED,
    pollMonitoredPages: config.POLL_MONITORED_PAGES,
    recentChangesPage: config.RECENT_CHANGES_PAGE,
    recentCreatedPage: config.RECENT_CREATED_PAGE,
    closedMarker: config.CLOSED_MARKER,
    previewMaxChars: config.PREVIEW_MAX_CHARS,
    previewLinkStyle: config.PREVIEW_LINK_STYLE,
    similarityThreshold: config.SIMILARITY_THRESHOLD,
    fetchConcurrency: config.FETCH_CONCURRENCY,
    fetchBatchTimeoutMs: config.FETCH_BATCH_TIMEOUT_MS,
    maxSeenEntries: config.MAX_SEEN_ENTRIES,
    notifyHeader: config.NOTIFY_HEADER ?? null,
  });
}
