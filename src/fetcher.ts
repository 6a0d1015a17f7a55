import pLimit from "p-limit";
import { PageData, PageSource } from "./types.js";

export const DEFAULT_MAX_WORKERS = 8;
export const DEFAULT_BATCH_TIMEOUT_MS = 10_000;

export interface FetchBatchOptions {
  maxWorkers?: number;
  timeoutMs?: number;
}

export type FetchOutcome = PageData | Error;

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Fetches every page concurrently (at most `maxWorkers` at a time) and
 * resolves with the outcomes in completion order. Pages still pending when
 * the batch timeout fires are aborted and left out of the result.
 */
export async function fetchBatch(
  pageNames: readonly string[],
  client: PageSource,
  options: FetchBatchOptions = {}
): Promise<Map<string, FetchOutcome>> {
  const names = [...new Set(pageNames)];
  const results = new Map<string, FetchOutcome>();
  if (names.length === 0) return results;

  const { maxWorkers = DEFAULT_MAX_WORKERS, timeoutMs = DEFAULT_BATCH_TIMEOUT_MS } = options;
  const limit = pLimit(Math.max(1, Math.min(maxWorkers, names.length)));
  const controller = new AbortController();
  const { signal } = controller;

  const tasks = names.map((name) =>
    limit(async () => {
      if (signal.aborted) return;
      try {
        const page = await client.getPage(name, { signal });
        if (!signal.aborted) results.set(name, page);
      } catch (err) {
        if (signal.aborted) return;
        const error = toError(err);
        console.error(`[FETCH] Error getting page '${name}': ${error.message}`);
        results.set(name, error);
      }
    })
  );

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), timeoutMs);
  });
  const outcome = await Promise.race([Promise.all(tasks).then(() => "done" as const), timeout]);
  clearTimeout(timer);

  if (outcome === "timeout") {
    controller.abort();
    limit.clearQueue();
    const pending = names.filter((name) => !results.has(name));
    console.warn(
      `[FETCH] Timeout while fetching pages; cancelled ${pending.length} pending request(s): ${pending.join(", ")}`
    );
  }
  return results;
}
