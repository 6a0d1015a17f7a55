import axios, { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import { retryWithBackoff } from "./retry.js";
import { PageData, PageSource } from "./types.js";

export class WikiApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "WikiApiError";
    this.status = status;
  }
}

export interface WikiClientOptions {
  wikiId: string;
  apiKeyId: string;
  secret: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  http?: AxiosInstance;
}

type Method = "GET" | "POST";

interface RequestOptions {
  token: string | null;
  body?: Record<string, unknown>;
  signal?: AbortSignal;
  allowAuthPost?: boolean;
}

const stamp = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .nullish();

const pageResponseSchema = z
  .object({
    page: z.string().nullish(),
    timestamp: stamp,
    source: z.string().nullish(),
  })
  .passthrough();

const authResponseSchema = z
  .object({
    status: z.string().nullish(),
    token: z.string().nullish(),
  })
  .passthrough();

function isTransient(err: unknown): boolean {
  if (err instanceof WikiApiError) {
    return err.status === 429 || (err.status !== undefined && err.status >= 500);
  }
  if (axios.isCancel(err)) return false;
  // Network failures and client-side timeouts carry no response.
  return axios.isAxiosError(err) && !err.response;
}

function bodyExcerpt(data: unknown): string {
  const text = typeof data === "string" ? data : JSON.stringify(data) ?? "";
  return text.slice(0, 300);
}

/** Read-only client for the wiki REST API (token auth, page fetch, page list). */
export class WikiClient implements PageSource {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private token: string | null = null;
  private tokenPromise: Promise<string> | null = null;

  constructor(private readonly options: WikiClientOptions) {
    this.baseUrl = (options.baseUrl ?? "https://api.wikiwiki.jp").replace(/\/+$/, "");
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? 10_000,
        headers: { "User-Agent": "wiki-page-watch", Accept: "application/json" },
      });
  }

  async listPages(): Promise<Record<string, unknown>> {
    const token = await this.getToken();
    return this.requestJson("GET", this.url(`/${this.options.wikiId}/pages`), { token });
  }

  async getPage(pageName: string, options: { signal?: AbortSignal } = {}): Promise<PageData> {
    const token = await this.getToken(options.signal);
    const url = this.url(`/${this.options.wikiId}/page/${encodeURIComponent(pageName)}`);
    const data = await this.requestJson("GET", url, { token, signal: options.signal });

    const parsed = pageResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new WikiApiError(`Invalid page payload for '${pageName}'`);
    }
    return {
      title: parsed.data.page ?? pageName,
      timestamp: parsed.data.timestamp ?? null,
      body: parsed.data.source ?? null,
    };
  }

  private url(p: string): string {
    return this.baseUrl + p;
  }

  // Concurrent callers share one in-flight authentication.
  private getToken(signal?: AbortSignal): Promise<string> {
    if (this.tokenPromise) return this.tokenPromise;
    const pending = this.authenticate(signal).then((token) => {
      this.token = token;
      return token;
    });
    this.tokenPromise = pending;
    // Callers still see the rejection; this only drops the failed attempt from the cache.
    pending.catch(() => {
      if (this.tokenPromise === pending) this.tokenPromise = null;
    });
    return pending;
  }

  private invalidateToken(stale: string): void {
    if (this.token !== stale) return;
    this.token = null;
    this.tokenPromise = null;
  }

  private async authenticate(signal?: AbortSignal): Promise<string> {
    const data = await this.requestJson("POST", this.url(`/${this.options.wikiId}/auth`), {
      token: null,
      body: { api_key_id: this.options.apiKeyId, secret: this.options.secret },
      signal,
      allowAuthPost: true,
    });
    const parsed = authResponseSchema.safeParse(data);
    const status = parsed.success ? parsed.data.status : undefined;
    const token = parsed.success ? parsed.data.token : undefined;
    if ((status && status !== "ok") || !token) {
      throw new WikiApiError(`Authentication failed (status: ${status ?? "none"})`);
    }
    return token;
  }

  private async requestJson(method: Method, url: string, options: RequestOptions): Promise<Record<string, unknown>> {
    this.guard(method, url, options.allowAuthPost ?? false);

    const send = (token: string | null): Promise<AxiosResponse<unknown>> =>
      this.http.request<unknown>({
        method,
        url,
        data: options.body,
        signal: options.signal,
        headers: token ? { Authorization: `Bearer ${token}` } : {},
        validateStatus: () => true,
      });

    return retryWithBackoff(
      async () => {
        let resp = await send(options.token);

        // Expired or revoked token: refresh once and replay.
        if ((resp.status === 401 || resp.status === 403) && options.token) {
          this.invalidateToken(options.token);
          const fresh = await this.getToken(options.signal);
          resp = await send(fresh);
        }

        if (resp.status >= 400) {
          throw new WikiApiError(`HTTP ${resp.status}: ${bodyExcerpt(resp.data)}`, resp.status);
        }
        if (typeof resp.data === "string") {
          throw new WikiApiError(`Invalid JSON: ${bodyExcerpt(resp.data)}`);
        }
        if (typeof resp.data !== "object" || resp.data === null || Array.isArray(resp.data)) {
          throw new WikiApiError(`Unexpected JSON type: ${Array.isArray(resp.data) ? "array" : typeof resp.data}`);
        }
        return Object.fromEntries(Object.entries(resp.data));
      },
      { maxAttempts: this.options.maxAttempts ?? 3, shouldRetry: isTransient, signal: options.signal }
    );
  }

  private guard(method: Method, url: string, allowAuthPost: boolean): void {
    if (!url.startsWith(`${this.baseUrl}/`)) {
      throw new Error(`Invalid URL: ${url}`);
    }
    if (method === "GET") return;
    if (allowAuthPost && url.endsWith(`${this.options.wikiId}/auth`)) return;
    throw new Error(`Blocked method: ${method}`);
  }
}
