import axios, { AxiosInstance } from "axios";
import { DeliveryResult, EventSink, WatchEvent } from "./types.js";

const DISCORD_CONTENT_LIMIT = 2000;
const SEPARATOR = "━".repeat(40);

/** `2024-01-02T03:04:05+09:00` → `2024年1月2日 03時04分`, using the wall-clock fields as written. */
export function formatDate(value: string | null): string {
  if (!value) return "";
  const match = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})/.exec(value);
  if (!match) return value;
  const [, year, month, day, hour, minute] = match;
  return `${year}年${Number(month)}月${Number(day)}日 ${hour}時${minute}分`;
}

export function buildEventMessage(event: WatchEvent, header?: string | null): string {
  const parts: string[] = [];
  if (header) parts.push(header);
  parts.push(`**${event.title}**`);
  if (event.date && !event.isInitial) parts.push(`🕐 ${formatDate(event.date)}`);
  parts.push(`🔗 <${event.url}>`);
  if (event.diffPreview && !event.isInitial) parts.push(`📝 ${event.diffPreview} ...\n`);
  parts.push(SEPARATOR);

  // Clamped by code point so surrogate pairs stay whole.
  const chars = Array.from(parts.join("\n"));
  return chars.slice(0, DISCORD_CONTENT_LIMIT).join("");
}

export class DiscordWebhookClient implements EventSink {
  private readonly http: AxiosInstance;

  constructor(
    private readonly webhookUrl: string,
    options: { timeoutMs?: number; http?: AxiosInstance } = {}
  ) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 10_000 });
  }

  /** One message per event, in order; the header goes on the first only. Failures propagate. */
  async sendEvents(events: WatchEvent[], header?: string | null): Promise<DeliveryResult[]> {
    const responses: DeliveryResult[] = [];

    for (const [index, event] of events.entries()) {
      const content = buildEventMessage(event, index === 0 ? header : null);
      const resp = await this.http.post<unknown>(this.webhookUrl, {
        content,
        allowed_mentions: { parse: [] },
      });

      // Webhooks answer 204 No Content unless ?wait=true is set.
      const data: unknown = resp.data;
      if (data && typeof data === "object" && !Array.isArray(data)) {
        responses.push(Object.fromEntries(Object.entries(data)));
      } else {
        responses.push({ status: "ok" });
      }
    }

    console.log(`[DISCORD] Delivered ${responses.length} message(s)`);
    return responses;
  }
}
