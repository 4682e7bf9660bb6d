/**
 * Request pipeline shared by the Trends endpoint accessors: session cookie,
 * explore tokens, then widget data. No retries or rate limiting here.
 */

import { z } from "zod";
import { HttpError, SchemaMismatchError } from "../errors.js";
import { requestHeaders, requestText } from "../http.js";
import { log } from "../logger.js";
import type { Client } from "./client.js";
import { parseGuardedJson } from "./geoMapSchema.js";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

const widgetSchema = z.object({
  id: z.string(),
  token: z.string(),
  request: z.record(z.unknown())
});

const exploreResponseSchema = z.object({
  widgets: z.array(z.unknown())
});

export type Widget = z.infer<typeof widgetSchema>;

export type Resolution = "REGION" | "CITY" | "COUNTRY";

const GEO_MAP = "GEO_MAP";

export class TrendsSession {
  private constructor(
    readonly client: Client,
    private readonly cookie: string | null
  ) {}

  /**
   * Opens a session for `client` by fetching the NID cookie Google sets on the
   * Trends home page. A 429 on this request is tolerated; the API answers
   * without the cookie, only more eagerly rate limited.
   */
  static async open(client: Client): Promise<TrendsSession> {
    const url = `${client.baseUrl}/?geo=${encodeURIComponent(client.country.code || "US")}`;
    log("debug", "Fetching Trends session cookie", { url });
    try {
      const headers = await requestHeaders(url, {
        method: "GET",
        headers: baseHeaders(client),
        timeoutMs: client.timeoutMs
      });
      return new TrendsSession(client, extractNid(headers.get("set-cookie")));
    } catch (err) {
      if (err instanceof HttpError && err.status === 429) {
        log("warn", "Trends cookie request was rate limited, continuing without cookie", { url });
        return new TrendsSession(client, null);
      }
      throw err;
    }
  }

  async explore(): Promise<Widget[]> {
    const params = new URLSearchParams({
      hl: this.client.lang,
      tz: String(this.client.tz),
      req: JSON.stringify(this.client.exploreRequest)
    });
    const data = await this.get("/trends/api/explore", params, "Explore response");
    const parsed = exploreResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SchemaMismatchError("Explore response", "missing widgets array", parsed.error.issues);
    }
    // The explore response also lists widgets without a token (e.g. help cards).
    const widgets: Widget[] = [];
    for (const candidate of parsed.data.widgets) {
      const widget = widgetSchema.safeParse(candidate);
      if (widget.success) widgets.push(widget.data);
    }
    log("debug", "Explore returned widgets", { ids: widgets.map((w) => w.id) });
    return widgets;
  }

  /**
   * Maps the GEO_MAP widgets to response slots:
   * slot 0 is the comparison across all keywords, slot i + 1 is keyword i.
   * A single-keyword explore has only the GEO_MAP widget, which then serves both slots.
   */
  async geoMapWidgets(): Promise<Widget[]> {
    const widgets = await this.explore();
    const byId = new Map(widgets.map((w) => [w.id, w]));
    const aggregate = byId.get(GEO_MAP);
    if (!aggregate) {
      throw new SchemaMismatchError("Explore response", `no ${GEO_MAP} widget`);
    }

    const keywords = this.client.keywords.values;
    const slots: Widget[] = [aggregate];
    keywords.forEach((keyword, i) => {
      const widget = byId.get(`${GEO_MAP}_${i}`) ?? (keywords.length === 1 ? aggregate : undefined);
      if (!widget) {
        throw new SchemaMismatchError("Explore response", `no ${GEO_MAP}_${i} widget for keyword "${keyword}"`);
      }
      slots.push(widget);
    });
    return slots;
  }

  async widgetData(widget: Widget, resolution: Resolution): Promise<unknown> {
    const params = new URLSearchParams({
      hl: this.client.lang,
      tz: String(this.client.tz),
      req: JSON.stringify({ ...widget.request, resolution }),
      token: widget.token
    });
    return this.get("/trends/api/widgetdata/comparedgeo", params, `Widget ${widget.id} response`);
  }

  private async get(path: string, params: URLSearchParams, context: string): Promise<unknown> {
    const url = `${this.client.baseUrl}${path}?${params.toString()}`;
    const headers = baseHeaders(this.client);
    if (this.cookie) headers.Cookie = this.cookie;

    log("debug", "Trends request", { path });
    try {
      const text = await requestText(url, { method: "GET", headers, timeoutMs: this.client.timeoutMs });
      return parseGuardedJson(text, context);
    } catch (err) {
      if (err instanceof HttpError) {
        log("warn", "Trends request failed", { path, status: err.status });
      }
      throw err;
    }
  }
}

function baseHeaders(client: Client): Record<string, string> {
  return {
    "User-Agent": USER_AGENT,
    "Accept-Language": client.lang
  };
}

export function extractNid(setCookie: string | null): string | null {
  if (!setCookie) return null;
  const match = /(?:^|[,\s])(NID=[^;]+)/.exec(setCookie);
  return match ? match[1] : null;
}
