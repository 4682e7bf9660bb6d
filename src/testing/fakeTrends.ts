import { vi } from "vitest";
import type { InterestForRegion } from "../trends/geoMapSchema.js";

export const GUARD = ")]}'\n";
export const GEO_GUARD = ")]}',\n";

export type RecordedCall = {
  path: string;
  params: URLSearchParams;
  headers: Record<string, string>;
};

export type FakeTrendsOptions = {
  /** Region data per GEO_MAP widget id ("GEO_MAP", "GEO_MAP_0", ...). */
  geoMaps: Record<string, unknown>;
  /** Status returned for the cookie request on "/". */
  cookieStatus?: number;
  /** Overrides the explore body entirely. */
  exploreBody?: string;
};

export function region(geoName: string, values: number[], extra: Partial<InterestForRegion> = {}): InterestForRegion {
  const max = values.length > 0 ? values.indexOf(Math.max(...values)) : 0;
  return {
    geoCode: extra.geoCode ?? `US-${geoName.slice(0, 2).toUpperCase()}`,
    geoName,
    value: values,
    formattedValue: values.map((v) => (v === 0 ? "<1" : String(v))),
    hasData: values.map((v) => v > 0),
    maxValueIndex: max,
    ...extra
  };
}

function inputUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

function headersOf(init: RequestInit | undefined): Record<string, string> {
  const headers = init?.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) return {};
  return { ...headers };
}

/**
 * Replaces global fetch with an in-process Trends API: "/" answers the session request,
 * explore lists one GEO_MAP widget per keyword plus the comparison widget,
 * comparedgeo answers with `geoMaps[widgetId]` looked up by token.
 */
export function installFakeTrends(options: FakeTrendsOptions) {
  const calls: RecordedCall[] = [];

  const handler = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(inputUrl(input));
    calls.push({ path: url.pathname, params: url.searchParams, headers: headersOf(init) });

    if (url.pathname === "/") {
      const status = options.cookieStatus ?? 200;
      return new Response(status === 200 ? "<html></html>" : "Too Many Requests", {
        status,
        headers: { "content-type": "text/html", "set-cookie": "NID=511=test-cookie; path=/; HttpOnly" }
      });
    }

    if (url.pathname === "/trends/api/explore") {
      if (options.exploreBody !== undefined) return new Response(options.exploreBody, { status: 200 });
      const req = JSON.parse(url.searchParams.get("req") ?? "{}") as { comparisonItem: { keyword: string; geo: string }[] };
      const items = req.comparisonItem;
      const geo = items[0]?.geo ?? "";
      const widgets: unknown[] = [
        { id: "TIMESERIES", token: "token-TIMESERIES", request: { time: "today 12-m" } },
        {
          id: "GEO_MAP",
          token: "token-GEO_MAP",
          request: { geo: { country: geo }, comparisonItem: items, resolution: geo ? "REGION" : "COUNTRY" }
        },
        { id: "help_card", text: "no token here" }
      ];
      if (items.length > 1) {
        items.forEach((item, i) => {
          widgets.push({
            id: `GEO_MAP_${i}`,
            token: `token-GEO_MAP_${i}`,
            request: { geo: { country: geo }, comparisonItem: [item], resolution: geo ? "REGION" : "COUNTRY" }
          });
          widgets.push({ id: `RELATED_QUERIES_${i}`, token: `token-RELATED_QUERIES_${i}`, request: {} });
        });
      }
      return new Response(GUARD + JSON.stringify({ widgets }), { status: 200 });
    }

    if (url.pathname === "/trends/api/widgetdata/comparedgeo") {
      const id = (url.searchParams.get("token") ?? "").replace(/^token-/, "");
      if (!(id in options.geoMaps)) {
        return new Response("unknown token", { status: 400, statusText: "Bad Request" });
      }
      const data = options.geoMaps[id];
      const body = Array.isArray(data) ? { default: { geoMapData: data } } : data;
      return new Response(GEO_GUARD + JSON.stringify(body), { status: 200 });
    }

    return new Response("not found", { status: 404, statusText: "Not Found" });
  };

  const fetchMock = vi.fn(handler);
  vi.stubGlobal("fetch", fetchMock);
  return { calls, fetchMock };
}
