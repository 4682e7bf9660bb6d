import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpError } from "./errors.js";
import { requestHeaders, requestText } from "./http.js";

describe("http", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the body of a successful response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("hello", { status: 200 })));
    await expect(requestText("http://trends.test/")).resolves.toBe("hello");
  });

  it("returns headers without reading the body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("<html></html>", { status: 200, headers: { "x-trace": "abc" } }))
    );
    const headers = await requestHeaders("http://trends.test/");
    expect(headers.get("x-trace")).toBe("abc");
  });

  it("throws HttpError with a trimmed body on failure", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("x".repeat(500), { status: 503, statusText: "Service Unavailable" }))
    );

    const error = await requestText("http://trends.test/api").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 503, url: "http://trends.test/api", body: "x".repeat(200) });
  });

  it("passes an abort signal to fetch", async () => {
    const fetchMock = vi.fn(async (_url: string, init?: RequestInit) => {
      expect(init?.signal).toBeInstanceOf(AbortSignal);
      return new Response("ok");
    });
    vi.stubGlobal("fetch", fetchMock);

    await requestText("http://trends.test/", { timeoutMs: 50 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
