import { HttpError } from "./errors.js";

export type RequestOptions = RequestInit & { timeoutMs?: number };

/** Body excerpt kept on HttpError. */
const ERROR_BODY_MAX = 200;

async function withResponse<T>(
  url: string,
  options: RequestOptions,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const { timeoutMs = 15000, ...init } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new HttpError(response.status, response.statusText, url, text.slice(0, ERROR_BODY_MAX));
    }
    return await read(response);
  } finally {
    clearTimeout(timeout);
  }
}

/** Resolves with the response headers only; the body is discarded. */
export async function requestHeaders(url: string, options: RequestOptions = {}): Promise<Headers> {
  return withResponse(url, options, async (response) => {
    await response.body?.cancel();
    return response.headers;
  });
}

export async function requestText(url: string, options: RequestOptions = {}): Promise<string> {
  return withResponse(url, options, (response) => response.text());
}
