import type { ZodIssue } from "zod";

export class TrendsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TrendsError";
  }
}

/** Thrown by `getFor` when the keyword was not registered on the client. */
export class KeywordNotSetError extends TrendsError {
  constructor(public readonly keyword: string, public readonly registered: readonly string[]) {
    super(`Keyword "${keyword}" is not set on the client (registered: ${registered.join(", ")})`);
    this.name = "KeywordNotSetError";
  }
}

export class InvalidFilterError extends TrendsError {
  constructor(public readonly resolution: string, public readonly country: string) {
    super(
      country === ""
        ? `Resolution "${resolution}" cannot be used with all countries; use "COUNTRY" or keep the default`
        : `Resolution "${resolution}" is only valid when querying all countries (got "${country}")`
    );
    this.name = "InvalidFilterError";
  }
}

export class InvalidClientError extends TrendsError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidClientError";
  }
}

export class SchemaMismatchError extends TrendsError {
  constructor(
    public readonly context: string,
    detail: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(`${context} did not match expected schema: ${detail}`);
    this.name = "SchemaMismatchError";
  }
}

export class HttpError extends TrendsError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string,
    public readonly body: string
  ) {
    super(`HTTP ${status} ${statusText}: ${body}`);
    this.name = "HttpError";
  }
}
