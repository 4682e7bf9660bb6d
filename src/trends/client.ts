import type { TrendsConfig } from "../config.js";
import { InvalidClientError } from "../errors.js";
import { Country } from "./country.js";
import { Keywords } from "./keywords.js";

export const PERIODS = [
  "now 1-H",
  "now 4-H",
  "now 1-d",
  "now 7-d",
  "today 1-m",
  "today 3-m",
  "today 12-m",
  "today 5-y",
  "all"
] as const;

export type NamedPeriod = (typeof PERIODS)[number];

/** A named period or a custom `YYYY-MM-DD YYYY-MM-DD` range. */
export type Period = NamedPeriod | `${string} ${string}`;

/** Search property: "" is web search, "froogle" is Google Shopping. */
export type Property = "" | "images" | "news" | "froogle" | "youtube";

export const PROPERTIES: readonly Property[] = ["", "images", "news", "froogle", "youtube"];

export type ComparisonItem = {
  keyword: string;
  geo: string;
  time: string;
};

/** Payload of the explore request, built once by `ClientBuilder.build()`. */
export type ExploreRequest = {
  readonly comparisonItem: readonly Readonly<ComparisonItem>[];
  readonly category: number;
  readonly property: Property;
};

export type ClientOptions = {
  keywords: Keywords;
  country: Country;
  lang: string;
  tz: number;
  period: Period;
  category: number;
  property: Property;
  baseUrl: string;
  timeoutMs: number;
};

const DEFAULTS: Omit<ClientOptions, "keywords" | "country"> = {
  lang: "en-US",
  tz: 0,
  period: "today 12-m",
  category: 0,
  property: "",
  baseUrl: "https://trends.google.com",
  timeoutMs: 15000
};

const CUSTOM_RANGE = /^(\d{4}-\d{2}-\d{2}) (\d{4}-\d{2}-\d{2})$/;

function isNamedPeriod(value: string): value is NamedPeriod {
  return PERIODS.some((p) => p === value);
}

// Date.parse rolls 2024-02-30 over to March 1 instead of failing.
function sameDay(time: number, date: string): boolean {
  return new Date(time).toISOString().slice(0, 10) === date;
}

function validatePeriod(period: string): void {
  if (isNamedPeriod(period)) return;
  const match = CUSTOM_RANGE.exec(period);
  if (!match) {
    throw new InvalidClientError(`Unknown period "${period}"; use one of ${PERIODS.join(", ")} or "YYYY-MM-DD YYYY-MM-DD"`);
  }
  const start = Date.parse(`${match[1]}T00:00:00Z`);
  const end = Date.parse(`${match[2]}T00:00:00Z`);
  if (Number.isNaN(start) || Number.isNaN(end) || !sameDay(start, match[1]) || !sameDay(end, match[2])) {
    throw new InvalidClientError(`Invalid date in period "${period}"`);
  }
  if (start > end) {
    throw new InvalidClientError(`Period start is after its end: "${period}"`);
  }
}

/**
 * Unbuilt client. Collects keywords, geography and query settings; only the
 * `Client` returned by `build()` can be handed to an endpoint accessor.
 */
export class ClientBuilder {
  private options: ClientOptions;

  constructor(keywords: Keywords | readonly string[], country: Country | string = Country.ALL) {
    this.options = {
      ...DEFAULTS,
      keywords: keywords instanceof Keywords ? keywords : new Keywords(keywords),
      country: typeof country === "string" ? Country.of(country) : country
    };
  }

  withLang(lang: string): this {
    if (!lang.trim()) throw new InvalidClientError("Language cannot be blank");
    this.options.lang = lang.trim();
    return this;
  }

  withTimezone(tz: number): this {
    if (!Number.isInteger(tz)) throw new InvalidClientError(`Timezone offset must be an integer, got ${tz}`);
    this.options.tz = tz;
    return this;
  }

  withPeriod(period: Period): this {
    validatePeriod(period);
    this.options.period = period;
    return this;
  }

  withCategory(category: number): this {
    if (!Number.isInteger(category) || category < 0) {
      throw new InvalidClientError(`Category must be a non-negative integer, got ${category}`);
    }
    this.options.category = category;
    return this;
  }

  withProperty(property: Property): this {
    this.options.property = property;
    return this;
  }

  withTimeout(timeoutMs: number): this {
    if (!(timeoutMs > 0)) throw new InvalidClientError(`Timeout must be positive, got ${timeoutMs}`);
    this.options.timeoutMs = timeoutMs;
    return this;
  }

  /** Applies base URL, language, timezone and timeout from the environment config. */
  withConfig(config: TrendsConfig): this {
    this.options.baseUrl = config.TRENDS_BASE_URL;
    return this.withLang(config.TRENDS_HL).withTimezone(config.TRENDS_TZ).withTimeout(config.TRENDS_TIMEOUT_MS);
  }

  build(): Client {
    return new Client({ ...this.options });
  }
}

/** Built, immutable client: keywords, geography and the explore request derived from them. */
export class Client {
  readonly keywords: Keywords;
  readonly country: Country;
  readonly lang: string;
  readonly tz: number;
  readonly period: Period;
  readonly category: number;
  readonly property: Property;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly exploreRequest: ExploreRequest;

  constructor(options: ClientOptions) {
    this.keywords = options.keywords;
    this.country = options.country;
    this.lang = options.lang;
    this.tz = options.tz;
    this.period = options.period;
    this.category = options.category;
    this.property = options.property;
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.exploreRequest = Object.freeze({
      comparisonItem: Object.freeze(
        options.keywords.values.map((keyword) =>
          Object.freeze({ keyword, geo: options.country.code, time: options.period })
        )
      ),
      category: options.category,
      property: options.property
    });
  }

  static builder(keywords: Keywords | readonly string[], country: Country | string = Country.ALL): ClientBuilder {
    return new ClientBuilder(keywords, country);
  }
}
