import { InvalidClientError } from "../errors.js";

/** Google Trends compares at most five terms at once. */
export const MAX_KEYWORDS = 5;

/**
 * Ordered, fixed set of search terms. The order decides which response slot
 * belongs to which keyword.
 */
export class Keywords {
  readonly values: readonly string[];

  constructor(keywords: readonly string[]) {
    const values = keywords.map((k) => k.trim());
    if (values.length === 0) {
      throw new InvalidClientError("At least one keyword is required");
    }
    if (values.length > MAX_KEYWORDS) {
      throw new InvalidClientError(`At most ${MAX_KEYWORDS} keywords can be compared, got ${values.length}`);
    }
    if (values.some((k) => k === "")) {
      throw new InvalidClientError("Keywords cannot be blank");
    }
    const seen = new Set<string>();
    for (const k of values) {
      if (seen.has(k)) throw new InvalidClientError(`Duplicate keyword "${k}"`);
      seen.add(k);
    }
    this.values = Object.freeze(values);
  }

  /** Zero-based position, or -1 when the keyword was not registered. */
  indexOf(keyword: string): number {
    return this.values.indexOf(keyword);
  }
}
