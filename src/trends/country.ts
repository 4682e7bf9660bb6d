import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { InvalidClientError } from "../errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const countriesSchema = z.array(z.object({ code: z.string().length(2), name: z.string().min(1) }));

export type CountryInfo = z.infer<typeof countriesSchema>[number];

let countries: Map<string, CountryInfo> | null = null;

function loadCountries(): Map<string, CountryInfo> {
  if (!countries) {
    const path = join(__dirname, "../../data/countries.json");
    const parsed = countriesSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
    countries = new Map(parsed.map((c) => [c.code, c]));
  }
  return countries;
}

/**
 * Geography selector. `ALL` is the worldwide scope; every other value is an
 * ISO 3166-1 alpha-2 code, optionally with a sub-division suffix (`US-CA`).
 */
export class Country {
  static readonly ALL = new Country("");

  private constructor(public readonly code: string) {}

  static of(code: string): Country {
    const normalized = code.trim().toUpperCase();
    if (normalized === "" || normalized === "ALL") return Country.ALL;

    const match = /^([A-Z]{2})(?:-([A-Z0-9]{1,3}))?$/.exec(normalized);
    if (!match || !loadCountries().has(match[1])) {
      throw new InvalidClientError(`Unknown country code "${code}"`);
    }
    return new Country(normalized);
  }

  static list(): CountryInfo[] {
    return Array.from(loadCountries().values());
  }

  get isAll(): boolean {
    return this.code === "";
  }

  /** Display name, e.g. "United States" or "United States (CA)". */
  get name(): string {
    if (this.isAll) return "Worldwide";
    const [base, sub] = this.code.split("-");
    const info = loadCountries().get(base);
    const name = info?.name ?? base;
    return sub ? `${name} (${sub})` : name;
  }

  equals(other: Country): boolean {
    return this.code === other.code;
  }

  toString(): string {
    return this.isAll ? "ALL" : this.code;
  }
}
