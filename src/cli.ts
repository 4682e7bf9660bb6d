import { parseArgs } from "util";
import { PROPERTIES, type Period, type Property } from "./trends/client.js";
import type { InterestForRegion } from "./trends/geoMapSchema.js";
import type { Resolution } from "./trends/request.js";

export const USAGE =
  "Usage: region-interest <country|ALL> <keyword>... [--filter REGION|CITY|COUNTRY] [--for <keyword>] " +
  "[--period <period>] [--category <id>] [--property <property>] [--json]";

const RESOLUTIONS: readonly Resolution[] = ["REGION", "CITY", "COUNTRY"];

export type CliOptions = {
  country: string;
  keywords: string[];
  filter?: Resolution;
  forKeyword?: string;
  period?: Period;
  category?: number;
  property?: Property;
  json: boolean;
};

function isResolution(value: string): value is Resolution {
  return RESOLUTIONS.some((r) => r === value);
}

function isProperty(value: string): value is Property {
  return PROPERTIES.some((p) => p === value);
}

function isPeriod(value: string): value is Period {
  return value.includes(" ") || value === "all";
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      filter: { type: "string" },
      for: { type: "string" },
      period: { type: "string" },
      category: { type: "string" },
      property: { type: "string" },
      json: { type: "boolean", default: false }
    }
  });

  const [country, ...keywords] = positionals;
  if (country === undefined || keywords.length === 0) {
    throw new Error(USAGE);
  }

  const options: CliOptions = { country, keywords, json: values.json ?? false };

  if (values.filter !== undefined) {
    const filter = values.filter.toUpperCase();
    if (!isResolution(filter)) throw new Error(`--filter must be one of ${RESOLUTIONS.join(", ")}`);
    options.filter = filter;
  }
  if (values.for !== undefined) options.forKeyword = values.for;
  if (values.period !== undefined) {
    if (!isPeriod(values.period)) throw new Error(`--period "${values.period}" is not a Trends period`);
    options.period = values.period;
  }
  if (values.category !== undefined) {
    if (!/^\d+$/.test(values.category)) throw new Error("--category must be a non-negative integer");
    options.category = Number.parseInt(values.category, 10);
  }
  if (values.property !== undefined) {
    if (!isProperty(values.property)) {
      throw new Error(`--property must be one of ${PROPERTIES.map((p) => p || '""').join(", ")}`);
    }
    options.property = values.property;
  }
  return options;
}

/** One line per region: name padded to the longest name, then the formatted values. */
export function formatRegions(regions: InterestForRegion[]): string {
  if (regions.length === 0) return "No data.";
  const width = Math.max(...regions.map((r) => r.geoName.length));
  return regions.map((r) => `${r.geoName.padEnd(width)}  ${r.formattedValue.join("  ")}`).join("\n");
}
