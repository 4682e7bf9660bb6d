/**
 * Wire schema of the `comparedgeo` widget data (the "Interest by region" map).
 * The Trends web API is undocumented; field names here follow what the
 * explore page receives and are the only place to change if Google does.
 *
 * Values are on a 0-100 scale relative to the most popular location; 0 means
 * there was not enough data for the term in that location.
 */

import { z } from "zod";
import { SchemaMismatchError } from "../errors.js";

/** Every JSON payload from the Trends API starts with this anti-XSSI guard. */
const GUARD_PREFIX = /^\)\]\}'?,?\s*/;

const coordinatesSchema = z.object({
  lat: z.number(),
  lng: z.number()
});

const interestForRegionSchema = z
  .object({
    geoCode: z.string().optional(),
    geoName: z.string(),
    coordinates: coordinatesSchema.optional(),
    value: z.array(z.number().int().min(0).max(100)),
    formattedValue: z.array(z.string()),
    hasData: z.array(z.boolean()),
    maxValueIndex: z.number().int().min(0)
  })
  .superRefine((entry, ctx) => {
    const n = entry.value.length;
    if (entry.hasData.length !== n || entry.formattedValue.length !== n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `value, hasData and formattedValue lengths differ (${n}, ${entry.hasData.length}, ${entry.formattedValue.length})`
      });
    }
    if (n > 0 && entry.maxValueIndex >= n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["maxValueIndex"],
        message: `maxValueIndex ${entry.maxValueIndex} is out of range for ${n} values`
      });
    }
  });

export const regionInterestResponseSchema = z.object({
  default: z.object({
    geoMapData: z.array(interestForRegionSchema)
  })
});

export type Coordinates = z.infer<typeof coordinatesSchema>;
export type InterestForRegion = z.infer<typeof interestForRegionSchema>;
export type RegionInterestResponse = z.infer<typeof regionInterestResponseSchema>;

export function stripGuardPrefix(payload: string): string {
  return payload.replace(GUARD_PREFIX, "");
}

/** Parses a guarded JSON payload; `context` names the request in error messages. */
export function parseGuardedJson(payload: string, context: string): unknown {
  try {
    return JSON.parse(stripGuardPrefix(payload));
  } catch (err) {
    throw new SchemaMismatchError(context, err instanceof Error ? err.message : String(err));
  }
}

export function decodeRegionInterest(data: unknown): InterestForRegion[] {
  const parsed = regionInterestResponseSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join(", ");
    throw new SchemaMismatchError("Region interest response", detail, parsed.error.issues);
  }
  return parsed.data.default.geoMapData;
}
