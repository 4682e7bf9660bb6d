import { z } from "zod";

const configSchema = z.object({
  TRENDS_BASE_URL: z.string().url().default("https://trends.google.com"),
  /** Interface language sent as `hl`. */
  TRENDS_HL: z.string().min(2).default("en-US"),
  /** Timezone offset in minutes sent as `tz` (Trends expects e.g. 300 for UTC-5). */
  TRENDS_TZ: z
    .string()
    .default("0")
    .pipe(z.string().regex(/^-?\d+$/, "must be an integer"))
    .transform((v) => Number.parseInt(v, 10)),
  TRENDS_TIMEOUT_MS: z
    .string()
    .default("15000")
    .pipe(z.string().regex(/^\d+$/, "must be a positive integer"))
    .transform((v) => Number.parseInt(v, 10)),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export type TrendsConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrendsConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid environment configuration: ${message}`);
  }
  const config = parsed.data;

  if (config.TRENDS_TIMEOUT_MS <= 0) {
    throw new Error("TRENDS_TIMEOUT_MS must be greater than 0");
  }

  return { ...config, TRENDS_BASE_URL: config.TRENDS_BASE_URL.replace(/\/+$/, "") };
}
