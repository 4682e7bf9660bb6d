#!/usr/bin/env node
import "dotenv/config";
import { formatRegions, parseCliArgs } from "../cli.js";
import { loadConfig } from "../config.js";
import { setLogLevel } from "../logger.js";
import { ClientBuilder } from "../trends/client.js";
import { RegionInterest } from "../trends/regionInterest.js";

async function main() {
  const config = loadConfig();
  setLogLevel(config.LOG_LEVEL);
  const options = parseCliArgs(process.argv.slice(2));

  const builder = new ClientBuilder(options.keywords, options.country).withConfig(config);
  if (options.period) builder.withPeriod(options.period);
  if (options.category !== undefined) builder.withCategory(options.category);
  if (options.property !== undefined) builder.withProperty(options.property);
  const client = builder.build();

  let accessor = new RegionInterest(client);
  if (options.filter) accessor = accessor.withFilter(options.filter);

  const regions = options.forKeyword ? await accessor.getFor(options.forKeyword) : await accessor.get();

  if (options.json) {
    console.log(JSON.stringify(regions, null, 2));
    return;
  }
  const scope = options.forKeyword ?? client.keywords.values.join(", ");
  console.log(`Interest by ${accessor.resolution.toLowerCase()} in ${client.country.name} for ${scope}:\n`);
  console.log(formatRegions(regions));
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
