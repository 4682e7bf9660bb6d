/**
 * Interest by region: in which locations a keyword was most popular during the
 * client's period. See `geoMapSchema.ts` for the value scale.
 */

import { InvalidFilterError, KeywordNotSetError } from "../errors.js";
import { log } from "../logger.js";
import type { Client } from "./client.js";
import { decodeRegionInterest, type InterestForRegion } from "./geoMapSchema.js";
import { TrendsSession, type Resolution, type Widget } from "./request.js";

export type RegionInterestSlot = {
  /** `null` for the aggregate slot comparing all keywords. */
  keyword: string | null;
  regions: InterestForRegion[];
};

function defaultResolution(client: Client): Resolution {
  return client.country.isAll ? "COUNTRY" : "REGION";
}

function assertResolution(client: Client, resolution: Resolution): void {
  if (resolution === "REGION" && client.country.isAll) {
    throw new InvalidFilterError(resolution, client.country.code);
  }
  if (resolution === "COUNTRY" && !client.country.isAll) {
    throw new InvalidFilterError(resolution, client.country.code);
  }
}

export class RegionInterest {
  readonly resolution: Resolution;

  constructor(
    readonly client: Client,
    resolution?: Resolution
  ) {
    const res = resolution ?? defaultResolution(client);
    assertResolution(client, res);
    this.resolution = res;
  }

  /**
   * Returns an accessor filtered by "REGION" or "CITY". When the client
   * queries all countries, use "COUNTRY" (the default there); "REGION" throws.
   *
   * @example
   * const client = new ClientBuilder(["hacker"], "US").build();
   * const cities = await new RegionInterest(client).withFilter("CITY").get();
   */
  withFilter(resolution: Resolution): RegionInterest {
    return new RegionInterest(this.client, resolution);
  }

  /** Per-region interest for all keywords combined. */
  async get(): Promise<InterestForRegion[]> {
    const session = await TrendsSession.open(this.client);
    const [aggregate] = await session.geoMapWidgets();
    return this.fetchSlot(session, aggregate);
  }

  /**
   * Per-region interest for one registered keyword.
   * Throws `KeywordNotSetError`, before any request, if `keyword` was not given to the client.
   */
  async getFor(keyword: string): Promise<InterestForRegion[]> {
    const index = this.client.keywords.indexOf(keyword);
    if (index === -1) {
      throw new KeywordNotSetError(keyword, this.client.keywords.values);
    }
    const session = await TrendsSession.open(this.client);
    const slots = await session.geoMapWidgets();
    return this.fetchSlot(session, slots[index + 1]);
  }

  /** Every slot in response order: the aggregate, then one per keyword. */
  async getAll(): Promise<RegionInterestSlot[]> {
    const session = await TrendsSession.open(this.client);
    const widgets = await session.geoMapWidgets();
    const keywords = this.client.keywords.values;
    const slots: RegionInterestSlot[] = [];
    for (const [i, widget] of widgets.entries()) {
      slots.push({
        keyword: i === 0 ? null : keywords[i - 1],
        regions: await this.fetchSlot(session, widget)
      });
    }
    return slots;
  }

  private async fetchSlot(session: TrendsSession, widget: Widget): Promise<InterestForRegion[]> {
    const data = await session.widgetData(widget, this.resolution);
    const regions = decodeRegionInterest(data);
    log("debug", "Decoded region interest", {
      widget: widget.id,
      resolution: this.resolution,
      regions: regions.length
    });
    return regions;
  }
}
