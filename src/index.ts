export { loadConfig, type TrendsConfig } from "./config.js";
export {
  HttpError,
  InvalidClientError,
  InvalidFilterError,
  KeywordNotSetError,
  SchemaMismatchError,
  TrendsError
} from "./errors.js";
export { log, setLogLevel, type LogLevel } from "./logger.js";
export {
  Client,
  ClientBuilder,
  PERIODS,
  PROPERTIES,
  type ExploreRequest,
  type NamedPeriod,
  type Period,
  type Property
} from "./trends/client.js";
export { Country, type CountryInfo } from "./trends/country.js";
export {
  decodeRegionInterest,
  type Coordinates,
  type InterestForRegion,
  type RegionInterestResponse
} from "./trends/geoMapSchema.js";
export { Keywords, MAX_KEYWORDS } from "./trends/keywords.js";
export { RegionInterest, type RegionInterestSlot } from "./trends/regionInterest.js";
export { TrendsSession, type Resolution, type Widget } from "./trends/request.js";
