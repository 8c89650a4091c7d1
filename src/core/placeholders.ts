import { IDENTITY_PLACEHOLDERS } from "../shared/constants.js";
import type { PlaceholderSet, RawConfigMap, ResolutionEnvironment } from "../shared/types.js";
import { formatConfigValue, isBlankValue } from "../config/legacy.js";
import { formatUtcDate, formatUtcDateTime, formatUtcTime } from "../utils/time.js";

/**
 * Builds the `%name` substitutions for one resolution. The three time tokens
 * share a single reading of the clock.
 */
export function buildPlaceholders(cfg: RawConfigMap, environment: ResolutionEnvironment): PlaceholderSet {
  const now = environment.now();
  const placeholders: PlaceholderSet = {
    datetime: formatUtcDateTime(now),
    date: formatUtcDate(now),
    time: formatUtcTime(now),
    hostname: environment.hostname(),
    m: "",
    p: "",
    s: "",
    b: "",
    a: "",
    r: ""
  };

  for (const { name, key, fallback } of IDENTITY_PLACEHOLDERS) {
    const value = cfg.get(key);
    placeholders[name] = value === undefined || isBlankValue(value) ? fallback : formatConfigValue(value);
  }

  return placeholders;
}
