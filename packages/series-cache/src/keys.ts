import type { DateRange, IndicatorSource } from "@econ/indicator-core";

export function sourceIdentifier(source: IndicatorSource): string {
  if (source.kind === "series-api") return source.seriesId;
  return `${source.countryCode}/${source.indicatorCode}`;
}

/**
 * Cache identity of one upstream request: provider kind, series identifier
 * and date range.
 */
export function buildSeriesCacheKey(source: IndicatorSource, range: DateRange): string {
  return `${source.kind}:${sourceIdentifier(source)}:${range.start}..${range.end}`;
}
