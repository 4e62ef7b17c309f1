import {
  silentLogger,
  type DateRange,
  type Logger,
  type ProviderAdapter,
  type RawFetchResult,
  type SeriesApiSource,
} from "@econ/indicator-core";
import { FredClient } from "./client";

/**
 * Series-api adapter backed by FRED. Every failure (missing key, timeout,
 * bad status, malformed payload, empty series) resolves to `null`.
 */
export class FredSeriesAdapter implements ProviderAdapter<SeriesApiSource> {
  readonly kind = "series-api" as const;

  constructor(
    private readonly client: FredClient,
    private readonly logger: Logger = silentLogger,
  ) {}

  async fetch(source: SeriesApiSource, range: DateRange): Promise<RawFetchResult | null> {
    if (!this.client.hasCredentials) {
      this.logger.info("FRED API key missing, skipping series", { seriesId: source.seriesId });
      return null;
    }

    try {
      const observations = await this.client.getObservations({
        seriesId: source.seriesId,
        observationStart: range.start,
        observationEnd: range.end,
      });
      if (observations.length === 0) return null;
      return { kind: "series-api", observations };
    } catch (error) {
      this.logger.warn("FRED series unavailable", {
        seriesId: source.seriesId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
