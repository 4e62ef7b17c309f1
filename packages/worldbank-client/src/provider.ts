import {
  silentLogger,
  type DateRange,
  type Logger,
  type PointListApiSource,
  type ProviderAdapter,
  type RawFetchResult,
} from "@econ/indicator-core";
import { WorldBankClient } from "./client";
import { DEFAULT_WORLD_BANK_DATE_WINDOW, type WorldBankDateWindow } from "./types";

export interface WorldBankPointListAdapterOptions {
  dateWindow?: WorldBankDateWindow;
}

/**
 * Point-list adapter backed by the World Bank indicator API. Every request
 * uses the configured fixed year window, not the engine's date range. Every
 * failure resolves to `null`, as does an envelope without records.
 */
export class WorldBankPointListAdapter implements ProviderAdapter<PointListApiSource> {
  readonly kind = "point-list-api" as const;

  constructor(
    private readonly client: WorldBankClient,
    private readonly logger: Logger = silentLogger,
    private readonly options: WorldBankPointListAdapterOptions = {},
  ) {}

  async fetch(source: PointListApiSource, _range: DateRange): Promise<RawFetchResult | null> {
    const dateWindow = this.options.dateWindow ?? DEFAULT_WORLD_BANK_DATE_WINDOW;
    try {
      const records = await this.client.getIndicator({
        countryCode: source.countryCode,
        indicatorCode: source.indicatorCode,
        startYear: dateWindow.startYear,
        endYear: dateWindow.endYear,
      });
      if (records.length === 0) return null;

      return {
        kind: "point-list-api",
        records: records.map((record) => ({ date: record.date, value: record.value })),
      };
    } catch (error) {
      this.logger.warn("World Bank indicator unavailable", {
        countryCode: source.countryCode,
        indicatorCode: source.indicatorCode,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
