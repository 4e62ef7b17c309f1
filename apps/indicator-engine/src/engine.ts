import {
  classifyChange,
  computeMetrics,
  normalize,
  silentLogger,
  type ChangeClassification,
  type DateRange,
  type IndicatorDescriptor,
  type IndicatorName,
  type IndicatorSource,
  type Logger,
  type MetricsRecord,
  type PointListApiSource,
  type ProviderAdapter,
  type ProviderKind,
  type RawFetchResult,
  type SeriesApiSource,
} from "@econ/indicator-core";
import { buildSeriesCacheKey, TtlCache } from "@econ/series-cache";
import type { IndicatorCatalog } from "./catalog";
import { clampYearsBack } from "./runtime-settings";

const DAY_MS = 24 * 60 * 60_000;
const DEFAULT_YEARS_BACK = 3;

export interface ProviderAdapters {
  "series-api": ProviderAdapter<SeriesApiSource>;
  "point-list-api": ProviderAdapter<PointListApiSource>;
}

export type SnapshotStatus = "ok" | "unavailable";

export interface IndicatorChanges {
  mom: ChangeClassification;
  momPct: ChangeClassification;
  yoy: ChangeClassification;
  yoyPct: ChangeClassification;
}

export interface IndicatorSnapshot {
  country: string;
  indicator: IndicatorName;
  label: string;
  providerKind: ProviderKind;
  status: SnapshotStatus;
  metrics: MetricsRecord | null;
  changes: IndicatorChanges;
}

export interface IndicatorSelection {
  country: string;
  indicator: IndicatorName;
}

export interface ComputeOptions {
  yearsBack?: number;
}

export interface IndicatorEngineDeps {
  catalog: IndicatorCatalog;
  adapters: ProviderAdapters;
  cache?: TtlCache<RawFetchResult | null>;
  logger?: Logger;
  now?: () => number;
  yearsBack?: number;
}

export class UnknownIndicatorError extends Error {
  constructor(
    readonly country: string,
    readonly indicator: string,
  ) {
    super(`No indicator "${indicator}" configured for ${country}`);
    this.name = "UnknownIndicatorError";
  }
}

function toIsoDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * Window ending today and reaching back `yearsBack` × 365 days.
 */
export function buildDateRange(nowMs: number, yearsBack: number): DateRange {
  return {
    start: toIsoDate(nowMs - yearsBack * 365 * DAY_MS),
    end: toIsoDate(nowMs),
  };
}

export function classifyMetrics(metrics: MetricsRecord | null): IndicatorChanges {
  return {
    mom: classifyChange(metrics?.momChange),
    momPct: classifyChange(metrics?.momPct),
    yoy: classifyChange(metrics?.yoyChange),
    yoyPct: classifyChange(metrics?.yoyPct),
  };
}

/**
 * Runs the fetch → normalize → metrics → classify pipeline for catalog
 * entries. Every indicator is computed independently: a failure is logged
 * and reported as an `unavailable` snapshot instead of rejecting.
 */
export class IndicatorEngine {
  private readonly catalog: IndicatorCatalog;
  private readonly adapters: ProviderAdapters;
  private readonly cache: TtlCache<RawFetchResult | null>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly yearsBack: number;

  constructor(deps: IndicatorEngineDeps) {
    this.catalog = deps.catalog;
    this.adapters = deps.adapters;
    this.cache = deps.cache ?? new TtlCache<RawFetchResult | null>({ now: deps.now });
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
    this.yearsBack = clampYearsBack(deps.yearsBack ?? DEFAULT_YEARS_BACK);
  }

  listCountries(): string[] {
    return this.catalog.countries();
  }

  listIndicators(country: string): IndicatorDescriptor[] {
    return this.catalog.forCountry(country);
  }

  async computeIndicator(
    country: string,
    indicator: IndicatorName,
    options: ComputeOptions = {},
  ): Promise<IndicatorSnapshot> {
    const descriptor = this.catalog.get(country, indicator);
    if (!descriptor) {
      throw new UnknownIndicatorError(country, indicator);
    }
    return this.computeDescriptor(descriptor, options);
  }

  async computeCountry(country: string, options: ComputeOptions = {}): Promise<IndicatorSnapshot[]> {
    return Promise.all(
      this.catalog.forCountry(country).map((descriptor) => this.computeDescriptor(descriptor, options)),
    );
  }

  /**
   * Pairs missing from the catalog are skipped with a warning.
   */
  async computeBatch(
    selection: readonly IndicatorSelection[],
    options: ComputeOptions = {},
  ): Promise<IndicatorSnapshot[]> {
    const descriptors: IndicatorDescriptor[] = [];
    for (const item of selection) {
      const descriptor = this.catalog.get(item.country, item.indicator);
      if (!descriptor) {
        this.logger.warn("Indicator not configured", { country: item.country, indicator: item.indicator });
        continue;
      }
      descriptors.push(descriptor);
    }
    return Promise.all(descriptors.map((descriptor) => this.computeDescriptor(descriptor, options)));
  }

  private async computeDescriptor(
    descriptor: IndicatorDescriptor,
    options: ComputeOptions,
  ): Promise<IndicatorSnapshot> {
    const yearsBack = options.yearsBack === undefined ? this.yearsBack : clampYearsBack(options.yearsBack);
    const range = buildDateRange(this.now(), yearsBack);
    const providerKind = descriptor.source.kind;

    try {
      const raw = await this.cache.getOrFetch(buildSeriesCacheKey(descriptor.source, range), () =>
        this.fetchRaw(descriptor.source, range),
      );
      const metrics = computeMetrics(normalize(raw, providerKind));
      return this.snapshot(descriptor, "ok", metrics);
    } catch (error) {
      this.logger.error("Indicator computation failed", {
        country: descriptor.country,
        indicator: descriptor.indicator,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.snapshot(descriptor, "unavailable", null);
    }
  }

  private fetchRaw(source: IndicatorSource, range: DateRange): Promise<RawFetchResult | null> {
    if (source.kind === "series-api") {
      return this.adapters["series-api"].fetch(source, range);
    }
    return this.adapters["point-list-api"].fetch(source, range);
  }

  private snapshot(
    descriptor: IndicatorDescriptor,
    status: SnapshotStatus,
    metrics: MetricsRecord | null,
  ): IndicatorSnapshot {
    return {
      country: descriptor.country,
      indicator: descriptor.indicator,
      label: descriptor.label,
      providerKind: descriptor.source.kind,
      status,
      metrics,
      changes: classifyMetrics(metrics),
    };
  }
}
