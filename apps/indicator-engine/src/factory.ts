import { consoleLogger, type Logger, type RawFetchResult } from "@econ/indicator-core";
import { FredClient, FredSeriesAdapter } from "@econ/fred-client";
import { TtlCache } from "@econ/series-cache";
import { WorldBankClient, WorldBankPointListAdapter } from "@econ/worldbank-client";
import { getDefaultCatalog, type IndicatorCatalog } from "./catalog";
import { IndicatorEngine } from "./engine";
import { getRuntimeSettings, type RuntimeSettings } from "./runtime-settings";

export interface CreateIndicatorEngineInput {
  settings?: RuntimeSettings;
  catalog?: IndicatorCatalog;
  logger?: Logger;
  fetchFn?: typeof fetch;
  now?: () => number;
}

/**
 * Wires both provider clients, their adapters and a shared series cache from
 * runtime settings.
 */
export function createIndicatorEngine(input: CreateIndicatorEngineInput = {}): IndicatorEngine {
  const settings = input.settings ?? getRuntimeSettings();
  const logger = input.logger ?? consoleLogger;

  const fredClient = new FredClient({
    apiKey: settings.fredApiKey,
    baseUrl: settings.fredBaseUrl,
    timeoutMs: settings.providerTimeoutMs,
    fetchFn: input.fetchFn,
  });
  const worldBankClient = new WorldBankClient({
    baseUrl: settings.worldBankBaseUrl,
    perPage: settings.worldBankPerPage,
    timeoutMs: settings.providerTimeoutMs,
    fetchFn: input.fetchFn,
  });

  return new IndicatorEngine({
    catalog: input.catalog ?? getDefaultCatalog(),
    adapters: {
      "series-api": new FredSeriesAdapter(fredClient, logger),
      "point-list-api": new WorldBankPointListAdapter(worldBankClient, logger, {
        dateWindow: settings.worldBankDateWindow,
      }),
    },
    cache: new TtlCache<RawFetchResult | null>({ ttlMs: settings.seriesCacheTtlMs, now: input.now }),
    logger,
    now: input.now,
    yearsBack: settings.yearsBack,
  });
}
