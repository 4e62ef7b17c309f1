import {
  DEFAULT_WORLD_BANK_DATE_WINDOW,
  parseWorldBankDateWindow,
  type WorldBankDateWindow,
} from "@econ/worldbank-client";

export interface RuntimeSettings {
  fredApiKey?: string;
  fredBaseUrl: string;
  worldBankBaseUrl: string;
  worldBankPerPage: number;
  worldBankDateWindow: WorldBankDateWindow;
  providerTimeoutMs: number;
  seriesCacheTtlMs: number;
  yearsBack: number;
}

export const MIN_YEARS_BACK = 1;
export const MAX_YEARS_BACK = 10;

const DEFAULTS = {
  fredBaseUrl: "https://api.stlouisfed.org",
  worldBankBaseUrl: "https://api.worldbank.org/v2",
  worldBankPerPage: 50,
  worldBankDateWindow: DEFAULT_WORLD_BANK_DATE_WINDOW,
  providerTimeoutMs: 10_000,
  seriesCacheTtlMs: 60 * 60_000,
  yearsBack: 3,
};

type Env = Record<string, string | undefined>;

let cachedSettings: RuntimeSettings | null = null;

function readString(envValue: string | undefined, fallback: string): string {
  if (typeof envValue === "string" && envValue.trim().length > 0) {
    return envValue.trim();
  }
  return fallback;
}

function readOptionalString(envValue: string | undefined): string | undefined {
  if (typeof envValue === "string" && envValue.trim().length > 0) {
    return envValue.trim();
  }
  return undefined;
}

function readNumber(envValue: string | undefined, fallback: number): number {
  const parsed = Number(envValue);
  if (envValue !== undefined && envValue.trim().length > 0 && Number.isFinite(parsed) && parsed > 0) {
    return parsed;
  }
  return fallback;
}

function readDateWindow(envValue: string | undefined, fallback: WorldBankDateWindow): WorldBankDateWindow {
  if (typeof envValue === "string" && envValue.trim().length > 0) {
    return parseWorldBankDateWindow(envValue) ?? fallback;
  }
  return fallback;
}

export function clampYearsBack(value: number): number {
  return Math.min(MAX_YEARS_BACK, Math.max(MIN_YEARS_BACK, Math.round(value)));
}

/**
 * Builds settings from an environment map. A missing FRED key is a normal
 * state: series-api indicators then report no data.
 */
export function resolveRuntimeSettings(env: Env): RuntimeSettings {
  return {
    fredApiKey: readOptionalString(env.FRED_API_KEY),
    fredBaseUrl: readString(env.FRED_BASE_URL, DEFAULTS.fredBaseUrl),
    worldBankBaseUrl: readString(env.WORLD_BANK_BASE_URL, DEFAULTS.worldBankBaseUrl),
    worldBankPerPage: readNumber(env.WORLD_BANK_PER_PAGE, DEFAULTS.worldBankPerPage),
    worldBankDateWindow: readDateWindow(env.WORLD_BANK_DATE_WINDOW, DEFAULTS.worldBankDateWindow),
    providerTimeoutMs: readNumber(env.PROVIDER_TIMEOUT_MS, DEFAULTS.providerTimeoutMs),
    seriesCacheTtlMs: readNumber(env.SERIES_CACHE_TTL_MS, DEFAULTS.seriesCacheTtlMs),
    yearsBack: clampYearsBack(readNumber(env.INDICATOR_YEARS_BACK, DEFAULTS.yearsBack)),
  };
}

export function getRuntimeSettings(): RuntimeSettings {
  if (cachedSettings) {
    return cachedSettings;
  }

  cachedSettings = resolveRuntimeSettings(process.env);
  return cachedSettings;
}
