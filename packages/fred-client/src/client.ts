import {
  FRED_MISSING_VALUE,
  FredObservationsRequestSchema,
  FredObservationsResponseSchema,
  type FredObservation,
  type FredObservationsRequest,
} from "./types";

export const DEFAULT_FRED_BASE_URL = "https://api.stlouisfed.org";
export const DEFAULT_FRED_TIMEOUT_MS = 10_000;

export interface FredClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

export class FredRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "FredRequestError";
  }
}

/**
 * Thin, typed client for the FRED series observations endpoint.
 *
 * Failures are thrown as `FredRequestError` (bad status) or zod errors
 * (unexpected payload); callers that need a "no data" contract wrap it.
 */
export class FredClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: FredClientOptions = {}) {
    this.apiKey = (options.apiKey ?? "").trim();
    this.baseUrl = (options.baseUrl ?? DEFAULT_FRED_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FRED_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  get hasCredentials(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Fetches observations for one series, oldest first, with missing
   * observations removed.
   */
  async getObservations(request: FredObservationsRequest): Promise<FredObservation[]> {
    if (!this.hasCredentials) {
      throw new FredRequestError("FRED API key is not configured");
    }

    const parsed = FredObservationsRequestSchema.parse(request);
    const params = new URLSearchParams({
      series_id: parsed.seriesId,
      api_key: this.apiKey,
      file_type: "json",
    });
    if (parsed.observationStart) params.set("observation_start", parsed.observationStart);
    if (parsed.observationEnd) params.set("observation_end", parsed.observationEnd);

    const payload = await this.fetchJson(`${this.baseUrl}/fred/series/observations?${params.toString()}`);
    const response = FredObservationsResponseSchema.parse(payload);

    return response.observations.flatMap((observation) => {
      if (observation.value === FRED_MISSING_VALUE) return [];
      const value = Number(observation.value);
      return Number.isFinite(value) ? [{ date: observation.date, value }] : [];
    });
  }

  private async fetchJson(url: string): Promise<unknown> {
    const response = await this.fetchFn(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const text = await response.text();

    if (!response.ok) {
      throw new FredRequestError(`FRED request failed (${response.status}): ${text}`, response.status);
    }

    return text ? JSON.parse(text) : null;
  }
}
