import {
  WorldBankEnvelopeSchema,
  WorldBankIndicatorRequestSchema,
  WorldBankRecordListSchema,
  type WorldBankIndicatorRequest,
  type WorldBankRecord,
} from "./types";

export const DEFAULT_WORLD_BANK_BASE_URL = "https://api.worldbank.org/v2";
export const DEFAULT_WORLD_BANK_PER_PAGE = 50;
export const DEFAULT_WORLD_BANK_TIMEOUT_MS = 10_000;

export interface WorldBankClientOptions {
  baseUrl?: string;
  perPage?: number;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

export class WorldBankRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "WorldBankRequestError";
  }
}

/**
 * Typed client for `GET /country/{country}/indicator/{indicator}`. The API is
 * public, so no credential is involved.
 */
export class WorldBankClient {
  private readonly baseUrl: string;
  private readonly perPage: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: WorldBankClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_WORLD_BANK_BASE_URL).replace(/\/+$/, "");
    this.perPage = options.perPage ?? DEFAULT_WORLD_BANK_PER_PAGE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WORLD_BANK_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /**
   * Returns the records of the first page in the order the API sent them,
   * or an empty list when the envelope carries no records.
   */
  async getIndicator(request: WorldBankIndicatorRequest): Promise<WorldBankRecord[]> {
    const parsed = WorldBankIndicatorRequestSchema.parse(request);
    const params = new URLSearchParams({
      format: "json",
      per_page: String(parsed.perPage ?? this.perPage),
      date: `${parsed.startYear}:${parsed.endYear}`,
    });
    const path = `country/${encodeURIComponent(parsed.countryCode)}/indicator/${encodeURIComponent(parsed.indicatorCode)}`;

    const payload = await this.fetchJson(`${this.baseUrl}/${path}?${params.toString()}`);
    const envelope = WorldBankEnvelopeSchema.parse(payload);
    const records = envelope[1];
    if (records === undefined || records === null) return [];

    return WorldBankRecordListSchema.parse(records);
  }

  private async fetchJson(url: string): Promise<unknown> {
    const response = await this.fetchFn(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const text = await response.text();

    if (response.status !== 200) {
      throw new WorldBankRequestError(`World Bank request failed (${response.status}): ${text}`, response.status);
    }

    return text ? JSON.parse(text) : null;
  }
}
