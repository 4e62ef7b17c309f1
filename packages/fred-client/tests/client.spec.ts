import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { FredClient, FredRequestError } from "../src/client";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("fred client", () => {
  it("builds the observations request and drops missing values", async () => {
    let requestedUrl = "";
    let requestSignal: AbortSignal | null | undefined;
    const client = new FredClient({
      apiKey: " test-key ",
      fetchFn: async (input, init) => {
        requestedUrl = String(input);
        requestSignal = init?.signal;
        return jsonResponse({
          units: "Index 1982-1984=100",
          observations: [
            { date: "2024-01-01", value: "308.4" },
            { date: "2024-02-01", value: "." },
            { date: "2024-03-01", value: "310.3" },
          ],
        });
      },
    });

    const observations = await client.getObservations({
      seriesId: "CPIAUCSL",
      observationStart: "2021-10-19",
      observationEnd: "2024-10-18",
    });

    expect(requestedUrl).toBe(
      "https://api.stlouisfed.org/fred/series/observations?series_id=CPIAUCSL&api_key=test-key&file_type=json&observation_start=2021-10-19&observation_end=2024-10-18",
    );
    expect(requestSignal).toBeInstanceOf(AbortSignal);
    expect(observations).toEqual([
      { date: "2024-01-01", value: 308.4 },
      { date: "2024-03-01", value: 310.3 },
    ]);
  });

  it("throws a typed error on non-2xx responses", async () => {
    const client = new FredClient({
      apiKey: "test-key",
      fetchFn: async () => jsonResponse({ error_message: "Bad Request" }, 400),
    });

    const request = client.getObservations({ seriesId: "NOPE" });

    await expect(request).rejects.toBeInstanceOf(FredRequestError);
    await expect(request).rejects.toMatchObject({ status: 400 });
  });

  it("refuses to call upstream without an api key", async () => {
    let called = false;
    const client = new FredClient({
      fetchFn: async () => {
        called = true;
        return jsonResponse({ observations: [] });
      },
    });

    expect(client.hasCredentials).toBe(false);
    await expect(client.getObservations({ seriesId: "UNRATE" })).rejects.toThrow(
      "FRED API key is not configured",
    );
    expect(called).toBe(false);
  });

  it("rejects payloads carrying impossible calendar dates", async () => {
    const client = new FredClient({
      apiKey: "test-key",
      fetchFn: async () =>
        jsonResponse({
          observations: [
            { date: "2024-01-01", value: "3.7" },
            { date: "2024-02-30", value: "3.9" },
          ],
        }),
    });

    await expect(client.getObservations({ seriesId: "UNRATE" })).rejects.toBeInstanceOf(ZodError);
  });
});
