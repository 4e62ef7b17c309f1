import { describe, expect, it } from "vitest";
import { WorldBankClient, WorldBankRequestError } from "../src/client";

const metadata = { page: 1, pages: 1, per_page: 50, total: 2 };

describe("world bank client", () => {
  it("builds the indicator request and returns records in provider order", async () => {
    let requestedUrl = "";
    const client = new WorldBankClient({
      fetchFn: async (input) => {
        requestedUrl = String(input);
        return new Response(
          JSON.stringify([
            metadata,
            [
              { date: "2023", value: 5.65, countryiso3code: "IND", indicator: { id: "FP.CPI.TOTL.ZG", value: "Inflation" } },
              { date: "2022", value: null, countryiso3code: "IND" },
            ],
          ]),
          { status: 200 },
        );
      },
    });

    const records = await client.getIndicator({
      countryCode: "IND",
      indicatorCode: "FP.CPI.TOTL.ZG",
      startYear: 2021,
      endYear: 2024,
    });

    expect(requestedUrl).toBe(
      "https://api.worldbank.org/v2/country/IND/indicator/FP.CPI.TOTL.ZG?format=json&per_page=50&date=2021%3A2024",
    );
    expect(records.map((record) => [record.date, record.value])).toEqual([
      ["2023", 5.65],
      ["2022", null],
    ]);
  });

  it("returns no records when the envelope has no second element", async () => {
    const client = new WorldBankClient({
      fetchFn: async () =>
        new Response(JSON.stringify([{ message: [{ id: "120", key: "Invalid value" }] }]), { status: 200 }),
    });

    await expect(
      client.getIndicator({ countryCode: "IND", indicatorCode: "BAD", startYear: 2020, endYear: 2024 }),
    ).resolves.toEqual([]);
  });

  it("accepts only status 200", async () => {
    const client = new WorldBankClient({
      perPage: 10,
      fetchFn: async () => new Response(JSON.stringify([metadata, []]), { status: 202 }),
    });

    await expect(
      client.getIndicator({ countryCode: "IND", indicatorCode: "SL.UEM.TOTL.ZS", startYear: 2020, endYear: 2024 }),
    ).rejects.toBeInstanceOf(WorldBankRequestError);
  });
});
