import { describe, expect, it } from "vitest";
import { getDefaultCatalog, IndicatorCatalog } from "../src/catalog";

describe("indicator catalog", () => {
  it("loads the bundled catalog with every configured country", () => {
    const catalog = getDefaultCatalog();

    expect(catalog.countries()).toEqual(["US", "Europe", "India"]);
    expect(catalog.forCountry("US").map((entry) => entry.indicator)).toEqual([
      "CPI",
      "PPI",
      "Interest Rate",
      "Unemployment",
      "GDP Growth",
    ]);
    expect(catalog.forCountry("India").map((entry) => entry.indicator)).toEqual([
      "CPI",
      "Interest Rate",
      "GDP Growth",
      "Unemployment",
    ]);
    expect(catalog.all()).toHaveLength(14);
  });

  it("maps descriptors to their provider source", () => {
    const catalog = getDefaultCatalog();

    expect(catalog.get("US", "Interest Rate")).toEqual({
      country: "US",
      indicator: "Interest Rate",
      label: "Federal Funds Rate",
      source: { kind: "series-api", seriesId: "FEDFUNDS" },
    });
    expect(catalog.get("India", "CPI")?.source).toEqual({
      kind: "point-list-api",
      countryCode: "IND",
      indicatorCode: "FP.CPI.TOTL.ZG",
    });
    expect(catalog.get("India", "PPI")).toBeUndefined();
    expect(catalog.forCountry("Japan")).toEqual([]);
  });

  it("freezes descriptors", () => {
    const descriptor = getDefaultCatalog().get("Europe", "CPI");

    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor?.source)).toBe(true);
  });

  it("rejects malformed and duplicated entries", () => {
    expect(() =>
      IndicatorCatalog.parse([{ country: "US", indicator: "CPI", label: "CPI", source: { kind: "ftp" } }]),
    ).toThrow();

    const entry = { country: "US", indicator: "CPI", label: "CPI", source: { kind: "series-api", seriesId: "X" } };
    expect(() => IndicatorCatalog.parse([entry, entry])).toThrow(/Duplicate catalog entry for US CPI/);
  });
});
