import { describe, expect, it } from "vitest";
import type { RawFetchResult } from "../src/contracts";
import { normalize } from "../src/normalizer";

describe("normalizer", () => {
  it("reverses dense series into most-recent-first order", () => {
    const raw: RawFetchResult = {
      kind: "series-api",
      observations: [
        { date: "2024-01-01", value: 1 },
        { date: "2024-02-01", value: 2 },
        { date: "2024-03-01", value: 3 },
      ],
    };

    const series = normalize(raw, "series-api");

    expect(series.shape).toBe("series");
    expect(series.points.map((point) => point.value)).toEqual([3, 2, 1]);
    expect(series.points[0]).toEqual({
      date: "2024-03-01",
      timestamp: Date.UTC(2024, 2, 1),
      value: 3,
    });
  });

  it("orders point lists by date and drops null values", () => {
    const raw: RawFetchResult = {
      kind: "point-list-api",
      records: [
        { date: "2022", value: 2 },
        { date: "2024", value: 4 },
        { date: "2023", value: null },
      ],
    };

    const series = normalize(raw, "point-list-api");

    expect(series).toEqual({
      shape: "point-list",
      latestMissing: false,
      points: [
        { date: "2024", timestamp: Date.UTC(2024, 0, 1), value: 4 },
        { date: "2022", timestamp: Date.UTC(2022, 0, 1), value: 2 },
      ],
    });
  });

  it("flags a point list whose most recent record is null", () => {
    const raw: RawFetchResult = {
      kind: "point-list-api",
      records: [
        { date: "2024", value: null },
        { date: "2023", value: 3.5 },
      ],
    };

    const series = normalize(raw, "point-list-api");

    expect(series.shape === "point-list" && series.latestMissing).toBe(true);
    expect(series.points.map((point) => point.date)).toEqual(["2023"]);
  });

  it("keeps the first record for duplicated periods and skips unreadable dates", () => {
    const raw: RawFetchResult = {
      kind: "point-list-api",
      records: [
        { date: "2024", value: 1 },
        { date: "2024", value: 9 },
        { date: "last year", value: 5 },
      ],
    };

    const series = normalize(raw, "point-list-api");

    expect(series.points.map((point) => point.value)).toEqual([1]);
  });

  it("returns an empty series for null or mismatched payloads", () => {
    const pointList: RawFetchResult = { kind: "point-list-api", records: [{ date: "2024", value: 1 }] };

    expect(normalize(null, "series-api")).toEqual({ shape: "series", points: [] });
    expect(normalize(pointList, "series-api")).toEqual({ shape: "series", points: [] });
    expect(normalize(null, "point-list-api")).toEqual({
      shape: "point-list",
      points: [],
      latestMissing: false,
    });
  });

  it("is idempotent and leaves its input untouched", () => {
    const raw: RawFetchResult = {
      kind: "point-list-api",
      records: [
        { date: "2023", value: 2 },
        { date: "2024", value: null },
        { date: "2022", value: 1 },
      ],
    };
    const snapshot = structuredClone(raw);

    const first = normalize(raw, "point-list-api");
    const second = normalize(raw, "point-list-api");

    expect(second).toEqual(first);
    expect(raw).toEqual(snapshot);
    expect(Object.isFrozen(first.points)).toBe(true);
  });
});
