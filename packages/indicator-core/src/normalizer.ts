import type {
  CanonicalSeries,
  PointRecord,
  ProviderKind,
  RawFetchResult,
  SeriesObservation,
  SeriesPoint,
} from "./contracts";
import { parsePeriod } from "./periods";

function freezeSeries(series: CanonicalSeries): CanonicalSeries {
  Object.freeze(series.points);
  return Object.freeze(series);
}

const EMPTY_SERIES = freezeSeries({ shape: "series", points: [] });
const EMPTY_POINT_LIST = freezeSeries({ shape: "point-list", points: [], latestMissing: false });

function toPoint(date: string, value: number): SeriesPoint | null {
  const timestamp = parsePeriod(date);
  if (timestamp === null || !Number.isFinite(value)) return null;
  return Object.freeze({ date, timestamp, value });
}

/**
 * Dense series arrive oldest first; reversing is the whole transformation.
 * Providers validate dates before they get here, so no observation is
 * dropped.
 */
function normalizeSeries(observations: readonly SeriesObservation[]): CanonicalSeries {
  const points: SeriesPoint[] = [];
  for (let index = observations.length - 1; index >= 0; index -= 1) {
    const observation = observations[index];
    if (!observation) continue;
    const point = toPoint(observation.date, observation.value);
    if (point) points.push(point);
  }

  return freezeSeries({ shape: "series", points });
}

/**
 * Point lists are keyed by date: the first record seen for a period wins,
 * records are ordered most recent first, and null values are excluded from
 * the points while the null-ness of the most recent record is preserved.
 */
function normalizePointList(records: readonly PointRecord[]): CanonicalSeries {
  const byTimestamp = new Map<number, PointRecord & { timestamp: number }>();
  for (const record of records) {
    const timestamp = parsePeriod(record.date);
    if (timestamp === null) continue;
    if (byTimestamp.has(timestamp)) continue;
    byTimestamp.set(timestamp, { ...record, timestamp });
  }

  const ordered = [...byTimestamp.values()].sort((left, right) => right.timestamp - left.timestamp);
  const latest = ordered[0];
  const points = ordered.flatMap((record) => {
    if (record.value === null) return [];
    const point = toPoint(record.date, record.value);
    return point ? [point] : [];
  });

  if (points.length === 0) return EMPTY_POINT_LIST;

  return freezeSeries({
    shape: "point-list",
    points,
    latestMissing: latest?.value === null,
  });
}

/**
 * Converts either provider's raw payload into the canonical series for the
 * given provider kind. A missing payload, or one shaped for the other
 * provider, yields the empty series of the requested shape.
 */
export function normalize(raw: RawFetchResult | null, providerKind: ProviderKind): CanonicalSeries {
  if (providerKind === "series-api") {
    if (!raw || raw.kind !== "series-api") return EMPTY_SERIES;
    return normalizeSeries(raw.observations);
  }

  if (!raw || raw.kind !== "point-list-api") return EMPTY_POINT_LIST;
  return normalizePointList(raw.records);
}
