import type { CanonicalSeries, MetricsRecord, SeriesPoint } from "./contracts";
import { oneYearBefore } from "./periods";

/**
 * Positions, counted most recent first, of the reference observations for a
 * dense monthly series.
 */
export const PREVIOUS_PERIOD_INDEX = 1;
export const YEAR_AGO_INDEX = 11;

interface ReferencePoints {
  current: SeriesPoint;
  previous?: SeriesPoint;
  yearAgo?: SeriesPoint;
}

/**
 * Series-api strategy: references are read by position because the upstream
 * series is dense.
 */
function positionalReferences(points: readonly SeriesPoint[]): ReferencePoints | null {
  const current = points[0];
  if (!current) return null;
  return {
    current,
    previous: points[PREVIOUS_PERIOD_INDEX],
    yearAgo: points.length > YEAR_AGO_INDEX ? points[YEAR_AGO_INDEX] : undefined,
  };
}

/**
 * Point-list strategy: nulls are already gone, so `previous` is the next
 * recorded value and `yearAgo` the first recorded value dated at least one
 * calendar year before `current`, wherever it sits in the list.
 */
function datedReferences(points: readonly SeriesPoint[]): ReferencePoints | null {
  const current = points[0];
  if (!current) return null;
  const cutoff = oneYearBefore(current.timestamp);
  return {
    current,
    previous: points[1],
    yearAgo: points.find((point) => point.timestamp <= cutoff),
  };
}

/**
 * Percent change against a reference. A zero reference yields exactly `0`
 * so the record never carries an infinite or undefined percentage.
 */
export function percentChange(current: number, reference: number): number {
  if (reference === 0) return 0;
  return ((current - reference) / reference) * 100;
}

/**
 * Derives current, previous-period and year-ago values and their deltas.
 *
 * Returns `null` when there is nothing to compare: an empty series, or a
 * point list whose most recent record carried no value. No rounding is
 * applied.
 */
export function computeMetrics(series: CanonicalSeries): MetricsRecord | null {
  const references =
    series.shape === "series"
      ? positionalReferences(series.points)
      : series.latestMissing
        ? null
        : datedReferences(series.points);

  if (!references) return null;

  const { current, previous, yearAgo } = references;
  const record: MetricsRecord = {
    asOf: current.date,
    current: current.value,
  };

  if (previous) {
    record.previous = previous.value;
    record.momChange = current.value - previous.value;
    record.momPct = percentChange(current.value, previous.value);
  }

  if (yearAgo) {
    record.yearAgo = yearAgo.value;
    record.yoyChange = current.value - yearAgo.value;
    record.yoyPct = percentChange(current.value, yearAgo.value);
  }

  return record;
}
