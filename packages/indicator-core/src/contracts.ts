import { z } from "zod";

/**
 * Upstream provider families. The kind decides both which adapter fetches a
 * series and which extraction strategy the metrics calculator applies.
 */
export const ProviderKindSchema = z.enum(["series-api", "point-list-api"]);
export type ProviderKind = z.infer<typeof ProviderKindSchema>;

/**
 * Indicator names shared across countries so comparison views can line up
 * the same indicator for several economies.
 */
export const IndicatorNameSchema = z.enum([
  "CPI",
  "PPI",
  "Interest Rate",
  "Unemployment",
  "GDP Growth",
]);
export type IndicatorName = z.infer<typeof IndicatorNameSchema>;

export const SeriesApiSourceSchema = z.object({
  kind: z.literal("series-api"),
  seriesId: z.string().min(1),
});
export type SeriesApiSource = z.infer<typeof SeriesApiSourceSchema>;

export const PointListApiSourceSchema = z.object({
  kind: z.literal("point-list-api"),
  countryCode: z.string().min(1),
  indicatorCode: z.string().min(1),
});
export type PointListApiSource = z.infer<typeof PointListApiSourceSchema>;

export const IndicatorSourceSchema = z.discriminatedUnion("kind", [
  SeriesApiSourceSchema,
  PointListApiSourceSchema,
]);
export type IndicatorSource = z.infer<typeof IndicatorSourceSchema>;

/**
 * Static catalog entry describing where one (country, indicator) pair comes
 * from and how it is labelled.
 */
export const IndicatorDescriptorSchema = z.object({
  country: z.string().min(1),
  indicator: IndicatorNameSchema,
  label: z.string().min(1),
  source: IndicatorSourceSchema,
});
export type IndicatorDescriptor = z.infer<typeof IndicatorDescriptorSchema>;

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const DateRangeSchema = z.object({
  start: IsoDateSchema,
  end: IsoDateSchema,
});
export type DateRange = z.infer<typeof DateRangeSchema>;

export const SeriesObservationSchema = z.object({
  date: z.string().min(1),
  value: z.number().finite(),
});
export type SeriesObservation = z.infer<typeof SeriesObservationSchema>;

export const PointRecordSchema = z.object({
  date: z.string().min(1),
  value: z.number().finite().nullable(),
});
export type PointRecord = z.infer<typeof PointRecordSchema>;

/**
 * Provider-shaped payload. Series results are ordered oldest first; point
 * lists keep whatever order the provider returned, nulls included.
 */
export const RawFetchResultSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("series-api"),
    observations: z.array(SeriesObservationSchema),
  }),
  z.object({
    kind: z.literal("point-list-api"),
    records: z.array(PointRecordSchema),
  }),
]);
export type RawFetchResult = z.infer<typeof RawFetchResultSchema>;

export interface SeriesPoint {
  readonly date: string;
  readonly timestamp: number;
  readonly value: number;
}

/**
 * Provider-agnostic series, most recent first. The two shapes are kept apart
 * because they carry different sampling guarantees: series-api data is dense
 * and read positionally, point-list data is sparse and read by date.
 */
export type CanonicalSeries =
  | {
      readonly shape: "series";
      readonly points: readonly SeriesPoint[];
    }
  | {
      readonly shape: "point-list";
      readonly points: readonly SeriesPoint[];
      /** The most recent upstream record had no value. */
      readonly latestMissing: boolean;
    };

export const MetricsRecordSchema = z.object({
  asOf: z.string().min(1),
  current: z.number().finite(),
  previous: z.number().finite().optional(),
  yearAgo: z.number().finite().optional(),
  momChange: z.number().finite().optional(),
  momPct: z.number().finite().optional(),
  yoyChange: z.number().finite().optional(),
  yoyPct: z.number().finite().optional(),
});
export type MetricsRecord = z.infer<typeof MetricsRecordSchema>;

export const ChangeDirectionSchema = z.enum(["up", "down", "flat", "unknown"]);
export type ChangeDirection = z.infer<typeof ChangeDirectionSchema>;

export interface ChangeClassification {
  direction: ChangeDirection;
  magnitude?: number;
}

/**
 * Structured logger accepted by adapters and the engine.
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Fetch capability for one provider family. Implementations resolve `null`
 * for every failure mode (missing credential, timeout, bad status, malformed
 * body) so one unavailable indicator never aborts the others.
 */
export interface ProviderAdapter<TSource extends IndicatorSource = IndicatorSource> {
  readonly kind: TSource["kind"];
  fetch(source: TSource, range: DateRange): Promise<RawFetchResult | null>;
}
