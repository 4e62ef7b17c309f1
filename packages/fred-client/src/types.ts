import { z } from "zod";
import { parsePeriod } from "@econ/indicator-core";

/**
 * FRED encodes a missing observation as the string `"."`; every other value
 * is a decimal string.
 */
export const FRED_MISSING_VALUE = ".";

/**
 * Impossible calendar dates such as `2024-02-30` fail validation, which makes
 * the whole payload malformed.
 */
export const FredRawObservationSchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .refine((date) => parsePeriod(date) !== null, { message: "Invalid calendar date" }),
  value: z.string(),
});
export type FredRawObservation = z.infer<typeof FredRawObservationSchema>;

/**
 * Subset of `GET /fred/series/observations?file_type=json` that we read.
 */
export const FredObservationsResponseSchema = z.object({
  units: z.string().optional(),
  frequency: z.string().optional(),
  observations: z.array(FredRawObservationSchema),
});
export type FredObservationsResponse = z.infer<typeof FredObservationsResponseSchema>;

export const FredObservationsRequestSchema = z.object({
  seriesId: z.string().min(1),
  observationStart: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  observationEnd: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
});
export type FredObservationsRequest = z.infer<typeof FredObservationsRequestSchema>;

export interface FredObservation {
  date: string;
  value: number;
}
