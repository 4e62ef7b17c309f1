import { z } from "zod";

/**
 * One row of the World Bank v2 indicator API. Only `date` and `value` are
 * consumed; `value` is `null` for years the bank has not published.
 */
export const WorldBankRecordSchema = z.object({
  date: z.string().min(1),
  value: z.number().finite().nullable(),
  countryiso3code: z.string().optional(),
  indicator: z
    .object({
      id: z.string(),
      value: z.string(),
    })
    .optional(),
});
export type WorldBankRecord = z.infer<typeof WorldBankRecordSchema>;

/**
 * The API answers `[metadata, records]` on success and `[{ message: [...] }]`
 * on error, both with status 200 in some cases, so only the outer array is
 * fixed here.
 */
export const WorldBankEnvelopeSchema = z.array(z.unknown());

export const WorldBankRecordListSchema = z.array(WorldBankRecordSchema);

export const WorldBankIndicatorRequestSchema = z.object({
  countryCode: z.string().min(1),
  indicatorCode: z.string().min(1),
  startYear: z.number().int(),
  endYear: z.number().int(),
  perPage: z.number().int().positive().optional(),
});
export type WorldBankIndicatorRequest = z.infer<typeof WorldBankIndicatorRequestSchema>;

/**
 * Calendar years requested from the indicator endpoint, rendered as
 * `date=<startYear>:<endYear>`. Fixed per deployment, independent of the
 * engine's history window.
 */
export const WorldBankDateWindowSchema = z
  .object({
    startYear: z.number().int(),
    endYear: z.number().int(),
  })
  .refine((window) => window.startYear <= window.endYear, {
    message: "startYear must not be after endYear",
  });
export type WorldBankDateWindow = z.infer<typeof WorldBankDateWindowSchema>;

export const DEFAULT_WORLD_BANK_DATE_WINDOW: WorldBankDateWindow = Object.freeze({
  startYear: 2020,
  endYear: 2024,
});

/**
 * Reads a `2020:2024` style label. Returns `null` for anything else.
 */
export function parseWorldBankDateWindow(label: string): WorldBankDateWindow | null {
  const match = /^(\d{4}):(\d{4})$/.exec(label.trim());
  if (!match) return null;
  const parsed = WorldBankDateWindowSchema.safeParse({
    startYear: Number(match[1]),
    endYear: Number(match[2]),
  });
  return parsed.success ? parsed.data : null;
}
