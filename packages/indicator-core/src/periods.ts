/**
 * Parses the period labels the supported providers emit into UTC epoch
 * milliseconds at the start of the period:
 *
 * - `2024` (annual)
 * - `2024Q2` (quarterly, World Bank style)
 * - `2024M05` (monthly, World Bank style)
 * - `2024-05` and `2024-05-01`
 *
 * Returns `null` for anything else.
 */
export function parsePeriod(label: string): number | null {
  const value = label.trim();

  const annual = /^(\d{4})$/.exec(value);
  if (annual) {
    return Date.UTC(Number(annual[1]), 0, 1);
  }

  const quarterly = /^(\d{4})Q([1-4])$/.exec(value);
  if (quarterly) {
    return Date.UTC(Number(quarterly[1]), (Number(quarterly[2]) - 1) * 3, 1);
  }

  const monthly = /^(\d{4})(?:M|-)(\d{2})$/.exec(value);
  if (monthly) {
    return toUtc(Number(monthly[1]), Number(monthly[2]), 1);
  }

  const daily = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (daily) {
    return toUtc(Number(daily[1]), Number(daily[2]), Number(daily[3]));
  }

  return null;
}

function toUtc(year: number, month: number, day: number): number | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const timestamp = Date.UTC(year, month - 1, day);
  // Reject rollovers such as 2024-02-31.
  if (new Date(timestamp).getUTCDate() !== day) return null;
  return timestamp;
}

/**
 * Same instant one calendar year earlier. Feb 29 maps to Feb 28.
 */
export function oneYearBefore(timestamp: number): number {
  const date = new Date(timestamp);
  const year = date.getUTCFullYear() - 1;
  const month = date.getUTCMonth();
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return Date.UTC(
    year,
    month,
    Math.min(date.getUTCDate(), lastDay),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
    date.getUTCMilliseconds(),
  );
}
