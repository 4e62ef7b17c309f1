import type { IndicatorName } from "@econ/indicator-core";
import type { ComputeOptions, IndicatorEngine, IndicatorSnapshot } from "./engine";

export interface PolicyRateRow {
  snapshot: IndicatorSnapshot;
  changeBps?: number;
  yoyChangeBps?: number;
}

const BPS_PER_PERCENTAGE_POINT = 100;

/**
 * Snapshot of one indicator for each listed country that configures it, in
 * the order the countries were given.
 */
export async function compareIndicator(
  engine: IndicatorEngine,
  indicator: IndicatorName,
  countries: readonly string[],
  options: ComputeOptions = {},
): Promise<IndicatorSnapshot[]> {
  return engine.computeBatch(
    countries.map((country) => ({ country, indicator })),
    options,
  );
}

export function toBasisPoints(change: number | undefined): number | undefined {
  return change === undefined ? undefined : change * BPS_PER_PERCENTAGE_POINT;
}

export async function comparePolicyRates(
  engine: IndicatorEngine,
  countries: readonly string[],
  options: ComputeOptions = {},
): Promise<PolicyRateRow[]> {
  const snapshots = await compareIndicator(engine, "Interest Rate", countries, options);
  return snapshots.map((snapshot) => {
    const row: PolicyRateRow = { snapshot };
    const changeBps = toBasisPoints(snapshot.metrics?.momChange);
    const yoyChangeBps = toBasisPoints(snapshot.metrics?.yoyChange);
    if (changeBps !== undefined) row.changeBps = changeBps;
    if (yoyChangeBps !== undefined) row.yoyChangeBps = yoyChangeBps;
    return row;
  });
}
