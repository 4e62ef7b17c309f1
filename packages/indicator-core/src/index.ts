/**
 * `@econ/indicator-core` holds the pure part of the indicator pipeline:
 * contracts, normalization, metric derivation and change classification. It
 * performs no I/O so every step can be tested on hand-built series.
 */
export * from "./contracts";
export * from "./logger";
export * from "./periods";
export * from "./normalizer";
export * from "./metrics";
export * from "./change";
