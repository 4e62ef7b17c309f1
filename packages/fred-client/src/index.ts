/**
 * `@econ/fred-client` is the typed integration with the FRED observations
 * endpoint plus the series-api adapter the indicator engine plugs in.
 */
export * from "./types";
export * from "./client";
export * from "./provider";
