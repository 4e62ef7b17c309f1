/**
 * `@econ/worldbank-client` wraps the public World Bank v2 indicator API and
 * exposes it as the point-list adapter of the indicator engine.
 */
export * from "./types";
export * from "./client";
export * from "./provider";
