/**
 * `@econ/series-cache` memoizes provider fetches for a fixed time-to-live. It
 * takes the fetch as a parameter and knows nothing about any provider.
 */
export * from "./ttl-cache";
export * from "./keys";
