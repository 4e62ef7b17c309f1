import { z } from "zod";
import {
  IndicatorDescriptorSchema,
  type IndicatorDescriptor,
  type IndicatorName,
} from "@econ/indicator-core";
import defaultCatalogJson from "../config/indicators.json";

const IndicatorCatalogSchema = z.array(IndicatorDescriptorSchema).superRefine((entries, ctx) => {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    const key = `${entry.country}:${entry.indicator}`;
    if (seen.has(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate catalog entry for ${entry.country} ${entry.indicator}`,
        path: [index],
      });
    }
    seen.add(key);
  });
});

function freezeDescriptor(descriptor: IndicatorDescriptor): IndicatorDescriptor {
  Object.freeze(descriptor.source);
  return Object.freeze(descriptor);
}

/**
 * Read-only mapping from (country, indicator) to its descriptor. Entries keep
 * the order of the source document, which is also the display order.
 */
export class IndicatorCatalog {
  private readonly entries: readonly IndicatorDescriptor[];
  private readonly byKey: ReadonlyMap<string, IndicatorDescriptor>;

  constructor(entries: readonly IndicatorDescriptor[]) {
    this.entries = Object.freeze(entries.map(freezeDescriptor));
    this.byKey = new Map(this.entries.map((entry) => [`${entry.country}:${entry.indicator}`, entry]));
  }

  /**
   * Validates an untrusted document, typically the parsed JSON config.
   */
  static parse(input: unknown): IndicatorCatalog {
    return new IndicatorCatalog(IndicatorCatalogSchema.parse(input));
  }

  get(country: string, indicator: IndicatorName): IndicatorDescriptor | undefined {
    return this.byKey.get(`${country}:${indicator}`);
  }

  all(): readonly IndicatorDescriptor[] {
    return this.entries;
  }

  countries(): string[] {
    return [...new Set(this.entries.map((entry) => entry.country))];
  }

  forCountry(country: string): IndicatorDescriptor[] {
    return this.entries.filter((entry) => entry.country === country);
  }
}

let defaultCatalog: IndicatorCatalog | null = null;

/**
 * Catalog bundled with the engine, parsed once per process.
 */
export function getDefaultCatalog(): IndicatorCatalog {
  if (defaultCatalog) {
    return defaultCatalog;
  }
  defaultCatalog = IndicatorCatalog.parse(defaultCatalogJson);
  return defaultCatalog;
}
