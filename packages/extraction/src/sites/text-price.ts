import type { RawUnitObservation, SiteId } from "../types";

import {
  collectObservations,
  compile,
  DEFAULT_MAX_GAP,
  DEFAULT_PATTERN_ORDER,
  DIMENSION_SOURCE,
  DOLLAR_PRICE_SOURCE,
  toObservation,
  type PatternOrder,
} from "./patterns";
import type { DiagnosticSink, ExtractorOptions, SiteExtractor } from "./types";

/**
 * Pages that print prices as plain text, e.g. `5' x 10'` ... `$59.00/mo`.
 * The gap between the two tokens may not contain another `$`.
 */
export class TextPriceExtractor implements SiteExtractor {
  readonly siteId: SiteId;
  private readonly attempts: Array<{ order: PatternOrder; pattern: RegExp }>;

  constructor(options: ExtractorOptions) {
    this.siteId = options.siteId;
    const gap = `[^$]{0,${options.maxGap ?? DEFAULT_MAX_GAP}}?`;

    this.attempts = (options.order ?? DEFAULT_PATTERN_ORDER).map((order) => ({
      order,
      pattern:
        order === "dimension-first"
          ? compile(`${DIMENSION_SOURCE}${gap}${DOLLAR_PRICE_SOURCE}`)
          : compile(`${DOLLAR_PRICE_SOURCE}${gap}${DIMENSION_SOURCE}`),
    }));
  }

  extract(html: string, diagnostics?: DiagnosticSink): RawUnitObservation[] {
    for (const { order, pattern } of this.attempts) {
      const observations = collectObservations(html, pattern, (match) =>
        order === "dimension-first"
          ? toObservation(this.siteId, match[1], match[2], match[3])
          : toObservation(this.siteId, match[2], match[3], match[1]),
      );

      if (observations.length > 0) {
        diagnostics?.(`${observations.length} ${order} matches`);
        return observations;
      }
    }

    diagnostics?.("no dimension/price pairs found");
    return [];
  }
}
