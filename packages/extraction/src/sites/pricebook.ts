import type { RawUnitObservation, SiteId } from "../types";

import {
  collectObservations,
  compile,
  DEFAULT_MAX_GAP,
  DEFAULT_PATTERN_ORDER,
  DIMENSION_SOURCE,
  PRICEBOOK_ATTRIBUTE_SOURCE,
  toObservation,
  type PatternOrder,
} from "./patterns";
import type { DiagnosticSink, ExtractorOptions, SiteExtractor } from "./types";

/**
 * Chain sites that embed the monthly rate in a `data-pricebook-price` attribute
 * on the price element, with the unit dimensions in a sibling element.
 *
 * Attempts, most specific first:
 *   1. dimension text, then the attribute (no `$` in between)
 *   2. the attribute, then the closing `>` of its tag, then dimension text
 *   3. all attributes and all dimensions scanned separately and paired by
 *      document order, only when both counts agree
 * The order of 1 and 2 follows `options.order`.
 */
export class PricebookExtractor implements SiteExtractor {
  readonly siteId: SiteId;
  private readonly order: readonly PatternOrder[];
  private readonly dimensionFirst: RegExp;
  private readonly priceFirst: RegExp;
  private readonly attribute = compile(PRICEBOOK_ATTRIBUTE_SOURCE);
  private readonly dimension = compile(DIMENSION_SOURCE);

  constructor(options: ExtractorOptions) {
    this.siteId = options.siteId;
    this.order = options.order ?? DEFAULT_PATTERN_ORDER;
    const gap = options.maxGap ?? DEFAULT_MAX_GAP;

    this.dimensionFirst = compile(`${DIMENSION_SOURCE}[^$]{0,${gap}}?${PRICEBOOK_ATTRIBUTE_SOURCE}`);
    this.priceFirst = compile(`${PRICEBOOK_ATTRIBUTE_SOURCE}[^>]*>[\\s\\S]{0,${gap}}?${DIMENSION_SOURCE}`);
  }

  extract(html: string, diagnostics?: DiagnosticSink): RawUnitObservation[] {
    for (const order of this.order) {
      const observations =
        order === "dimension-first"
          ? collectObservations(html, this.dimensionFirst, (match) =>
              toObservation(this.siteId, match[1], match[2], match[3]),
            )
          : collectObservations(html, this.priceFirst, (match) =>
              toObservation(this.siteId, match[2], match[3], match[1]),
            );

      if (observations.length > 0) {
        diagnostics?.(`${observations.length} ${order} matches`);
        return observations;
      }
    }

    return this.pairByDocumentOrder(html, diagnostics);
  }

  // Equal counts do not guarantee correct pairs: a stray dimension token such as
  // an image size in the markup, offset by a missing one, shifts every pair after it.
  private pairByDocumentOrder(html: string, diagnostics?: DiagnosticSink): RawUnitObservation[] {
    const prices = [...html.matchAll(this.attribute)].map((match) => match[1]);
    const dimensions = [...html.matchAll(this.dimension)].map((match) => [match[1], match[2]] as const);

    if (prices.length === 0 || prices.length !== dimensions.length) {
      diagnostics?.(`Found ${prices.length} prices, ${dimensions.length} dimensions (no paired matches)`);
      return [];
    }

    const observations: RawUnitObservation[] = [];
    prices.forEach((price, index) => {
      const [width, depth] = dimensions[index];
      const observation = toObservation(this.siteId, width, depth, price);
      if (observation) {
        observations.push(observation);
      }
    });

    diagnostics?.(`${observations.length} matches paired by document order`);
    return observations;
  }
}
