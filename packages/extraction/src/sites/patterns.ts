import { parsePriceAmount } from "../price";
import type { RawUnitObservation, SiteId } from "../types";

export type PatternOrder = "dimension-first" | "price-first";

export const DEFAULT_PATTERN_ORDER: readonly PatternOrder[] = ["dimension-first", "price-first"];

export const DEFAULT_MAX_GAP = 1500;

// Feet markers seen after unit dimensions: raw or entity-encoded apostrophes, "ft", "feet".
const FOOT_MARK = String.raw`(?:'|&#39;|&#x27;|&apos;|ft\.?|feet)`;

export const DIMENSION_SOURCE = String.raw`\b(\d+)\s*${FOOT_MARK}?\s*x\s*(\d+)\s*${FOOT_MARK}?`;

export const DOLLAR_PRICE_SOURCE = String.raw`\$(\d+(?:\.\d{2})?)`;

export const PRICEBOOK_ATTRIBUTE_SOURCE = String.raw`data-pricebook-price="([\d.]+)"`;

export function compile(source: string): RegExp {
  return new RegExp(source, "gi");
}

export function toObservation(siteId: SiteId, width: string, depth: string, rawPrice: string): RawUnitObservation | null {
  const price = parsePriceAmount(rawPrice);
  if (price === null) {
    return null;
  }

  return {
    siteId,
    width: Number.parseInt(width, 10),
    depth: Number.parseInt(depth, 10),
    price,
  };
}

export function collectObservations(
  html: string,
  pattern: RegExp,
  read: (match: RegExpMatchArray) => RawUnitObservation | null,
): RawUnitObservation[] {
  const observations: RawUnitObservation[] = [];
  for (const match of html.matchAll(pattern)) {
    const observation = read(match);
    if (observation) {
      observations.push(observation);
    }
  }
  return observations;
}
