import { roundHalfEven } from "./price";
import { normalizeSize } from "./sizes";
import { CANONICAL_SIZES, emptyPricingTable, type PricingTable, type RawUnitObservation } from "./types";

/**
 * Collapses observations into one price per canonical size: the lowest
 * published price wins, rounded to whole dollars with ties to even. Observations whose
 * dimensions the site's size map does not track are dropped.
 */
export function reducePricing(observations: RawUnitObservation[]): PricingTable {
  const pricing = emptyPricingTable();

  for (const observation of observations) {
    const size = normalizeSize(observation.siteId, observation.width, observation.depth);
    if (!size) {
      continue;
    }

    const current = pricing[size];
    if (current === null || observation.price < current) {
      pricing[size] = observation.price;
    }
  }

  for (const size of CANONICAL_SIZES) {
    const price = pricing[size];
    if (price !== null) {
      pricing[size] = roundHalfEven(price);
    }
  }

  return pricing;
}
