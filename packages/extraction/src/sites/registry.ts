import type { SiteId } from "../types";

import { PricebookExtractor } from "./pricebook";
import { TextPriceExtractor } from "./text-price";
import type { SiteExtractor } from "./types";

const SITE_EXTRACTORS: Record<SiteId, SiteExtractor> = {
  public_storage: new PricebookExtractor({ siteId: "public_storage" }),
  lockaway: new TextPriceExtractor({ siteId: "lockaway" }),
  honea_egypt: new TextPriceExtractor({ siteId: "honea_egypt" }),
  montgomery: new TextPriceExtractor({ siteId: "montgomery" }),
  woodlands_sao: new TextPriceExtractor({ siteId: "woodlands_sao" }),
};

export function getSiteExtractor(siteId: SiteId): SiteExtractor {
  return SITE_EXTRACTORS[siteId];
}
