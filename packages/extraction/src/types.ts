export const CANONICAL_SIZES = ["5x10", "10x10", "10x15", "10x20", "10x30"] as const;

export type CanonicalSize = (typeof CANONICAL_SIZES)[number];

export type PricingTable = Record<CanonicalSize, number | null>;

export const SITE_IDS = ["lockaway", "public_storage", "honea_egypt", "montgomery", "woodlands_sao"] as const;

export type SiteId = (typeof SITE_IDS)[number];

export type RawUnitObservation = {
  siteId: SiteId;
  width: number;
  depth: number;
  price: number;
};

export type CompetitorConfig = {
  name: string;
  url?: string | null;
  strategy?: SiteId | null;
  metadata?: Record<string, unknown>;
};

export type CompetitorRecord = {
  name: string;
  pricing: PricingTable;
  [field: string]: unknown;
};

export type Snapshot = {
  lastUpdated: string | null;
  competitors: CompetitorRecord[];
};

export type ExtractionOutcome =
  | { status: "skipped" }
  | { status: "failed"; reason: string }
  | { status: "success"; pricing: PricingTable; observationCount: number };

export type PriceChange = {
  competitor: string;
  size: CanonicalSize;
  oldPrice: number | null;
  newPrice: number | null;
};

export type FetchResult = { ok: true; text: string } | { ok: false; reason: string };

export type RunSummary = {
  snapshot: Snapshot;
  changes: PriceChange[];
  outcomes: Map<string, ExtractionOutcome>;
};

export function emptyPricingTable(): PricingTable {
  return {
    "5x10": null,
    "10x10": null,
    "10x15": null,
    "10x20": null,
    "10x30": null,
  };
}
