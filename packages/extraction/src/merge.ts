import {
  CANONICAL_SIZES,
  emptyPricingTable,
  type CompetitorConfig,
  type CompetitorRecord,
  type ExtractionOutcome,
  type PriceChange,
  type PricingTable,
  type Snapshot,
} from "./types";

type MergeInput = {
  previous: Snapshot;
  competitors: CompetitorConfig[];
  outcomes: Map<string, ExtractionOutcome>;
  now: Date;
};

export function mergeSnapshot(input: MergeInput): { snapshot: Snapshot; changes: PriceChange[] } {
  const existing = new Map<string, CompetitorRecord>();
  for (const record of input.previous.competitors) {
    existing.set(record.name, record);
  }

  const changes: PriceChange[] = [];
  const competitors = input.competitors.map((config): CompetitorRecord => {
    const previousRecord = existing.get(config.name);
    const oldPricing = toPricingTable(previousRecord?.pricing);
    const outcome = input.outcomes.get(config.name);

    // Competitors without a source or strategy always carry their stored pricing.
    const scraped = Boolean(config.url && config.strategy);
    let pricing = oldPricing;
    if (scraped && outcome?.status === "success") {
      pricing = { ...outcome.pricing };
      changes.push(...diffPricing(config.name, oldPricing, pricing));
    }

    if (previousRecord) {
      return { ...previousRecord, pricing };
    }

    return { name: config.name, ...config.metadata, pricing };
  });

  return {
    snapshot: {
      lastUpdated: formatTimestamp(input.now),
      competitors,
    },
    changes,
  };
}

export function diffPricing(competitor: string, oldPricing: PricingTable, newPricing: PricingTable): PriceChange[] {
  return CANONICAL_SIZES.filter((size) => oldPricing[size] !== newPricing[size]).map((size) => ({
    competitor,
    size,
    oldPrice: oldPricing[size],
    newPrice: newPricing[size],
  }));
}

export function toPricingTable(value: Record<string, unknown> | undefined): PricingTable {
  const pricing = emptyPricingTable();
  if (!value) {
    return pricing;
  }

  for (const size of CANONICAL_SIZES) {
    const price = value[size];
    pricing[size] = typeof price === "number" && Number.isInteger(price) && price >= 0 ? price : null;
  }
  return pricing;
}

export function describeChange(change: PriceChange): string {
  return `${change.size}: ${change.oldPrice ?? "null"} → ${change.newPrice ?? "null"}`;
}

export function summarizeChange(change: PriceChange): string {
  return `${change.competitor} ${describeChange(change)}`;
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`
  );
}
