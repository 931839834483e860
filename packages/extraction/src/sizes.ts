import type { CanonicalSize, SiteId } from "./types";

type SizeMap = Readonly<Record<string, CanonicalSize>>;

const IDENTITY: SizeMap = {
  "5x10": "5x10",
  "10x10": "10x10",
  "10x15": "10x15",
  "10x20": "10x20",
  "10x30": "10x30",
};

// Raw "<width>x<depth>" as published by each site. Pairs not listed are untracked.
export const SIZE_MAPS: Readonly<Record<SiteId, SizeMap>> = {
  public_storage: {
    "5x5": "5x10",
    "5x6": "5x10",
    "5x8": "5x10",
    "5x10": "5x10",
    "5x14": "5x10",
    "5x15": "5x10",
    "7x14": "10x10",
    "10x10": "10x10",
    "10x14": "10x10",
    "10x15": "10x15",
    "10x17": "10x15",
    "10x19": "10x20",
    "10x20": "10x20",
    "10x30": "10x30",
    "10x40": "10x30",
    "12x28": "10x30",
  },
  lockaway: {
    ...IDENTITY,
    "8x8": "5x10",
    "8x12": "10x10",
  },
  woodlands_sao: {
    ...IDENTITY,
    "12x10": "10x10",
    "12x30": "10x30",
  },
  honea_egypt: IDENTITY,
  montgomery: IDENTITY,
};

export function normalizeSize(siteId: SiteId, width: number, depth: number): CanonicalSize | null {
  return SIZE_MAPS[siteId][`${width}x${depth}`] ?? null;
}
