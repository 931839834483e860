import type { RawUnitObservation, SiteId } from "../types";

import type { PatternOrder } from "./patterns";

export type DiagnosticSink = (line: string) => void;

/**
 * Scans raw page markup for unit dimension / price co-occurrences.
 * Each competitor site gets its own variant because markup conventions differ.
 * An empty result means "no recognizable pricing", not a failure.
 */
export interface SiteExtractor {
  readonly siteId: SiteId;
  extract(html: string, diagnostics?: DiagnosticSink): RawUnitObservation[];
}

export type ExtractorOptions = {
  siteId: SiteId;
  order?: readonly PatternOrder[];
  maxGap?: number;
};
