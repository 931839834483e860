import { loadRunConfig, type RunConfig } from "./config";
import { sendDiscordChangeSummary } from "./discord";
import { fetchPageText } from "./fetch";
import { formatTimestamp, mergeSnapshot, summarizeChange } from "./merge";
import { reducePricing } from "./reduce";
import { getSiteExtractor } from "./sites/registry";
import { JsonSnapshotStore, type SnapshotStore } from "./store";
import { CANONICAL_SIZES, type CompetitorConfig, type ExtractionOutcome, type PriceChange, type RunSummary } from "./types";

type Logger = Pick<Console, "log" | "warn" | "error">;

export type ServiceDependencies = {
  config?: RunConfig;
  store?: SnapshotStore;
  fetcher?: typeof fetchPageText;
  extractorFor?: typeof getSiteExtractor;
  changeNotifier?: typeof sendDiscordChangeSummary;
  logger?: Logger;
  now?: () => Date;
};

export class PricingRunService {
  private config: RunConfig;
  private store: SnapshotStore;
  private fetcher: typeof fetchPageText;
  private extractorFor: typeof getSiteExtractor;
  private changeNotifier: typeof sendDiscordChangeSummary;
  private log: Logger;
  private now: () => Date;

  constructor(
    private readonly competitors: CompetitorConfig[],
    deps: ServiceDependencies = {},
  ) {
    this.config = deps.config ?? loadRunConfig();
    this.log = deps.logger ?? console;
    this.store = deps.store ?? new JsonSnapshotStore(this.config.dataPath, this.log);
    this.fetcher = deps.fetcher ?? fetchPageText;
    this.extractorFor = deps.extractorFor ?? getSiteExtractor;
    this.changeNotifier = deps.changeNotifier ?? sendDiscordChangeSummary;
    this.now = deps.now ?? (() => new Date());
  }

  async runDailyScrape(): Promise<RunSummary> {
    this.log.log(`[scraper] Run started at ${formatTimestamp(this.now())}`);

    const previous = await this.store.load();
    const outcomes = new Map<string, ExtractionOutcome>();

    for (const competitor of this.competitors) {
      outcomes.set(competitor.name, await this.scrapeCompetitor(competitor));
    }

    const { snapshot, changes } = mergeSnapshot({
      previous,
      competitors: this.competitors,
      outcomes,
      now: this.now(),
    });

    await this.store.save(snapshot);
    this.reportChanges(changes);
    await this.notifyChanges(changes, snapshot.lastUpdated ?? formatTimestamp(this.now()));

    return { snapshot, changes, outcomes };
  }

  async scrapeCompetitor(competitor: CompetitorConfig): Promise<ExtractionOutcome> {
    if (!competitor.url || !competitor.strategy) {
      this.log.log(`[scraper] Skipping ${competitor.name} (no online pricing)`);
      return { status: "skipped" };
    }

    this.log.log(`[scraper] Scraping ${competitor.name}...`);

    try {
      const page = await this.fetcher(competitor.url, this.config.timeoutMs);
      if (!page.ok) {
        this.log.warn(`[scraper] Failed to fetch ${competitor.url}: ${page.reason}, keeping previous pricing`);
        return { status: "failed", reason: page.reason };
      }

      const extractor = this.extractorFor(competitor.strategy);
      const observations = extractor.extract(page.text, (line) => this.log.log(`[scraper]   ${line}`));
      const pricing = reducePricing(observations);
      const found = CANONICAL_SIZES.filter((size) => pricing[size] !== null).length;

      this.log.log(`[scraper] ${competitor.name}: ${found} prices found`);
      return { status: "success", pricing, observationCount: observations.length };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log.warn(`[scraper] Scrape of ${competitor.name} failed (${reason}), keeping previous pricing`);
      return { status: "failed", reason: `EXTRACTION_FAILED:${reason}` };
    }
  }

  private reportChanges(changes: PriceChange[]) {
    if (changes.length === 0) {
      this.log.log("[scraper] No price changes detected");
      return;
    }

    this.log.log(`[scraper] ${changes.length} price change(s) detected:`);
    for (const change of changes) {
      this.log.log(`[scraper]   ${summarizeChange(change)}`);
    }
  }

  private async notifyChanges(changes: PriceChange[], checkedAt: string) {
    const webhookUrl = this.config.discordWebhookUrl;
    if (changes.length === 0 || !webhookUrl) {
      return;
    }

    try {
      const response = await this.changeNotifier({ webhookUrl, changes, checkedAt });
      if (response.status >= 300) {
        this.log.warn(`[scraper] Discord webhook responded ${response.status}: ${response.body.slice(0, 200)}`);
      }
    } catch (error) {
      this.log.error("[scraper] Discord notification failed", error);
    }
  }
}
