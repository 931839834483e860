import { loadCompetitorList, loadRunConfig, PricingRunService } from "@storage-pricing/extraction";

export async function createService(): Promise<PricingRunService> {
  const config = loadRunConfig();
  const competitors = await loadCompetitorList(config.competitorsPath);
  return new PricingRunService(competitors, { config });
}
