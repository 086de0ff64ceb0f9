import type { AppConfig } from "@/lib/config";
import { createDelivery, type ReportDelivery } from "@/lib/delivery";
import { createRenderer } from "@/lib/report";
import { scrapeGmpSummary, type ScrapeOptions } from "@/lib/scraper";
import type { GmpSummary } from "@/lib/types";

export interface GmpSummaryDeps {
  scrape?: (options: ScrapeOptions) => Promise<GmpSummary>;
  delivery?: ReportDelivery;
}

/**
 * One scheduled run: scrape → render → deliver, strictly in sequence.
 * Blocked and empty pages still produce a (placeholder) report; fetch and
 * delivery failures propagate to the caller.
 */
export async function runGmpSummary(
  config: AppConfig,
  deps: GmpSummaryDeps = {}
): Promise<GmpSummary> {
  const scrape = deps.scrape ?? scrapeGmpSummary;
  const delivery = deps.delivery ?? createDelivery(config);

  console.log("Scraping site...");
  const summary = await scrape({ url: config.sourceUrl });
  console.log(`runGmpSummary: scrape finished with status "${summary.status}"`);

  const rendered = createRenderer(config.format).render(summary);
  await delivery.deliver({ subject: config.subject, ...rendered });

  return summary;
}
