import { fetch } from "undici";

import { summarizeChange } from "./merge";
import type { PriceChange } from "./types";

const MAX_LISTED_CHANGES = 25;

export function buildChangeSummaryMessage(changes: PriceChange[], checkedAt: string): { content: string } {
  const listed = changes.slice(0, MAX_LISTED_CHANGES).map((change) => `- ${summarizeChange(change)}`);
  const hidden = changes.length - listed.length;

  return {
    content: [
      `**${changes.length} Competitor Price Change${changes.length === 1 ? "" : "s"} Detected**`,
      ...listed,
      ...(hidden > 0 ? [`...and ${hidden} more`] : []),
      `Checked: ${checkedAt}`,
    ].join("\n"),
  };
}

export async function sendDiscordChangeSummary(input: {
  webhookUrl: string;
  changes: PriceChange[];
  checkedAt: string;
}): Promise<{ status: number; body: string }> {
  const response = await fetch(input.webhookUrl, {
    method: "POST",
    headers: {
      "content-type": "application/json",
    },
    body: JSON.stringify(buildChangeSummaryMessage(input.changes, input.checkedAt)),
  });

  const body = await response.text();
  return {
    status: response.status,
    body,
  };
}
