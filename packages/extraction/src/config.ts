import { readFile } from "node:fs/promises";

import { z } from "zod";

import { SITE_IDS, type CompetitorConfig } from "./types";

export type RunConfig = {
  timeoutMs: number;
  dataPath: string;
  competitorsPath: string;
  discordWebhookUrl?: string;
};

const COMPETITOR_SCHEMA = z.object({
  name: z.string().min(1),
  url: z.string().url().nullable().optional().default(null),
  strategy: z.enum(SITE_IDS).nullable().optional().default(null),
  metadata: z
    .record(z.string(), z.unknown())
    .optional()
    .default({})
    .refine((metadata) => !("name" in metadata) && !("pricing" in metadata), {
      message: "metadata may not override name or pricing",
    }),
});

const COMPETITOR_LIST_SCHEMA = z
  .array(COMPETITOR_SCHEMA)
  .refine((list) => new Set(list.map((entry) => entry.name)).size === list.length, {
    message: "competitor names must be unique",
  });

export function loadRunConfig(env: NodeJS.ProcessEnv = process.env): RunConfig {
  return {
    timeoutMs: parseEnvInt(env.SCRAPE_TIMEOUT_MS, 30000, 1000, 120000),
    dataPath: env.DATA_PATH || "data/data.json",
    competitorsPath: env.COMPETITORS_PATH || "config/competitors.json",
    discordWebhookUrl: env.DISCORD_WEBHOOK_URL || undefined,
  };
}

export function parseCompetitorList(raw: unknown): CompetitorConfig[] {
  return COMPETITOR_LIST_SCHEMA.parse(raw);
}

export async function loadCompetitorList(filePath: string): Promise<CompetitorConfig[]> {
  const contents = await readFile(filePath, "utf8");
  return parseCompetitorList(JSON.parse(contents));
}

export function parseEnvInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = raw ? Number.parseInt(raw, 10) : fallback;
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.min(Math.max(parsed, min), max);
}
