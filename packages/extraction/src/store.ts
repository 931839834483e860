import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { toPricingTable } from "./merge";
import type { Snapshot } from "./types";

// The record half keeps the stored field order; the object half validates the known fields.
const COMPETITOR_RECORD_SCHEMA = z.record(z.string(), z.unknown()).and(
  z.object({
    name: z.string().min(1),
    // Individual prices are not checked here; toPricingTable nulls the unusable ones.
    pricing: z.record(z.string(), z.unknown()).optional(),
  }),
);

const SNAPSHOT_SCHEMA = z.object({
  lastUpdated: z.string().nullable().optional().default(null),
  competitors: z.array(COMPETITOR_RECORD_SCHEMA).optional().default([]),
});

type Logger = Pick<Console, "warn">;

export interface SnapshotStore {
  load(): Promise<Snapshot>;
  save(snapshot: Snapshot): Promise<void>;
}

export function emptySnapshot(): Snapshot {
  return { lastUpdated: null, competitors: [] };
}

export function parseSnapshot(raw: unknown): Snapshot | null {
  const parsed = SNAPSHOT_SCHEMA.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  return {
    lastUpdated: parsed.data.lastUpdated,
    competitors: parsed.data.competitors.map((record) => ({
      ...record,
      pricing: toPricingTable(record.pricing),
    })),
  };
}

export class JsonSnapshotStore implements SnapshotStore {
  constructor(
    readonly filePath: string,
    private readonly log: Logger = console,
  ) {}

  async load(): Promise<Snapshot> {
    let contents: string;
    try {
      contents = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return emptySnapshot();
      }
      this.log.warn(`[store] Could not read ${this.filePath}, starting empty`, error);
      return emptySnapshot();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      this.log.warn(`[store] ${this.filePath} is not valid JSON, starting empty`, error);
      return emptySnapshot();
    }

    const snapshot = parseSnapshot(raw);
    if (!snapshot) {
      this.log.warn(`[store] ${this.filePath} does not match the snapshot shape, starting empty`);
      return emptySnapshot();
    }
    return snapshot;
  }

  async save(snapshot: Snapshot): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf8");
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
