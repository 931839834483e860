import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { JsonSnapshotStore } from "../store";
import type { Snapshot } from "../types";

describe("JsonSnapshotStore", () => {
  let dir: string;
  const logger = { warn: vi.fn() };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "storage-price-watch-"));
    logger.warn.mockReset();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    const store = new JsonSnapshotStore(path.join(dir, "data.json"), logger);

    await expect(store.load()).resolves.toEqual({ lastUpdated: null, competitors: [] });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("starts empty when the file is not JSON", async () => {
    const filePath = path.join(dir, "data.json");
    await writeFile(filePath, "{ not json", "utf8");

    await expect(new JsonSnapshotStore(filePath, logger).load()).resolves.toEqual({ lastUpdated: null, competitors: [] });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("starts empty when the file has the wrong shape", async () => {
    const filePath = path.join(dir, "data.json");
    await writeFile(filePath, JSON.stringify({ lastUpdated: null, competitors: "none" }), "utf8");

    await expect(new JsonSnapshotStore(filePath, logger).load()).resolves.toEqual({ lastUpdated: null, competitors: [] });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("fills in missing pricing keys and keeps extra fields", async () => {
    const filePath = path.join(dir, "data.json");
    await writeFile(
      filePath,
      JSON.stringify({
        lastUpdated: "2026-03-04 06:00 UTC",
        competitors: [{ name: "Montgomery Self Storage", phone: "555-0101", pricing: { "5x10": 65 } }, { name: "No Pricing" }],
      }),
      "utf8",
    );

    const snapshot = await new JsonSnapshotStore(filePath, logger).load();

    expect(Object.keys(snapshot.competitors[0])).toEqual(["name", "phone", "pricing"]);
    expect(snapshot).toEqual({
      lastUpdated: "2026-03-04 06:00 UTC",
      competitors: [
        {
          name: "Montgomery Self Storage",
          phone: "555-0101",
          pricing: { "5x10": 65, "10x10": null, "10x15": null, "10x20": null, "10x30": null },
        },
        {
          name: "No Pricing",
          pricing: { "5x10": null, "10x10": null, "10x15": null, "10x20": null, "10x30": null },
        },
      ],
    });
  });

  it("keeps every competitor when one stored price is malformed", async () => {
    const filePath = path.join(dir, "data.json");
    await writeFile(
      filePath,
      JSON.stringify({
        lastUpdated: "2026-03-04 06:00 UTC",
        competitors: [
          { name: "A", address: "1 Test Rd", pricing: { "5x10": 41.5, "10x10": "55", "10x20": 90 } },
          { name: "B", pricing: { "5x10": 60 } },
        ],
      }),
      "utf8",
    );

    const snapshot = await new JsonSnapshotStore(filePath, logger).load();

    expect(snapshot.competitors).toEqual([
      {
        name: "A",
        address: "1 Test Rd",
        pricing: { "5x10": null, "10x10": null, "10x15": null, "10x20": 90, "10x30": null },
      },
      {
        name: "B",
        pricing: { "5x10": 60, "10x10": null, "10x15": null, "10x20": null, "10x30": null },
      },
    ]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("removes the temp file when the write fails", async () => {
    const target = path.join(dir, "taken");
    await mkdir(target);
    const store = new JsonSnapshotStore(target, logger);

    await expect(store.save({ lastUpdated: null, competitors: [] })).rejects.toThrow();
    expect(await readdir(dir)).toEqual(["taken"]);
  });

  it("writes pretty JSON into a new directory without leaving temp files", async () => {
    const filePath = path.join(dir, "nested", "data.json");
    const store = new JsonSnapshotStore(filePath, logger);
    const snapshot: Snapshot = {
      lastUpdated: "2026-03-05 07:04 UTC",
      competitors: [
        {
          name: "Lockaway Storage",
          address: "100 Test Rd",
          pricing: { "5x10": 55, "10x10": null, "10x15": 89, "10x20": 120, "10x30": null },
        },
      ],
    };

    await store.save(snapshot);

    expect(await readdir(path.join(dir, "nested"))).toEqual(["data.json"]);
    expect(await readFile(filePath, "utf8")).toBe(`${JSON.stringify(snapshot, null, 2)}\n`);
    await expect(store.load()).resolves.toEqual(snapshot);
  });
});
