import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ChokidarWatchSource, type WatchEvent } from "../../src/config/watch-source.js";

describe("ChokidarWatchSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tram-chokidar-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports writes to a watched file as modify events", async () => {
    const file = join(dir, "tram.json");
    await writeFile(file, "{}");
    const events: WatchEvent[] = [];

    const source = new ChokidarWatchSource({ stabilityThreshold: 0 });
    const subscription = await source.subscribe([file], (event) => events.push(event));

    try {
      await writeFile(file, JSON.stringify({ color: false }));
      await vi.waitFor(
        () => expect(events).toContainEqual({ kind: "modify", path: file }),
        { timeout: 5000, interval: 50 }
      );
    } finally {
      await subscription.close();
    }
  });

  it("stops reporting after close", async () => {
    const file = join(dir, "tram.yaml");
    await writeFile(file, "color: true\n");
    const events: WatchEvent[] = [];

    const source = new ChokidarWatchSource({ stabilityThreshold: 0 });
    const subscription = await source.subscribe([file], (event) => events.push(event));
    await subscription.close();

    await writeFile(file, "color: false\n");
    await new Promise((resolve) => setTimeout(resolve, 200));

    expect(events).toEqual([]);
  });
});
