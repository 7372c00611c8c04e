import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { FileRunStore, openLocalRunStore } from "../src/backends/local/index.js";
import { StoreFormatError } from "../src/core/errors.js";
import { hop, run } from "./support/fixtures.js";

const tempDirs: string[] = [];

afterEach(async () => {
  while (tempDirs.length > 0) {
    const path = tempDirs.pop();
    if (!path) {
      continue;
    }
    await rm(path, { recursive: true, force: true });
  }
});

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "hopscope-"));
  tempDirs.push(dir);
  return dir;
}

describe("FileRunStore", () => {
  it("loads an empty store when the file does not exist", async () => {
    const dir = await tempDir();
    const store = new FileRunStore(join(dir, "missing.json"));

    const loaded = await store.load();

    expect(loaded.targets()).toEqual([]);
  });

  it("appends runs and writes sorted, indented JSON", async () => {
    const dir = await tempDir();
    const path = join(dir, "nested", "runs.json");
    const store = new FileRunStore(path);

    await store.append(run("b.example", [hop(1, { addresses: ["10.0.0.1"], samples: [1, 2, 3] })]));
    await store.append(run("a.example", []));
    await store.append(run("b.example", [], { timestamp: "2026-02-03T00:00:00.000Z" }));

    const text = await readFile(path, "utf-8");
    const parsed = JSON.parse(text) as Record<string, unknown>;

    expect(text.startsWith('{\n    "a.example": [\n')).toBe(true);
    expect(Object.keys(parsed)).toEqual(["a.example", "b.example"]);

    const loaded = await store.load();
    expect(loaded.history("b.example").map((entry) => entry.hops.length)).toEqual([1, 0]);
    expect(loaded.history("b.example")[0]?.hops[0]).toEqual(
      hop(1, { addresses: ["10.0.0.1"], samples: [1, 2, 3] }),
    );
  });

  it("leaves previously written run objects untouched", async () => {
    const dir = await tempDir();
    const path = join(dir, "runs.json");
    const legacyRun = {
      cmd: "traceroute a.example",
      data: "No data",
      extra: true,
      timestamp: "2020-01-01 10:00:00",
    };
    await writeFile(path, JSON.stringify({ "a.example": [legacyRun] }), "utf-8");

    await new FileRunStore(path).append(run("a.example", [hop(1, { samples: [5, 5, 5] })]));

    const parsed = JSON.parse(await readFile(path, "utf-8")) as Record<string, unknown[]>;
    expect(parsed["a.example"]?.[0]).toEqual(legacyRun);
    expect(parsed["a.example"]).toHaveLength(2);
  });

  it("rejects a file that is not a JSON object", async () => {
    const dir = await tempDir();
    const path = join(dir, "runs.json");
    await writeFile(path, "[1, 2", "utf-8");

    await expect(new FileRunStore(path).load()).rejects.toBeInstanceOf(StoreFormatError);
  });

  it("fills missing timeouts from the configured probe count", async () => {
    const dir = await tempDir();
    const path = join(dir, "runs.json");
    await writeFile(
      path,
      JSON.stringify({
        "a.example": [{ cmd: "traceroute a.example", data: [{ index: 1, results: [1.0] }] }],
      }),
      "utf-8",
    );

    const loaded = await new FileRunStore(path, { expectedTries: 3 }).load();

    expect(loaded.history("a.example")[0]?.hops[0]?.timeouts).toBe(2);
  });
});

describe("openLocalRunStore", () => {
  it("derives the file name from the target", async () => {
    const dir = await tempDir();

    const store = openLocalRunStore({ target: "example.test", dataDir: dir, env: {} });

    expect(store.filePath).toBe(join(dir, "example.test-output.json"));
  });

  it("prefers a configured store path", () => {
    const store = openLocalRunStore({
      target: "example.test",
      settings: { storePath: "/var/lib/hopscope/runs.json" },
      env: {},
    });

    expect(store.filePath).toBe("/var/lib/hopscope/runs.json");
  });
});
