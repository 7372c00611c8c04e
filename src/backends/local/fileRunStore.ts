import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { StoreFormatError } from "../../core/errors.js";
import type { InMemoryRunStore } from "../../core/runStore.js";
import {
  type PersistedReadOptions,
  fromPersistedStore,
  isRecord,
  toPersistedRun,
} from "../../core/serialization.js";
import type { RunResult } from "../../core/types.js";

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sortKeys(item));
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * JSON file holding every run keyed by target. `append` is a read-modify-write
 * of the whole file and is not serialized across processes; callers sharing
 * one file between concurrent writers must lock around it.
 */
export class FileRunStore {
  private readonly path: string;
  private readonly readOptions: PersistedReadOptions;

  constructor(path: string, readOptions: PersistedReadOptions = {}) {
    this.path = path;
    this.readOptions = readOptions;
  }

  get filePath(): string {
    return this.path;
  }

  async load(): Promise<InMemoryRunStore> {
    return fromPersistedStore(await this.readRaw(), this.readOptions);
  }

  async append(run: RunResult): Promise<void> {
    const raw = await this.readRaw();
    const existing = raw[run.target];
    const runs: unknown[] = [];
    if (Array.isArray(existing)) {
      runs.push(...existing);
    } else if (existing !== undefined) {
      throw new StoreFormatError(`Runs for target "${run.target}" must be an array.`);
    }

    runs.push(toPersistedRun(run));
    raw[run.target] = runs;

    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(sortKeys(raw), null, 4)}\n`, "utf-8");
  }

  private async readRaw(): Promise<Record<string, unknown>> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }

    if (!text.trim()) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new StoreFormatError(
        `Run store ${this.path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (!isRecord(parsed)) {
      throw new StoreFormatError("Run store must be a JSON object keyed by target.");
    }
    return parsed;
  }
}
