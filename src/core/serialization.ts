import type { RunStore } from "./interfaces.js";
import { StoreFormatError } from "./errors.js";
import { hasPathData } from "./runAssembler.js";
import { InMemoryRunStore } from "./runStore.js";
import type {
  HopRecord,
  PersistedHop,
  PersistedRun,
  PersistedStore,
  RunResult,
} from "./types.js";

export const NO_DATA_MARKER = "No data";

export interface PersistedReadOptions {
  /** Used to recover timeouts for hop objects written without them. */
  expectedTries?: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Older stores wrote some scalar fields as one-element lists.
function unwrapSingleton(value: unknown): unknown {
  return Array.isArray(value) && value.length === 1 ? value[0] : value;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function finiteNumberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const output: string[] = [];
  for (const item of value) {
    if (typeof item === "string" && !output.includes(item)) {
      output.push(item);
    }
  }
  return output;
}

function numberList(value: unknown): number[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(
    (item): item is number => typeof item === "number" && Number.isFinite(item),
  );
}

export function toPersistedHop(hop: HopRecord): PersistedHop {
  const persisted: PersistedHop = {
    index: hop.index,
    results: [...hop.samples],
    timeouts: hop.timeouts,
  };
  if (hop.addresses.length > 0) {
    persisted.addresses = [...hop.addresses];
  }
  if (hop.hostname !== undefined) {
    persisted.hostname = hop.hostname;
  }
  return persisted;
}

export function toPersistedRun(run: RunResult): PersistedRun {
  return {
    cmd: run.command,
    description: run.description,
    timestamp: run.timestamp,
    time_taken_in_secs: run.durationSeconds,
    data: hasPathData(run) ? run.hops.map((hop) => toPersistedHop(hop)) : NO_DATA_MARKER,
  };
}

export function toPersistedStore(store: RunStore): PersistedStore {
  const output: PersistedStore = {};
  for (const target of store.targets()) {
    output[target] = store.history(target).map((run) => toPersistedRun(run));
  }
  return output;
}

export function fromPersistedHop(
  value: unknown,
  position: number,
  options: PersistedReadOptions = {},
): HopRecord {
  const raw: Record<string, unknown> = isRecord(value) ? value : {};
  const samples = numberList(raw.results);
  const addresses = stringList(raw.addresses ?? raw.ip_address);

  const recordedTimeouts = raw.timeouts;
  let timeouts = 0;
  if (
    typeof recordedTimeouts === "number" &&
    Number.isInteger(recordedTimeouts) &&
    recordedTimeouts >= 0
  ) {
    timeouts = recordedTimeouts;
  } else if (options.expectedTries !== undefined) {
    timeouts = Math.max(0, options.expectedTries - samples.length);
  }

  const hop: HopRecord = {
    index: finiteNumberOr(raw.index, position + 1),
    addresses,
    samples,
    timeouts,
  };
  const hostname = raw.hostname;
  if (typeof hostname === "string") {
    hop.hostname = hostname;
  }
  return hop;
}

/** A `data` field that is not a list reads as a run without path data. */
export function fromPersistedRun(
  target: string,
  value: unknown,
  options: PersistedReadOptions = {},
): RunResult {
  const raw: Record<string, unknown> = isRecord(value) ? value : {};
  const data = raw.data;
  const hops = Array.isArray(data)
    ? data.map((hop: unknown, position: number) => fromPersistedHop(hop, position, options))
    : [];

  return {
    target,
    command: stringOr(raw.cmd, ""),
    description: stringOr(unwrapSingleton(raw.description), ""),
    timestamp: stringOr(unwrapSingleton(raw.timestamp), ""),
    durationSeconds: finiteNumberOr(unwrapSingleton(raw.time_taken_in_secs), 0),
    hops,
  };
}

export function fromPersistedStore(
  value: unknown,
  options: PersistedReadOptions = {},
): InMemoryRunStore {
  if (!isRecord(value)) {
    throw new StoreFormatError("Run store must be a JSON object keyed by target.");
  }

  const store = new InMemoryRunStore();
  for (const [target, runs] of Object.entries(value)) {
    if (!Array.isArray(runs)) {
      throw new StoreFormatError(`Runs for target "${target}" must be an array.`);
    }
    for (const run of runs) {
      store.append(fromPersistedRun(target, run, options));
    }
  }
  return store;
}
