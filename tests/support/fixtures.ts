import type { HopRecord, RunResult } from "../../src/core/types.js";

export interface HopOverrides {
  addresses?: string[];
  hostname?: string;
  samples?: number[];
  timeouts?: number;
}

export function hop(index: number, overrides: HopOverrides = {}): HopRecord {
  const record: HopRecord = {
    index,
    addresses: overrides.addresses ?? [],
    samples: overrides.samples ?? [],
    timeouts: overrides.timeouts ?? 0,
  };
  if (overrides.hostname !== undefined) {
    record.hostname = overrides.hostname;
  }
  return record;
}

/** Builds a run from hop address lists, one list per TTL starting at 1. */
export function pathRun(target: string, path: Array<string[] | HopOverrides>): RunResult {
  return run(
    target,
    path.map((entry, position) =>
      Array.isArray(entry) ? hop(position + 1, { addresses: entry }) : hop(position + 1, entry),
    ),
  );
}

export function run(target: string, hops: HopRecord[], overrides: Partial<RunResult> = {}): RunResult {
  return {
    target,
    command: overrides.command ?? `traceroute -m 64 -q 3 ${target}`,
    description:
      overrides.description ?? `traceroute to ${target}, 64 hops max, 60 byte packets`,
    timestamp: overrides.timestamp ?? "2026-02-01T00:00:00.000Z",
    durationSeconds: overrides.durationSeconds ?? 1.25,
    hops,
  };
}
