import { UnknownTargetError } from "./errors.js";
import { HostnameLedger } from "./hostnames.js";
import type { RunStore } from "./interfaces.js";
import { hasPathData } from "./runAssembler.js";
import type {
  AggregateStats,
  HopStats,
  RunResult,
  TargetHopStats,
  TargetStats,
} from "./types.js";

export const UNKNOWN_HOST_LABEL = "???";

export interface StatsRow {
  received: number;
  average: string;
  best: string;
  worst: string;
  stdev: string;
}

export interface TargetOverview {
  target: string;
  runsWithData: number;
  maxHops: number;
  total: AggregateStats;
}

export interface StoreOverview {
  targetCount: number;
  runsWithData: number;
  averageHopsPerTarget: number;
  total: AggregateStats;
}

/** `"no-data"`: the hop was reached but never answered. `null`: never reached. */
export type DelayCell = number | "no-data" | null;

export interface DelayMatrix {
  targets: string[];
  hopCount: number;
  rows: DelayCell[][];
}

export interface HopHosts {
  index: number;
  hosts: string[];
}

export interface HopHostsOptions {
  withHostnames?: boolean;
}

export function computeAggregateStats(samples: readonly number[]): AggregateStats {
  const count = samples.length;
  if (count === 0) {
    return { count: 0 };
  }

  let sum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const sample of samples) {
    sum += sample;
    min = Math.min(min, sample);
    max = Math.max(max, sample);
  }
  const mean = sum / count;

  const stats: AggregateStats = { count, mean, min, max };
  if (count >= 2) {
    let squaredDeviations = 0;
    for (const sample of samples) {
      squaredDeviations += (sample - mean) ** 2;
    }
    stats.stdev = Math.sqrt(squaredDeviations / (count - 1));
  }
  return stats;
}

function formatMs(value: number | undefined): string {
  return value === undefined ? "-" : value.toFixed(2);
}

export function toStatsRow(stats: AggregateStats): StatsRow {
  return {
    received: stats.count,
    average: formatMs(stats.mean),
    best: formatMs(stats.min),
    worst: formatMs(stats.max),
    stdev: formatMs(stats.stdev),
  };
}

function runsWithData(store: RunStore, target: string): RunResult[] {
  return store.history(target).filter((run) => hasPathData(run));
}

function requireTarget(store: RunStore, target: string): void {
  if (!store.targets().includes(target)) {
    throw new UnknownTargetError(target);
  }
}

function samplesByHopIndex(runs: RunResult[]): Map<number, number[]> {
  const byIndex = new Map<number, number[]>();
  for (const run of runs) {
    for (const hop of run.hops) {
      const bucket = byIndex.get(hop.index) ?? [];
      bucket.push(...hop.samples);
      byIndex.set(hop.index, bucket);
    }
  }
  return byIndex;
}

function allSamples(runs: RunResult[]): number[] {
  return runs.flatMap((run) => run.hops.flatMap((hop) => hop.samples));
}

function maxHopIndex(runs: RunResult[]): number {
  let max = 0;
  for (const run of runs) {
    for (const hop of run.hops) {
      max = Math.max(max, hop.index);
    }
  }
  return max;
}

export function statsFor(store: RunStore, target: string): TargetHopStats {
  requireTarget(store, target);
  const runs = runsWithData(store, target);

  const hops: HopStats[] = [...samplesByHopIndex(runs).entries()]
    .sort(([left], [right]) => left - right)
    .map(([index, samples]) => ({ index, stats: computeAggregateStats(samples) }));

  return {
    target,
    hops,
    total: computeAggregateStats(allSamples(runs)),
  };
}

export function statsForAll(store: RunStore): TargetStats[] {
  return store.targets().map((target) => ({
    target,
    stats: computeAggregateStats(allSamples(runsWithData(store, target))),
  }));
}

/**
 * Lists the addresses seen at each hop index, from the shallowest to the
 * deepest hop probed for the target. Hops where no address was ever observed
 * list `???`.
 */
export function hopHostsFor(
  store: RunStore,
  target: string,
  options: HopHostsOptions = {},
): HopHosts[] {
  requireTarget(store, target);
  const withHostnames = options.withHostnames ?? true;
  const runs = runsWithData(store, target);

  const ledger = new HostnameLedger();
  const addressesByIndex = new Map<number, string[]>();
  for (const run of runs) {
    for (const hop of run.hops) {
      ledger.recordHop(hop);
      const seen = addressesByIndex.get(hop.index) ?? [];
      for (const address of hop.addresses) {
        if (!seen.includes(address)) {
          seen.push(address);
        }
      }
      addressesByIndex.set(hop.index, seen);
    }
  }

  if (addressesByIndex.size === 0) {
    return [];
  }

  const output: HopHosts[] = [];
  const firstIndex = Math.min(...addressesByIndex.keys());
  for (let index = firstIndex; index <= maxHopIndex(runs); index += 1) {
    const addresses = addressesByIndex.get(index) ?? [];
    if (addresses.length === 0) {
      output.push({ index, hosts: [UNKNOWN_HOST_LABEL] });
      continue;
    }
    output.push({
      index,
      hosts: addresses.map((address) => {
        const hostname = withHostnames ? ledger.resolve(address) : undefined;
        return hostname === undefined ? address : `${address} (${hostname})`;
      }),
    });
  }
  return output;
}

export function overviewFor(store: RunStore, target: string): TargetOverview {
  requireTarget(store, target);
  const runs = runsWithData(store, target);

  return {
    target,
    runsWithData: runs.length,
    maxHops: maxHopIndex(runs),
    total: computeAggregateStats(allSamples(runs)),
  };
}

export function overviewForAll(store: RunStore): StoreOverview {
  const targets = store.targets();
  const overviews = targets.map((target) => overviewFor(store, target));
  const totalHops = overviews.reduce((sum, overview) => sum + overview.maxHops, 0);

  return {
    targetCount: targets.length,
    runsWithData: overviews.reduce((sum, overview) => sum + overview.runsWithData, 0),
    averageHopsPerTarget: targets.length === 0 ? 0 : totalHops / targets.length,
    total: computeAggregateStats(
      targets.flatMap((target) => allSamples(runsWithData(store, target))),
    ),
  };
}

/**
 * Mean delay per target and hop index, padded to the longest path so the rows
 * form a rectangle.
 */
export function averageDelayMatrix(store: RunStore, targets?: string[]): DelayMatrix {
  const selected = targets ?? store.targets();
  for (const target of selected) {
    requireTarget(store, target);
  }

  const perTarget = selected.map((target) => {
    const runs = runsWithData(store, target);
    return { byIndex: samplesByHopIndex(runs), maxHops: maxHopIndex(runs) };
  });
  const hopCount = perTarget.reduce((max, entry) => Math.max(max, entry.maxHops), 0);

  const rows = perTarget.map(({ byIndex, maxHops }) => {
    const row: DelayCell[] = [];
    for (let index = 1; index <= hopCount; index += 1) {
      const samples = byIndex.get(index);
      if (index > maxHops || samples === undefined) {
        row.push(null);
        continue;
      }
      const { mean } = computeAggregateStats(samples);
      row.push(mean === undefined ? "no-data" : mean);
    }
    return row;
  });

  return { targets: selected, hopCount, rows };
}
