import type { RunStore } from "./interfaces.js";
import { hasPathData } from "./runAssembler.js";
import type { HopRecord, RunResult } from "./types.js";

export interface TargetRunCounts {
  target: string;
  runsWithData: number;
  runsWithoutData: number;
}

export interface StoreDescription {
  targetCount: number;
  runsWithData: number;
  runsWithoutData: number;
  targets: TargetRunCounts[];
}

function freezeHop(hop: HopRecord): HopRecord {
  const addresses = [...hop.addresses];
  const samples = [...hop.samples];
  Object.freeze(addresses);
  Object.freeze(samples);

  const copy: HopRecord = { index: hop.index, addresses, samples, timeouts: hop.timeouts };
  if (hop.hostname !== undefined) {
    copy.hostname = hop.hostname;
  }
  return Object.freeze(copy);
}

function freezeRun(run: RunResult): RunResult {
  const hops = run.hops.map((hop) => freezeHop(hop));
  Object.freeze(hops);
  return Object.freeze({ ...run, hops });
}

export class InMemoryRunStore implements RunStore {
  private readonly runsByTarget = new Map<string, RunResult[]>();

  append(run: RunResult): void {
    const bucket = this.runsByTarget.get(run.target) ?? [];
    bucket.push(freezeRun(run));
    this.runsByTarget.set(run.target, bucket);
  }

  appendMany(runs: RunResult[]): void {
    for (const run of runs) {
      this.append(run);
    }
  }

  history(target: string): readonly RunResult[] {
    return [...(this.runsByTarget.get(target) ?? [])];
  }

  has(target: string): boolean {
    return this.runsByTarget.has(target);
  }

  targets(): string[] {
    return [...this.runsByTarget.keys()].sort((left, right) =>
      left < right ? -1 : left > right ? 1 : 0,
    );
  }
}

export function describeStore(store: RunStore): StoreDescription {
  const targets = store.targets().map((target) => {
    const runs = store.history(target);
    const runsWithData = runs.filter((run) => hasPathData(run)).length;
    return {
      target,
      runsWithData,
      runsWithoutData: runs.length - runsWithData,
    };
  });

  return {
    targetCount: targets.length,
    runsWithData: targets.reduce((sum, entry) => sum + entry.runsWithData, 0),
    runsWithoutData: targets.reduce((sum, entry) => sum + entry.runsWithoutData, 0),
    targets,
  };
}
