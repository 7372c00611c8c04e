export type Dialect = "modern" | "inetutils";

export interface HopRecord {
  /** TTL distance of the hop; strictly increasing within a run. */
  index: number;
  /** Responding addresses in first-seen order, without duplicates. */
  addresses: string[];
  hostname?: string;
  /** Round-trip times in milliseconds, in probe order. */
  samples: number[];
  timeouts: number;
}

export interface RunResult {
  target: string;
  command: string;
  /** Banner line printed by the probe tool before the first hop. */
  description: string;
  timestamp: string;
  durationSeconds: number;
  /** Empty for a "no data" run. */
  hops: HopRecord[];
}

export interface AggregateStats {
  count: number;
  mean?: number;
  min?: number;
  max?: number;
  /** Sample standard deviation; undefined below two samples. */
  stdev?: number;
}

export interface HopStats {
  index: number;
  stats: AggregateStats;
}

export interface TargetHopStats {
  target: string;
  hops: HopStats[];
  total: AggregateStats;
}

export interface TargetStats {
  target: string;
  stats: AggregateStats;
}

export interface TopologyEdge {
  from: string;
  to: string;
}

export interface TopologyGraph {
  nodes: string[];
  edges: TopologyEdge[];
  /** Node id to hostname, only where the hostname is unambiguous. */
  labels: Record<string, string>;
  /** Terminal node id to the target it was tagged with. */
  terminals: Record<string, string>;
}

export interface PersistedHop {
  index: number;
  addresses?: string[];
  hostname?: string;
  results: number[];
  timeouts?: number;
}

export interface PersistedRun {
  cmd: string;
  timestamp: string;
  description?: string;
  time_taken_in_secs?: number;
  data: PersistedHop[] | "No data";
}

export type PersistedStore = Record<string, PersistedRun[]>;
