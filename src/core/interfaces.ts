import type { RunResult } from "./types.js";

/**
 * Append-only history of probe runs keyed by target. Stored runs are never
 * edited or removed through this interface.
 */
export interface RunStore {
  append(run: RunResult): void;
  history(target: string): readonly RunResult[];
  /** Targets with at least one run, sorted lexicographically. */
  targets(): string[];
}
