import { UnknownTargetError } from "./errors.js";
import { HostnameLedger } from "./hostnames.js";
import type { RunStore } from "./interfaces.js";
import { hasPathData } from "./runAssembler.js";
import type { RunResult, TopologyEdge, TopologyGraph } from "./types.js";

export const PLACEHOLDER_PREFIX = "???#";

export function terminalTag(target: string): string {
  return `<${target}>`;
}

export function tagTerminal(node: string, target: string): string {
  const tag = terminalTag(target);
  return node.endsWith(tag) ? node : `${node} ${tag}`;
}

export function isPlaceholder(node: string): boolean {
  return node.startsWith(PLACEHOLDER_PREFIX);
}

class GraphAccumulator {
  private readonly nodes = new Set<string>();
  private readonly edgeKeys = new Set<string>();
  private readonly edges: TopologyEdge[] = [];
  private readonly addressByNode = new Map<string, string>();
  private readonly terminals: Record<string, string> = {};
  private placeholderCount = 0;

  readonly ledger = new HostnameLedger();

  nextPlaceholder(): string {
    this.placeholderCount += 1;
    return `${PLACEHOLDER_PREFIX}${this.placeholderCount}`;
  }

  addNode(node: string, address: string): void {
    this.nodes.add(node);
    if (!isPlaceholder(address)) {
      this.addressByNode.set(node, address);
    }
  }

  addTerminal(address: string, target: string): string {
    const node = tagTerminal(address, target);
    this.addNode(node, address);
    this.terminals[node] = target;
    return node;
  }

  addEdge(from: string, to: string): void {
    const key = `${from}\u0000${to}`;
    if (this.edgeKeys.has(key)) {
      return;
    }
    this.edgeKeys.add(key);
    this.edges.push({ from, to });
  }

  toGraph(): TopologyGraph {
    const labels: Record<string, string> = {};
    for (const node of this.nodes) {
      const address = this.addressByNode.get(node);
      const hostname = address === undefined ? undefined : this.ledger.resolve(address);
      if (hostname !== undefined) {
        labels[node] = hostname;
      }
    }

    return {
      nodes: [...this.nodes],
      edges: [...this.edges],
      labels,
      terminals: { ...this.terminals },
    };
  }
}

function addRun(graph: GraphAccumulator, run: RunResult): void {
  const { hops, target } = run;
  for (const hop of hops) {
    graph.ledger.recordHop(hop);
  }

  const [firstHop] = hops;
  if (firstHop === undefined) {
    return;
  }

  // Addresses per hop for this run only; gaps are filled with placeholders.
  let previous =
    firstHop.addresses.length > 0 ? [...firstHop.addresses] : [graph.nextPlaceholder()];

  if (hops.length === 1) {
    for (const address of previous) {
      graph.addTerminal(address, target);
    }
    return;
  }

  for (const address of previous) {
    graph.addNode(address, address);
  }

  // Gap placeholder already assigned after a predecessor, for this run only.
  const placeholderAfter = new Map<string, string>();

  for (let index = 1; index < hops.length; index += 1) {
    const hop = hops[index];
    if (hop === undefined) {
      continue;
    }
    const isLast = index === hops.length - 1;
    const current: string[] = [];
    let sharedPlaceholder: string | undefined;

    for (const predecessor of previous) {
      let successors = hop.addresses;
      if (successors.length === 0) {
        let placeholder = placeholderAfter.get(predecessor);
        if (placeholder === undefined) {
          if (sharedPlaceholder === undefined) {
            sharedPlaceholder = graph.nextPlaceholder();
          }
          placeholder = sharedPlaceholder;
          placeholderAfter.set(predecessor, placeholder);
        }
        successors = [placeholder];
      }

      for (const successor of successors) {
        let node = successor;
        if (isLast) {
          node = graph.addTerminal(successor, target);
        } else {
          graph.addNode(successor, successor);
        }
        graph.addEdge(predecessor, node);
        if (!current.includes(successor)) {
          current.push(successor);
        }
      }
    }

    previous = current;
  }
}

/**
 * Merges every run of the given targets into one directed graph of observed
 * addresses. Placeholders stand in for unanswered hops and are never shared
 * between runs; the last hop of each run is tagged with its target.
 */
export function buildTopology(store: RunStore, targets: Iterable<string>): TopologyGraph {
  const graph = new GraphAccumulator();
  const known = new Set(store.targets());

  for (const target of new Set(targets)) {
    if (!known.has(target)) {
      throw new UnknownTargetError(target);
    }
    for (const run of store.history(target)) {
      if (hasPathData(run)) {
        addRun(graph, run);
      }
    }
  }

  return graph.toGraph();
}
