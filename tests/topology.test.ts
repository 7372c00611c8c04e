import { describe, expect, it } from "vitest";
import { UnknownTargetError } from "../src/core/errors.js";
import { InMemoryRunStore } from "../src/core/runStore.js";
import { buildTopology, isPlaceholder, tagTerminal } from "../src/core/topology.js";
import { pathRun, run } from "./support/fixtures.js";

function storeOf(...runs: ReturnType<typeof run>[]): InMemoryRunStore {
  const store = new InMemoryRunStore();
  store.appendMany(runs);
  return store;
}

describe("buildTopology", () => {
  it("links consecutive hops and tags the destination", () => {
    const store = storeOf(pathRun("a.test", [["10.0.0.1"], ["10.0.0.2"], ["203.0.113.1"]]));

    expect(buildTopology(store, ["a.test"])).toEqual({
      nodes: ["10.0.0.1", "10.0.0.2", "203.0.113.1 <a.test>"],
      edges: [
        { from: "10.0.0.1", to: "10.0.0.2" },
        { from: "10.0.0.2", to: "203.0.113.1 <a.test>" },
      ],
      labels: {},
      terminals: { "203.0.113.1 <a.test>": "a.test" },
    });
  });

  it("collapses repeated observations of the same edge", () => {
    const path = [["10.0.0.1"], ["10.0.0.2"], ["203.0.113.1"]];
    const store = storeOf(pathRun("a.test", path), pathRun("a.test", path));

    const graph = buildTopology(store, ["a.test"]);

    expect(graph.edges).toHaveLength(2);
    expect(graph.nodes).toHaveLength(3);
  });

  it("never shares placeholders between runs", () => {
    const store = storeOf(
      pathRun("a.test", [[], ["10.0.0.9"], ["198.51.100.1"]]),
      pathRun("b.test", [[], ["10.0.0.9"], ["198.51.100.2"]]),
      pathRun("b.test", [[], ["10.0.0.9"], ["198.51.100.2"]]),
    );

    const graph = buildTopology(store, ["a.test", "b.test"]);

    expect(graph.nodes.filter((node) => isPlaceholder(node))).toEqual([
      "???#1",
      "???#2",
      "???#3",
    ]);
    expect(graph.edges).toEqual([
      { from: "???#1", to: "10.0.0.9" },
      { from: "10.0.0.9", to: "198.51.100.1 <a.test>" },
      { from: "???#2", to: "10.0.0.9" },
      { from: "10.0.0.9", to: "198.51.100.2 <b.test>" },
      { from: "???#3", to: "10.0.0.9" },
    ]);
  });

  it("fills one gap with one placeholder for all predecessors", () => {
    const store = storeOf(
      pathRun("a.test", [["10.0.0.1"], ["10.0.0.2", "10.0.0.3"], [], ["203.0.113.5"]]),
    );

    expect(buildTopology(store, ["a.test"]).edges).toEqual([
      { from: "10.0.0.1", to: "10.0.0.2" },
      { from: "10.0.0.1", to: "10.0.0.3" },
      { from: "10.0.0.2", to: "???#1" },
      { from: "10.0.0.3", to: "???#1" },
      { from: "???#1", to: "203.0.113.5 <a.test>" },
    ]);
  });

  it("chains placeholders across consecutive gaps", () => {
    const store = storeOf(pathRun("a.test", [["10.0.0.1"], [], [], ["203.0.113.5"]]));

    expect(buildTopology(store, ["a.test"]).edges).toEqual([
      { from: "10.0.0.1", to: "???#1" },
      { from: "???#1", to: "???#2" },
      { from: "???#2", to: "203.0.113.5 <a.test>" },
    ]);
  });

  it("tags an unanswered final hop as a terminal placeholder", () => {
    const graph = buildTopology(storeOf(pathRun("a.test", [["10.0.0.1"], []])), ["a.test"]);

    expect(graph.edges).toEqual([{ from: "10.0.0.1", to: "???#1 <a.test>" }]);
    expect(graph.terminals).toEqual({ "???#1 <a.test>": "a.test" });
  });

  it("keeps destinations that share a path apart", () => {
    const store = storeOf(
      pathRun("a.test", [["10.0.0.1"], ["10.0.0.2"]]),
      pathRun("b.test", [["10.0.0.1"], ["10.0.0.2"]]),
    );

    const graph = buildTopology(store, ["a.test", "b.test"]);

    expect(graph.nodes).toEqual(["10.0.0.1", "10.0.0.2 <a.test>", "10.0.0.2 <b.test>"]);
    expect(graph.terminals).toEqual({
      "10.0.0.2 <a.test>": "a.test",
      "10.0.0.2 <b.test>": "b.test",
    });
  });

  it("labels nodes whose hostname is unambiguous", () => {
    const store = storeOf(
      pathRun("a.test", [
        { addresses: ["192.168.1.1"], hostname: "gw.example" },
        { addresses: ["203.0.113.9"], hostname: "dest.example" },
      ]),
      pathRun("a.test", [
        { addresses: ["192.168.1.1"], hostname: "gw.example" },
        { addresses: ["203.0.113.9"] },
      ]),
    );

    expect(buildTopology(store, ["a.test"]).labels).toEqual({
      "192.168.1.1": "gw.example",
      "203.0.113.9 <a.test>": "dest.example",
    });
  });

  it("leaves nodes with conflicting hostnames unlabelled", () => {
    const store = storeOf(
      pathRun("a.test", [{ addresses: ["203.0.113.1"], hostname: "a.example" }, ["10.0.0.2"]]),
      pathRun("b.test", [{ addresses: ["203.0.113.1"], hostname: "b.example" }, ["10.0.0.3"]]),
    );

    const graph = buildTopology(store, ["a.test", "b.test"]);

    expect(graph.nodes).toContain("203.0.113.1");
    expect(graph.labels).toEqual({});
  });

  it("keeps a single-hop run as a lone terminal node", () => {
    const graph = buildTopology(storeOf(pathRun("a.test", [["10.0.0.1"]])), ["a.test"]);

    expect(graph.nodes).toEqual(["10.0.0.1 <a.test>"]);
    expect(graph.edges).toEqual([]);
  });

  it("ignores runs without path data", () => {
    const graph = buildTopology(storeOf(run("a.test", [])), ["a.test"]);

    expect(graph).toEqual({ nodes: [], edges: [], labels: {}, terminals: {} });
  });

  it("rejects unknown targets", () => {
    expect(() => buildTopology(new InMemoryRunStore(), ["a.test"])).toThrow(UnknownTargetError);
  });
});

describe("tagTerminal", () => {
  it("does not tag a node twice", () => {
    expect(tagTerminal("10.0.0.1", "a.test")).toBe("10.0.0.1 <a.test>");
    expect(tagTerminal("10.0.0.1 <a.test>", "a.test")).toBe("10.0.0.1 <a.test>");
  });
});
