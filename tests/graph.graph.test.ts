import { expect } from "chai";
import { describe, it } from "mocha";

import { InMemoryGraphCacheStore } from "../src/cache/memoryStore.js";
import { GraphValidationError } from "../src/graph/errors.js";
import { Graph } from "../src/graph/graph.js";
import type { NeighborAddedEvent } from "../src/graph/node.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { captureRejection } from "./helpers/storeContract.js";
import { StubNeighborSource } from "./helpers/stubSource.js";

describe("graph/graph", () => {
  describe("addEdge", () => {
    it("connects nodes given by name, index or reference", async () => {
      const store = new InMemoryGraphCacheStore();
      const graph = new Graph({ store });
      const ada = await graph.addNode("Ada");
      const bob = await graph.addNode("Bob");
      const cy = await graph.addNode("Cy");

      const byName = await graph.addEdge("Ada", "Bob", 2.5);
      const byIndex = await graph.addEdge(0, 2);
      const byNode = await graph.addEdge(bob, cy, 4);

      expect(byName?.weight).to.equal(2.5);
      expect(byIndex?.other(ada)).to.equal(cy);
      expect(byNode?.weight).to.equal(4);
      expect(await store.neighborNamesOf("Ada")).to.deep.equal(["Bob", "Cy"]);
      expect(await store.findEdgeByNames("Bob", "Ada")).to.include({ weight: 2.5 });
    });

    it("persists one weight for concurrent additions of the same pair", async () => {
      const store = new InMemoryGraphCacheStore();
      const graph = new Graph({ store });
      await graph.addNode("A");
      await graph.addNode("B");

      const [first, second] = await Promise.all([graph.addEdge("A", "B", 2), graph.addEdge("A", "B", 5)]);

      expect(second).to.equal(first);
      expect(first?.weight).to.equal(2);
      expect(graph.edges.size).to.equal(1);
      expect(await store.findEdgeByNames("A", "B")).to.include({ weight: 2 });
    });

    it("aligns the cached weight with a pair registered during the commit", async () => {
      const store = new InMemoryGraphCacheStore();
      const graph = new Graph({ store });
      const ada = await graph.addNode("Ada");
      const bob = await graph.addNode("Bob");

      const pending = graph.edges.addEdge(ada, bob, 5);
      const registered = graph.edges.connect(ada, bob, 2);

      expect(await pending).to.equal(registered);
      expect(await store.findEdgeByNames("Ada", "Bob")).to.include({ weight: 2 });
    });

    it("connects to nodes that only exist in the cache", async () => {
      const store = new InMemoryGraphCacheStore();
      await store.upsertNode("Cached", null);
      await store.commit();
      const graph = new Graph({ store });
      await graph.addNode("Ada");

      const edge = await graph.addEdge("Ada", "Cached");
      expect(edge?.target.name).to.equal("Cached");
      expect(await store.neighborNamesOf("Cached")).to.deep.equal(["Ada"]);
    });

    it("returns null when an endpoint is unknown", async () => {
      const graph = new Graph({ store: new InMemoryGraphCacheStore() });
      await graph.addNode("Ada");

      expect(await graph.addEdge("Ada", "Nobody")).to.equal(null);
      expect(await graph.addEdge(0, 9)).to.equal(null);
      expect(await graph.addEdgeByIndex(0, 9)).to.equal(null);
      expect(graph.edges.size).to.equal(0);
    });

    it("rejects self-loops and invalid weights", async () => {
      const graph = new Graph({ store: new InMemoryGraphCacheStore() });
      const ada = await graph.addNode("Ada");
      await graph.addNode("Bob");

      expect(await captureRejection(graph.addEdge("Ada", " Ada "))).to.be.instanceOf(GraphValidationError);
      expect(await captureRejection(graph.addEdge(ada, "Ada"))).to.be.instanceOf(GraphValidationError);
      expect(await captureRejection(graph.addEdge("Ada", "Bob", 0))).to.be.instanceOf(GraphValidationError);
      expect(await captureRejection(graph.addEdgeByIndex(1, 1))).to.be.instanceOf(GraphValidationError);
      expect(graph.edges.size).to.equal(0);
    });

    it("rejects nodes owned by another graph", async () => {
      const graph = new Graph({ store: new InMemoryGraphCacheStore() });
      const other = new Graph({ store: new InMemoryGraphCacheStore() });
      await graph.addNode("Ada");
      const stranger = await other.addNode("Stranger");

      const error = await captureRejection(graph.addEdge("Ada", stranger));
      expect(error).to.be.instanceOf(GraphValidationError);
    });

    it("keeps index-based edges in memory when asked to", async () => {
      const store = new InMemoryGraphCacheStore();
      const graph = new Graph({ store });
      await graph.addNode("Ada");
      await graph.addNode("Bob");

      const edge = await graph.addEdgeByIndex(1, 0, 3, false);
      expect(edge?.weight).to.equal(3);
      expect(await store.findEdgeByNames("Ada", "Bob")).to.equal(undefined);
    });
  });

  describe("name authentication", () => {
    it("asks the resolver for the canonical name", async () => {
      const source = new StubNeighborSource({ "Grace Hopper": [] });
      const graph = new Graph({ store: new InMemoryGraphCacheStore(), neighborSource: source, nameResolver: source });

      expect(await graph.getAuthenticNodeName(" Grace Hopper ")).to.equal("Grace Hopper");
      expect(await graph.getAuthenticNodeName("Nobody")).to.equal(null);
      expect(await graph.getAuthenticNodeName("   ")).to.equal(null);
      expect(await graph.nodeExists("Grace Hopper")).to.equal(true);
      expect(source.resolveCalls).to.deep.equal(["Grace Hopper", "Nobody", "Grace Hopper"]);
      expect(graph.nodes.size).to.equal(0);
    });

    it("falls back to known nodes without a resolver", async () => {
      const graph = new Graph({ store: new InMemoryGraphCacheStore() });
      await graph.addNode("Ada", "ext-1");

      expect(await graph.resolveIdentity("Ada")).to.deep.equal({ name: "Ada", externalID: "ext-1" });
      expect(await graph.nodeExists("Bob")).to.equal(false);
    });
  });

  describe("neighborAdded listeners", () => {
    it("hears every first registration of an edge on a node", async () => {
      const graph = new Graph({ store: new InMemoryGraphCacheStore() });
      const events: string[] = [];
      graph.onNeighborAdded((event: NeighborAddedEvent) => {
        events.push(`${event.node.name}->${event.neighbor.name}:${event.edge.weight}`);
      });
      await graph.addNode("Ada");
      await graph.addNode("Bob");

      await graph.addEdge("Ada", "Bob", 2);
      await graph.addEdge("Bob", "Ada", 2);

      expect(events).to.deep.equal(["Ada->Bob:2", "Bob->Ada:2"]);
    });

    it("stops notifying once unsubscribed", async () => {
      const graph = new Graph({ store: new InMemoryGraphCacheStore() });
      let calls = 0;
      const unsubscribe = graph.onNeighborAdded(() => {
        calls += 1;
      });
      await graph.addNode("Ada");
      await graph.addNode("Bob");
      await graph.addNode("Cy");

      await graph.addEdge("Ada", "Bob");
      unsubscribe();
      await graph.addEdge("Ada", "Cy");

      expect(calls).to.equal(2);
    });

    it("logs a failing listener and keeps the edge", async () => {
      const logger = new RecordingLogger();
      const graph = new Graph({ store: new InMemoryGraphCacheStore(), logger });
      graph.onNeighborAdded(() => {
        throw new Error("listener exploded");
      });
      await graph.addNode("Ada");
      await graph.addNode("Bob");

      const edge = await graph.addEdge("Ada", "Bob");

      expect(edge).to.not.equal(null);
      expect(graph.edges.size).to.equal(1);
      expect(logger.find("neighbor_listener_failed")).to.deep.equal([
        {
          level: "warn",
          message: "neighbor_listener_failed",
          payload: { node: "Ada", neighbor: "Bob", message: "listener exploded" },
        },
        {
          level: "warn",
          message: "neighbor_listener_failed",
          payload: { node: "Bob", neighbor: "Ada", message: "listener exploded" },
        },
      ]);
    });
  });
});
