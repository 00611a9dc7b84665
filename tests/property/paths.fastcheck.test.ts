import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { NegativeCycleError } from "../../src/errors.js";
import type { GraphModel } from "../../src/graph/model.js";
import { singleSourceGeneral, type GeneralResult } from "../../src/paths/bellmanFord.js";
import { singleSourceNonNegative } from "../../src/paths/dijkstra.js";
import { allPairs } from "../../src/paths/floydWarshall.js";
import { reconstructPath } from "../../src/paths/reconstruct.js";
import type { SingleSourceResult } from "../../src/paths/types.js";
import { graphFromTriples } from "../helpers/graphs.js";

/**
 * Property-based coverage cross-checking the three algorithms against each
 * other on small random graphs. Integer weights keep every sum exact.
 */
describe("shortest paths (property-based)", () => {
  const graphArb = (minWeight: number, maxWeight: number): fc.Arbitrary<GraphModel<string>> =>
    fc.integer({ min: 1, max: 6 }).chain((size) => {
      const vertices = Array.from({ length: size }, (_, index) => `v${index}`);
      return fc
        .array(
          fc.tuple(
            fc.constantFrom(...vertices),
            fc.constantFrom(...vertices),
            fc.integer({ min: minWeight, max: maxWeight }),
          ),
          { maxLength: 14 },
        )
        .map((triples) => graphFromTriples(vertices, triples));
    });

  /** Runs the signed algorithm from every vertex, or returns null when a negative cycle exists. */
  const generalFromEveryVertex = (graph: GraphModel<string>): GeneralResult<string>[] | null => {
    const results: GeneralResult<string>[] = [];
    for (const vertex of graph.listVertices()) {
      try {
        results.push(singleSourceGeneral(graph, vertex));
      } catch (error) {
        if (error instanceof NegativeCycleError) {
          return null;
        }
        throw error;
      }
    }
    return results;
  };

  it("agrees between both single-source algorithms on non-negative weights", () => {
    fc.assert(
      fc.property(graphArb(0, 9), (graph) => {
        for (const source of graph.listVertices()) {
          const fast = singleSourceNonNegative(graph, source);
          const general = singleSourceGeneral(graph, source);
          expect(fast.distances).to.deep.equal(general.distances);
        }
      }),
      { numRuns: 150 },
    );
  });

  it("matches the all-pairs rows with the signed single-source tables", () => {
    fc.assert(
      fc.property(graphArb(-3, 8), (graph) => {
        const rows = generalFromEveryVertex(graph);
        if (rows === null) {
          return;
        }
        const closure = allPairs(graph);
        rows.forEach((row, i) => {
          closure.vertices.forEach((target, j) => {
            expect(closure.distances[i][j]).to.equal(row.distances.get(target));
          });
        });
      }),
      { numRuns: 200 },
    );
  });

  /** Checks every reconstructed path against the predecessor hops and the distance table. */
  const expectPathsMatchTables = (graph: GraphModel<string>, result: SingleSourceResult<string>): void => {
    for (const [target, distance] of result.distances) {
      const path = reconstructPath(result, target);
      if (distance === Number.POSITIVE_INFINITY) {
        expect(path).to.deep.equal([]);
        continue;
      }
      let hops = 0;
      let current = result.predecessors.get(target) ?? null;
      while (current !== null) {
        hops += 1;
        current = result.predecessors.get(current) ?? null;
      }
      expect(path[0]).to.equal(result.source);
      expect(path[path.length - 1]).to.equal(target);
      expect(path.length - 1).to.equal(hops);
      expect(graph.pathCost(path)).to.equal(distance);
    }
  };

  it("rebuilds non-negative single-source paths whose hops and cost match the tables", () => {
    fc.assert(
      fc.property(graphArb(0, 9), (graph) => {
        expectPathsMatchTables(graph, singleSourceNonNegative(graph, graph.listVertices()[0]));
      }),
      { numRuns: 150 },
    );
  });

  it("rebuilds signed single-source paths whose hops and cost match the tables", () => {
    fc.assert(
      fc.property(graphArb(-3, 8), (graph) => {
        let result: GeneralResult<string>;
        try {
          result = singleSourceGeneral(graph, graph.listVertices()[0]);
        } catch (error) {
          if (error instanceof NegativeCycleError) {
            return;
          }
          throw error;
        }
        expectPathsMatchTables(graph, result);
      }),
      { numRuns: 200 },
    );
  });

  it("rebuilds all-pairs paths whose cost matches the matrix", () => {
    fc.assert(
      fc.property(graphArb(-3, 8), (graph) => {
        if (generalFromEveryVertex(graph) === null) {
          return;
        }
        const closure = allPairs(graph);
        closure.vertices.forEach((start, i) => {
          closure.vertices.forEach((end, j) => {
            if (i === j) {
              return;
            }
            const path = reconstructPath(closure, start, end);
            if (closure.distances[i][j] === Number.POSITIVE_INFINITY) {
              expect(path).to.deep.equal([]);
              return;
            }
            expect(path.length).to.be.at.most(closure.vertices.length);
            expect(graph.pathCost(path)).to.equal(closure.distances[i][j]);
          });
        });
      }),
      { numRuns: 200 },
    );
  });

  it("produces identical tables when run twice on the same graph", () => {
    fc.assert(
      fc.property(graphArb(0, 9), (graph) => {
        const source = graph.listVertices()[0];
        expect(singleSourceNonNegative(graph, source).distances).to.deep.equal(
          singleSourceNonNegative(graph, source).distances,
        );
        expect(singleSourceGeneral(graph, source).predecessors).to.deep.equal(
          singleSourceGeneral(graph, source).predecessors,
        );
        expect(allPairs(graph).distances).to.deep.equal(allPairs(graph).distances);
      }),
      { numRuns: 100 },
    );
  });
});
