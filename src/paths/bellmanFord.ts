import { NegativeCycleError } from "../errors.js";
import type { GraphModel, VertexId } from "../graph/model.js";
import type { AlgorithmOptions, SingleSourceResult } from "./types.js";

export interface GeneralResult<V extends VertexId = string> extends SingleSourceResult<V> {
  /** Relaxation passes executed before convergence, at most `|V| - 1`. */
  readonly passes: number;
}

/**
 * Single-source shortest paths tolerating negative weights.
 *
 * Runs up to `|V| - 1` relaxation passes over the full edge list, stopping
 * early once a pass changes nothing. A further pass that still relaxes an edge
 * proves a negative cycle reachable from the source and the call throws
 * {@link NegativeCycleError} instead of returning the tables.
 */
export function singleSourceGeneral<V extends VertexId>(
  graph: GraphModel<V>,
  source: V,
  options: AlgorithmOptions = {},
): GeneralResult<V> {
  graph.assertVertex(source, "source");

  const distances = new Map<V, number>();
  const predecessors = new Map<V, V | null>();
  for (const vertex of graph.listVertices()) {
    distances.set(vertex, Number.POSITIVE_INFINITY);
    predecessors.set(vertex, null);
  }
  distances.set(source, 0);

  const edges = graph.listEdges();
  const maxPasses = Math.max(0, graph.vertexCount - 1);
  let passes = 0;
  while (passes < maxPasses) {
    passes += 1;
    let changed = false;
    for (const { from, to, weight } of edges) {
      const tentative = (distances.get(from) ?? Number.POSITIVE_INFINITY) + weight;
      if (tentative < (distances.get(to) ?? Number.POSITIVE_INFINITY)) {
        distances.set(to, tentative);
        predecessors.set(to, from);
        changed = true;
      }
    }
    if (!changed) {
      break;
    }
  }

  // The checking pass keeps relaxing so the last updated vertex leads back into the cycle.
  const relaxable: V[] = [];
  for (const { from, to, weight } of edges) {
    const tentative = (distances.get(from) ?? Number.POSITIVE_INFINITY) + weight;
    if (tentative < (distances.get(to) ?? Number.POSITIVE_INFINITY)) {
      distances.set(to, tentative);
      predecessors.set(to, from);
      relaxable.push(to);
    }
  }

  if (relaxable.length > 0) {
    const cycle = recoverCycle(predecessors, relaxable[relaxable.length - 1], graph.vertexCount);
    options.logger?.debug("bellman_ford_negative_cycle", {
      source: String(source),
      passes,
      cycle: cycle ? cycle.map((vertex) => String(vertex)) : null,
    });
    throw new NegativeCycleError(unique(relaxable), cycle);
  }

  options.logger?.debug("bellman_ford_completed", {
    source: String(source),
    vertices: graph.vertexCount,
    edges: edges.length,
    passes,
  });

  return { source, distances, predecessors, passes };
}

/**
 * Walks `|V|` predecessor links from {@link start} to land inside a cycle,
 * then collects it in edge order with the first vertex repeated at the end.
 * Returns null when the walk reaches a vertex without predecessor.
 */
function recoverCycle<V extends VertexId>(
  predecessors: ReadonlyMap<V, V | null>,
  start: V,
  vertexCount: number,
): V[] | null {
  let anchor: V = start;
  for (let step = 0; step < vertexCount; step += 1) {
    const previous = predecessors.get(anchor);
    if (previous === null || previous === undefined) {
      return null;
    }
    anchor = previous;
  }

  const backwards: V[] = [anchor];
  let current = predecessors.get(anchor);
  while (current !== anchor) {
    if (current === null || current === undefined || backwards.length > vertexCount) {
      return null;
    }
    backwards.push(current);
    current = predecessors.get(current);
  }

  const cycle = backwards.reverse();
  cycle.push(cycle[0]);
  return cycle;
}

function unique<V>(values: readonly V[]): V[] {
  return [...new Set(values)];
}
