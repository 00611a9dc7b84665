import type { GraphModel, VertexId } from "../graph/model.js";
import type { AlgorithmOptions, SingleSourceResult } from "./types.js";

export interface NonNegativeResult<V extends VertexId = string> extends SingleSourceResult<V> {
  /** Vertices in the order their distance became final. */
  readonly settledOrder: readonly V[];
  /** Number of outdated heap entries discarded on extraction. */
  readonly staleEntries: number;
}

export interface QueueEntry<V> {
  vertex: V;
  priority: number;
}

/** Binary min-heap keyed by priority. Entries are never updated in place. */
export class MinHeap<V> {
  private readonly data: QueueEntry<V>[] = [];

  enqueue(entry: QueueEntry<V>): void {
    this.data.push(entry);
    this.bubbleUp(this.data.length - 1);
  }

  dequeue(): QueueEntry<V> | undefined {
    const min = this.data[0];
    const last = this.data.pop();
    if (min === undefined || last === undefined) {
      return undefined;
    }
    if (this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (this.data[parent].priority <= this.data[index].priority) {
        break;
      }
      [this.data[parent], this.data[index]] = [this.data[index], this.data[parent]];
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.data[left].priority < this.data[smallest].priority) {
        smallest = left;
      }
      if (right < length && this.data[right].priority < this.data[smallest].priority) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      [this.data[index], this.data[smallest]] = [this.data[smallest], this.data[index]];
      index = smallest;
    }
  }
}

/**
 * Single-source shortest paths for graphs whose weights are all non-negative.
 *
 * Improved distances are re-inserted instead of decreasing keys; an extracted
 * entry whose priority exceeds the recorded distance is stale and skipped.
 *
 * Negative weights are not detected and the distances are then unspecified.
 * Extractions are capped at `|V| * max(1, |E|)` so a reachable negative cycle
 * ends the loop instead of growing the heap forever; the tables are returned
 * as they stand. Use {@link singleSourceGeneral} for signed weights.
 */
export function singleSourceNonNegative<V extends VertexId>(
  graph: GraphModel<V>,
  source: V,
  options: AlgorithmOptions = {},
): NonNegativeResult<V> {
  graph.assertVertex(source, "source");

  const distances = new Map<V, number>();
  const predecessors = new Map<V, V | null>();
  for (const vertex of graph.listVertices()) {
    distances.set(vertex, Number.POSITIVE_INFINITY);
    predecessors.set(vertex, null);
  }
  distances.set(source, 0);

  const settledOrder: V[] = [];
  let staleEntries = 0;
  const queue = new MinHeap<V>();
  queue.enqueue({ vertex: source, priority: 0 });
  const maxSettled = graph.vertexCount * Math.max(1, graph.edgeCount);

  for (let current = queue.dequeue(); current !== undefined; current = queue.dequeue()) {
    const best = distances.get(current.vertex) ?? Number.POSITIVE_INFINITY;
    if (current.priority > best) {
      staleEntries += 1;
      continue;
    }
    if (settledOrder.length >= maxSettled) {
      break;
    }
    settledOrder.push(current.vertex);

    for (const edge of graph.getOutgoing(current.vertex)) {
      const tentative = current.priority + edge.weight;
      if (tentative < (distances.get(edge.to) ?? Number.POSITIVE_INFINITY)) {
        distances.set(edge.to, tentative);
        predecessors.set(edge.to, current.vertex);
        queue.enqueue({ vertex: edge.to, priority: tentative });
      }
    }
  }

  options.logger?.debug("dijkstra_completed", {
    source: String(source),
    vertices: graph.vertexCount,
    settled: settledOrder.length,
    stale_entries: staleEntries,
  });

  return { source, distances, predecessors, settledOrder, staleEntries };
}
