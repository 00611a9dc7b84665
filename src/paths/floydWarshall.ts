import { EmptyGraphError, NegativeCycleError, UnknownVertexError, type VertexRole } from "../errors.js";
import type { GraphModel, VertexId } from "../graph/model.js";
import type { AlgorithmOptions, AllPairsResult } from "./types.js";

export interface AllPairsOptions extends AlgorithmOptions {
  /**
   * Inspects the diagonal once the closure ends and throws
   * {@link NegativeCycleError} when a vertex reaches itself at negative cost.
   * Disabled by default: without it, distances involving a negative cycle are
   * returned as computed and carry no meaning.
   */
  readonly detectNegativeCycles?: boolean;
}

/**
 * Shortest distances between every ordered pair of vertices, in cubic time.
 *
 * The diagonal starts at 0, direct edges seed both matrices (the lightest of
 * parallel edges wins) and every vertex is then tried as an intermediate hop
 * in vertex order. An improvement through `k` copies the first hop toward `k`
 * into `nextHop[i][j]`, which keeps path reconstruction a forward walk.
 */
export function allPairs<V extends VertexId>(
  graph: GraphModel<V>,
  options: AllPairsOptions = {},
): AllPairsResult<V> {
  const vertices = graph.listVertices();
  const size = vertices.length;
  if (size === 0) {
    throw new EmptyGraphError();
  }

  const indexOf = new Map<V, number>();
  vertices.forEach((vertex, index) => indexOf.set(vertex, index));

  const distances: number[][] = [];
  const nextHop: Array<Array<V | null>> = [];
  for (let i = 0; i < size; i += 1) {
    distances.push(new Array<number>(size).fill(Number.POSITIVE_INFINITY));
    nextHop.push(new Array<V | null>(size).fill(null));
    distances[i][i] = 0;
  }

  for (const { from, to, weight } of graph.listEdges()) {
    const i = indexOf.get(from);
    const j = indexOf.get(to);
    if (i === undefined || j === undefined) {
      continue;
    }
    // A non-negative self-loop never beats staying put.
    if (weight < distances[i][j]) {
      distances[i][j] = weight;
      nextHop[i][j] = to;
    }
  }

  let improvements = 0;
  for (let k = 0; k < size; k += 1) {
    const throughK = distances[k];
    for (let i = 0; i < size; i += 1) {
      const toK = distances[i][k];
      if (toK === Number.POSITIVE_INFINITY) {
        continue;
      }
      const row = distances[i];
      for (let j = 0; j < size; j += 1) {
        const candidate = toK + throughK[j];
        if (candidate < row[j]) {
          row[j] = candidate;
          nextHop[i][j] = nextHop[i][k];
          improvements += 1;
        }
      }
    }
  }

  const result: AllPairsResult<V> = { vertices, indexOf, distances, nextHop };

  options.logger?.debug("floyd_warshall_completed", {
    vertices: size,
    edges: graph.edgeCount,
    improvements,
  });

  if (options.detectNegativeCycles) {
    const negative = findNegativeDiagonal(result);
    if (negative.length > 0) {
      throw new NegativeCycleError(negative);
    }
  }

  return result;
}

/** Vertices whose distance to themselves is negative, i.e. that sit on a negative cycle. */
export function findNegativeDiagonal<V extends VertexId>(result: AllPairsResult<V>): V[] {
  return result.vertices.filter((_vertex, index) => result.distances[index][index] < 0);
}

/** Row/column index of {@link vertex} in the matrices of {@link result}. */
export function resolveIndex<V extends VertexId>(
  result: Pick<AllPairsResult<V>, "indexOf">,
  vertex: V,
  role: VertexRole,
): number {
  const index = result.indexOf.get(vertex);
  if (index === undefined) {
    throw new UnknownVertexError(vertex, role);
  }
  return index;
}

export function distanceBetween<V extends VertexId>(result: AllPairsResult<V>, from: V, to: V): number {
  return result.distances[resolveIndex(result, from, "start")][resolveIndex(result, to, "end")];
}
