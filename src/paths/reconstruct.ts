import { CorruptPathDataError, UnknownVertexError } from "../errors.js";
import type { VertexId } from "../graph/model.js";
import { resolveIndex } from "./floydWarshall.js";
import type { AllPairsResult, PredecessorMap, SingleSourceResult } from "./types.js";

/**
 * Follows predecessor links backward from {@link target} until a vertex
 * without predecessor. The walk cannot tell the source from a vertex that was
 * never reached: an unreached target yields `[target]`, so check the distance
 * table first or use {@link reconstructPath}.
 */
export function walkPredecessors<V extends VertexId>(predecessors: PredecessorMap<V>, target: V): V[] {
  if (!predecessors.has(target)) {
    throw new UnknownVertexError(target, "target");
  }

  const reversed: V[] = [];
  let current: V | null = target;
  while (current !== null) {
    if (reversed.length >= predecessors.size) {
      throw new CorruptPathDataError("predecessor links form a cycle", { target: String(target) });
    }
    reversed.push(current);
    const previous: V | null = predecessors.get(current) ?? null;
    if (previous !== null && !predecessors.has(previous)) {
      throw new CorruptPathDataError(
        `predecessor '${String(previous)}' of '${String(current)}' is not a known vertex`,
        { target: String(target) },
      );
    }
    current = previous;
  }
  return reversed.reverse();
}

/**
 * Rebuilds the path `start -> end` by repeatedly jumping to
 * `nextHop[current][end]`. Returns an empty list when no path exists.
 */
export function walkNextHops<V extends VertexId>(result: AllPairsResult<V>, start: V, end: V): V[] {
  const startIndex = resolveIndex(result, start, "start");
  const endIndex = resolveIndex(result, end, "end");
  if (result.nextHop[startIndex][endIndex] === null) {
    return [];
  }

  const path: V[] = [start];
  let currentIndex = startIndex;
  let current = start;
  while (current !== end) {
    const hop = result.nextHop[currentIndex][endIndex];
    const hopIndex = hop === null ? undefined : result.indexOf.get(hop);
    if (hop === null || hopIndex === undefined || path.length >= result.vertices.length) {
      throw new CorruptPathDataError(`next hops from '${String(start)}' never reach '${String(end)}'`, {
        start: String(start),
        end: String(end),
        walked: path.map((vertex) => String(vertex)),
      });
    }
    path.push(hop);
    current = hop;
    currentIndex = hopIndex;
  }
  return path;
}

/**
 * Ordered vertices of the shortest path, or an empty list when none exists.
 *
 * A single-source result takes the target; an unreachable target yields `[]`.
 * An all-pairs result takes the start and end vertices.
 */
export function reconstructPath<V extends VertexId>(result: SingleSourceResult<V>, target: V): V[];
export function reconstructPath<V extends VertexId>(result: AllPairsResult<V>, start: V, end: V): V[];
export function reconstructPath<V extends VertexId>(
  result: SingleSourceResult<V> | AllPairsResult<V>,
  first: V,
  second?: V,
): V[] {
  if ("nextHop" in result) {
    if (second === undefined) {
      throw new TypeError("all-pairs reconstruction needs both a start and an end vertex");
    }
    return walkNextHops(result, first, second);
  }

  const distance = result.distances.get(first);
  if (distance === undefined) {
    throw new UnknownVertexError(first, "target");
  }
  if (distance === Number.POSITIVE_INFINITY) {
    return [];
  }
  const path = walkPredecessors(result.predecessors, first);
  if (path[0] !== result.source) {
    throw new CorruptPathDataError(`predecessor links of '${String(first)}' do not lead to the source`, {
      source: String(result.source),
      target: String(first),
    });
  }
  return path;
}
