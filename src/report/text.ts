import type { VertexId } from "../graph/model.js";
import { reconstructPath } from "../paths/reconstruct.js";
import type { AllPairsResult, SingleSourceResult } from "../paths/types.js";

/** Renders a distance, `∞` standing for unreachable. */
export function formatDistance(distance: number): string {
  if (distance === Number.POSITIVE_INFINITY) {
    return "∞";
  }
  if (distance === Number.NEGATIVE_INFINITY) {
    return "-∞";
  }
  return String(distance);
}

export function formatPath<V extends VertexId>(path: readonly V[]): string {
  return path.length === 0 ? "No path" : path.map((vertex) => String(vertex)).join(" -> ");
}

export function formatDistances<V extends VertexId>(result: SingleSourceResult<V>): string {
  const lines = [`Shortest distances from source '${String(result.source)}':`];
  for (const [vertex, distance] of result.distances) {
    lines.push(`${String(vertex)}: ${formatDistance(distance)}`);
  }
  return lines.join("\n");
}

/** Lists the path to every vertex, or to {@link targets} only when given. */
export function formatSingleSourcePaths<V extends VertexId>(
  result: SingleSourceResult<V>,
  targets: readonly V[] = [...result.distances.keys()],
): string {
  const lines = [`Shortest paths from source '${String(result.source)}':`];
  for (const target of targets) {
    lines.push(`Path to ${String(target)}: ${formatPath(reconstructPath(result, target))}`);
  }
  return lines.join("\n");
}

/**
 * Renders the distance matrix with right-aligned cells. Every column shares the
 * width of the widest label or value; trailing spaces are trimmed.
 */
export function formatMatrix<V extends VertexId>(
  result: AllPairsResult<V>,
  title = "Shortest path distance matrix",
): string {
  const labels = result.vertices.map((vertex) => String(vertex));
  const cells = result.distances.map((row) => row.map((distance) => formatDistance(distance)));
  const labelWidth = Math.max(...labels.map((label) => label.length));
  const cellWidth = Math.max(labelWidth, ...cells.flat().map((cell) => cell.length));

  const renderLine = (head: string, values: readonly string[]): string =>
    [head.padEnd(labelWidth), ...values.map((value) => value.padStart(cellWidth))].join("  ").trimEnd();

  const lines = [`${title}:`, renderLine("", labels)];
  cells.forEach((row, index) => lines.push(renderLine(labels[index], row)));
  return lines.join("\n");
}

/** One line per ordered pair of distinct vertices. */
export function formatAllPairsPaths<V extends VertexId>(result: AllPairsResult<V>): string {
  const lines = ["Shortest paths between vertices:"];
  for (const start of result.vertices) {
    for (const end of result.vertices) {
      if (start === end) {
        continue;
      }
      lines.push(`Path from ${String(start)} to ${String(end)}: ${formatPath(reconstructPath(result, start, end))}`);
    }
  }
  return lines.join("\n");
}

/** JSON-safe distance: `null` replaces the infinities JSON cannot encode. */
export function toJsonDistance(distance: number): number | null {
  return Number.isFinite(distance) ? distance : null;
}

export interface SingleSourceJsonReport {
  algorithm: string;
  source: string;
  distances: Record<string, number | null>;
  paths: Record<string, string[]>;
}

export function singleSourceToJson<V extends VertexId>(
  algorithm: string,
  result: SingleSourceResult<V>,
  targets: readonly V[] = [...result.distances.keys()],
): SingleSourceJsonReport {
  const distances: Record<string, number | null> = {};
  const paths: Record<string, string[]> = {};
  for (const target of targets) {
    const key = String(target);
    distances[key] = toJsonDistance(result.distances.get(target) ?? Number.POSITIVE_INFINITY);
    paths[key] = reconstructPath(result, target).map((vertex) => String(vertex));
  }
  return { algorithm, source: String(result.source), distances, paths };
}

export interface AllPairsJsonReport {
  algorithm: string;
  vertices: string[];
  distances: Array<Array<number | null>>;
  paths: Record<string, Record<string, string[]>>;
}

export function allPairsToJson<V extends VertexId>(algorithm: string, result: AllPairsResult<V>): AllPairsJsonReport {
  const paths: Record<string, Record<string, string[]>> = {};
  for (const start of result.vertices) {
    const row: Record<string, string[]> = {};
    for (const end of result.vertices) {
      if (start !== end) {
        row[String(end)] = reconstructPath(result, start, end).map((vertex) => String(vertex));
      }
    }
    paths[String(start)] = row;
  }
  return {
    algorithm,
    vertices: result.vertices.map((vertex) => String(vertex)),
    distances: result.distances.map((row) => row.map(toJsonDistance)),
    paths,
  };
}
