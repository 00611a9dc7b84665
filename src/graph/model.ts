import { InvalidGraphError, UnknownVertexError, type VertexRole } from "../errors.js";

/**
 * Identifier of a vertex. Vertices are compared the way `Map` keys are, so
 * labels must be primitives.
 */
export type VertexId = string | number;

export interface OutgoingEdge<V extends VertexId = string> {
  readonly to: V;
  readonly weight: number;
}

export interface WeightedEdge<V extends VertexId = string> {
  readonly from: V;
  readonly to: V;
  readonly weight: number;
}

/** Edge as accepted by the constructor: `[to, weight]` or `{ to, weight }`. */
export type EdgeInput<V extends VertexId = string> = readonly [V, number] | OutgoingEdge<V>;

/** Adjacency entries accepted by the constructor; a `Map` qualifies as-is. */
export type AdjacencyInput<V extends VertexId = string> = Iterable<readonly [V, readonly EdgeInput<V>[]]>;

/**
 * Immutable weighted directed graph keyed by vertex. The vertex set is closed:
 * every edge destination must also be a key of the adjacency mapping. Parallel
 * edges are kept as given; algorithms decide which one wins.
 */
export class GraphModel<V extends VertexId = string> {
  private readonly adjacency: Map<V, readonly OutgoingEdge<V>[]>;
  private readonly vertices: readonly V[];
  private readonly edges: readonly WeightedEdge<V>[];

  constructor(adjacency: AdjacencyInput<V>) {
    this.adjacency = new Map();
    const pending: Array<[V, readonly EdgeInput<V>[]]> = [];

    for (const [vertex, edges] of adjacency) {
      if (this.adjacency.has(vertex)) {
        throw new InvalidGraphError(`vertex '${String(vertex)}' is declared twice`, { vertex: String(vertex) });
      }
      this.adjacency.set(vertex, []);
      pending.push([vertex, edges]);
    }

    const flattened: WeightedEdge<V>[] = [];
    for (const [from, edges] of pending) {
      const outgoing: OutgoingEdge<V>[] = [];
      for (const edge of edges) {
        const normalised = normaliseEdge(edge);
        if (!this.adjacency.has(normalised.to)) {
          throw new UnknownVertexError(normalised.to, "edge destination");
        }
        if (typeof normalised.weight !== "number" || !Number.isFinite(normalised.weight)) {
          throw new InvalidGraphError(
            `edge '${String(from)}' -> '${String(normalised.to)}' has a non-finite weight`,
            { from: String(from), to: String(normalised.to), weight: String(normalised.weight) },
          );
        }
        outgoing.push(Object.freeze(normalised));
        flattened.push(Object.freeze({ from, to: normalised.to, weight: normalised.weight }));
      }
      this.adjacency.set(from, Object.freeze(outgoing));
    }

    this.vertices = Object.freeze([...this.adjacency.keys()]);
    this.edges = Object.freeze(flattened);
  }

  /** Builds a graph over string labels from a plain adjacency record. */
  static fromRecord(record: Readonly<Record<string, readonly EdgeInput<string>[]>>): GraphModel<string> {
    return new GraphModel<string>(Object.entries(record));
  }

  get vertexCount(): number {
    return this.vertices.length;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  hasVertex(vertex: V): boolean {
    return this.adjacency.has(vertex);
  }

  /** Throws {@link UnknownVertexError} when {@link vertex} is not in the graph. */
  assertVertex(vertex: V, role: VertexRole = "vertex"): void {
    if (!this.adjacency.has(vertex)) {
      throw new UnknownVertexError(vertex, role);
    }
  }

  /** Vertices in declaration order. */
  listVertices(): readonly V[] {
    return this.vertices;
  }

  /** Every edge, grouped by origin in vertex order then in adjacency order. */
  listEdges(): readonly WeightedEdge<V>[] {
    return this.edges;
  }

  getOutgoing(vertex: V): readonly OutgoingEdge<V>[] {
    const outgoing = this.adjacency.get(vertex);
    if (!outgoing) {
      throw new UnknownVertexError(vertex, "vertex");
    }
    return outgoing;
  }

  /** Weight of the lightest direct edge `from -> to`, if any. */
  edgeWeight(from: V, to: V): number | undefined {
    let best: number | undefined;
    for (const edge of this.getOutgoing(from)) {
      if (edge.to === to && (best === undefined || edge.weight < best)) {
        best = edge.weight;
      }
    }
    return best;
  }

  /**
   * Sums the lightest edge weight of every hop. A hop without an edge makes the
   * cost infinite; empty and single-vertex paths cost nothing.
   */
  pathCost(path: readonly V[]): number {
    let total = 0;
    for (let index = 1; index < path.length; index += 1) {
      const weight = this.edgeWeight(path[index - 1], path[index]);
      if (weight === undefined) {
        return Number.POSITIVE_INFINITY;
      }
      total += weight;
    }
    return total;
  }
}

function normaliseEdge<V extends VertexId>(edge: EdgeInput<V>): OutgoingEdge<V> {
  if ("to" in edge) {
    return { to: edge.to, weight: edge.weight };
  }
  const [to, weight] = edge;
  return { to, weight };
}
