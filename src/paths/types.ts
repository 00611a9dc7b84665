import type { StructuredLogger } from "../logger.js";
import type { VertexId } from "../graph/model.js";

/** Best known distance per vertex; `Number.POSITIVE_INFINITY` marks unreachable vertices. */
export type DistanceTable<V extends VertexId = string> = ReadonlyMap<V, number>;

/** Previous vertex on the shortest path, `null` for the source and unreached vertices. */
export type PredecessorMap<V extends VertexId = string> = ReadonlyMap<V, V | null>;

/** Row/column-indexed next hop toward a destination, `null` when no path exists. */
export type NextHopMatrix<V extends VertexId = string> = ReadonlyArray<ReadonlyArray<V | null>>;

/** Row/column-indexed distances between every ordered pair of vertices. */
export type DistanceMatrix = ReadonlyArray<ReadonlyArray<number>>;

export interface SingleSourceResult<V extends VertexId = string> {
  readonly source: V;
  readonly distances: DistanceTable<V>;
  readonly predecessors: PredecessorMap<V>;
}

export interface AllPairsResult<V extends VertexId = string> {
  /** Vertex order used by the rows and columns of both matrices. */
  readonly vertices: readonly V[];
  readonly indexOf: ReadonlyMap<V, number>;
  readonly distances: DistanceMatrix;
  readonly nextHop: NextHopMatrix<V>;
}

/** Options shared by every algorithm. */
export interface AlgorithmOptions {
  /** Receives a `debug` summary once the computation ends. */
  readonly logger?: StructuredLogger;
}
