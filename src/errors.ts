import { z } from "zod";

import type { StructuredLogger } from "./logger.js";
import { ERROR_CODES, normaliseErrorHint, normaliseErrorMessage, type ErrorCode } from "./types.js";
import { omitUndefinedEntries } from "./utils/object.js";

/** Base error carrying a stable code, an operator hint and optional details. */
export class ShortestPathError extends Error {
  public readonly code: ErrorCode;
  public readonly hint?: string;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, hint?: string, details?: unknown) {
    super(message);
    this.name = "ShortestPathError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

/** Role played by a vertex in the request that referenced it. */
export type VertexRole = "source" | "target" | "start" | "end" | "vertex" | "edge destination";

/** Thrown when a source, target or edge destination is not part of the graph. */
export class UnknownVertexError extends ShortestPathError {
  declare readonly details: { vertex: string; role: VertexRole };

  constructor(vertex: unknown, role: VertexRole) {
    super(
      ERROR_CODES.PATH_UNKNOWN_VERTEX,
      role === "vertex" ? `unknown vertex '${String(vertex)}'` : `unknown ${role} vertex '${String(vertex)}'`,
      "use a vertex declared as a key of the adjacency mapping",
      { vertex: String(vertex), role },
    );
    this.name = "UnknownVertexError";
  }
}

/**
 * Thrown once a relaxation still succeeds after convergence. The optional
 * witness is a closed walk whose first vertex is repeated at the end.
 */
export class NegativeCycleError extends ShortestPathError {
  declare readonly details: { cycle: string[] | null; vertices: string[] };

  constructor(vertices: readonly unknown[], cycle: readonly unknown[] | null = null) {
    super(
      ERROR_CODES.PATH_NEGATIVE_CYCLE,
      "the graph contains a negative weight cycle",
      "shortest paths are undefined through a negative cycle",
      {
        cycle: cycle ? cycle.map((vertex) => String(vertex)) : null,
        vertices: vertices.map((vertex) => String(vertex)),
      },
    );
    this.name = "NegativeCycleError";
  }
}

/** Thrown by the all-pairs closure when the graph declares no vertex. */
export class EmptyGraphError extends ShortestPathError {
  constructor() {
    super(ERROR_CODES.PATH_EMPTY_GRAPH, "the input graph is empty", "declare at least one vertex");
    this.name = "EmptyGraphError";
  }
}

/** Thrown when an adjacency entry cannot be turned into a weighted edge. */
export class InvalidGraphError extends ShortestPathError {
  constructor(message: string, details?: unknown, hint = "declare each vertex once with finite edge weights") {
    super(ERROR_CODES.GRAPH_INVALID_INPUT, message, hint, details);
    this.name = "InvalidGraphError";
  }
}

/** Thrown when predecessor links or next hops loop or point outside the tables. */
export class CorruptPathDataError extends ShortestPathError {
  constructor(message: string, details?: unknown) {
    super(ERROR_CODES.PATH_CORRUPT, message, "recompute the tables instead of editing them", details);
    this.name = "CorruptPathDataError";
  }
}

/** Normalised representation of a thrown value. */
export interface NormalisedError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/** JSON payload printed by the command line when a run fails. */
export interface FailurePayload extends NormalisedError {
  ok: false;
}

/**
 * Normalises an arbitrary thrown value. Zod validation errors map to the
 * invalid-input code; errors exposing a string `code` keep it.
 */
export function normaliseError(error: unknown): NormalisedError {
  const message = error instanceof Error ? error.message : String(error);
  let code: string = ERROR_CODES.PATH_UNEXPECTED;
  let hint: string | undefined;
  let details: unknown;

  if (error instanceof z.ZodError) {
    code = ERROR_CODES.GRAPH_INVALID_INPUT;
    hint = "invalid_input";
    details = { issues: error.issues };
  } else if (error instanceof ShortestPathError) {
    code = error.code;
    hint = error.hint;
    details = error.details;
  } else if (error instanceof Error && "code" in error && typeof error.code === "string") {
    code = error.code;
  }

  return {
    code,
    message: normaliseErrorMessage(message),
    ...omitUndefinedEntries({
      hint: normaliseErrorHint(hint),
      details,
    }),
  };
}

/** Logs the failure and returns the payload surfaced to JSON consumers. */
export function describeFailure(
  logger: StructuredLogger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): FailurePayload {
  const normalised = normaliseError(error);
  logger.error(`${operation}_failed`, {
    ...context,
    code: normalised.code,
    message: normalised.message,
    details: normalised.details,
  });
  return { ok: false, ...normalised };
}
