import { readFile } from "node:fs/promises";
import { z } from "zod";

import { InvalidGraphError } from "../errors.js";
import { GraphModel } from "./model.js";

const VertexLabelSchema = z.string().min(1, "vertex label must not be empty");

const WeightSchema = z.number().finite("edge weight must be a finite number");

/** Edge written either as `["B", 3]` or as `{ "to": "B", "weight": 3 }`. */
export const EdgeDescriptorSchema = z.union([
  z.tuple([VertexLabelSchema, WeightSchema]),
  z.object({ to: VertexLabelSchema, weight: WeightSchema }).strict(),
]);

/** JSON graph document: every vertex label mapped to its outgoing edges. */
export const GraphDescriptorSchema = z.record(VertexLabelSchema, z.array(EdgeDescriptorSchema));

export type GraphDescriptor = z.infer<typeof GraphDescriptorSchema>;

/**
 * Validates a decoded JSON document and builds the graph. Schema violations
 * surface as `ZodError`; destinations missing from the keys raise
 * `UnknownVertexError`.
 */
export function parseGraphDescriptor(input: unknown): GraphModel<string> {
  const descriptor = GraphDescriptorSchema.parse(input);
  return GraphModel.fromRecord(descriptor);
}

export async function loadGraphFile(file: string): Promise<GraphModel<string>> {
  const contents = await readFile(file, "utf8");
  let decoded: unknown;
  try {
    decoded = JSON.parse(contents);
  } catch (error) {
    throw new InvalidGraphError(
      `graph file '${file}' is not valid JSON`,
      { file, reason: error instanceof Error ? error.message : String(error) },
      "the graph file must contain a single JSON object",
    );
  }
  return parseGraphDescriptor(decoded);
}
