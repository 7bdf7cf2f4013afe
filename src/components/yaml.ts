import * as fs from "node:fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import type { GraphDocument } from "./types.js";

const EndpointSchema = z.number({ error: "Edge endpoints must be numbers" });

const EdgeSchema = z.tuple([EndpointSchema, EndpointSchema], {
  error: "Edges must be a pair of node indices",
});

/**
 * Shape of a graph document. Range rules (non-negative counts, endpoints
 * inside the node range) are left to validate().
 */
export const GraphDocumentSchema = z.object(
  {
    nodes: z.number({ error: "Node count must be a number" }),
    edges: z.array(EdgeSchema, { error: "Edges must be a list" }).default([]),
  },
  { error: "Expected a YAML object" }
);

/**
 * Parse a YAML string into a GraphDocument. Throws when the document does
 * not have the shape of a graph; call validate() on the result for range
 * checks before computing with it.
 */
export function parseGraph(yamlString: string): GraphDocument {
  const parsed = GraphDocumentSchema.safeParse(yaml.load(yamlString));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.message} (at ${issue.path.map(String).join(".")})`
        : issue.message
    );
    throw new Error(`Invalid graph: ${problems.join("; ")}`);
  }
  return parsed.data;
}

export function serializeGraph(graph: GraphDocument): string {
  return yaml.dump(graph, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
    flowLevel: 2,
  });
}

export function loadGraph(filePath: string): GraphDocument {
  const content = fs.readFileSync(filePath, "utf-8");
  return parseGraph(content);
}

export function saveGraph(graph: GraphDocument, filePath: string): void {
  const content = serializeGraph(graph);
  fs.writeFileSync(filePath, content, "utf-8");
}
