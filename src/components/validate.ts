import type { GraphDocument } from "./types.js";

export interface ValidationError {
  rule: string;
  message: string;
  path?: string;
}

export function validate(graph: GraphDocument): ValidationError[] {
  const errors: ValidationError[] = [];

  checkNodeCount(graph, errors);
  checkEdgeEndpoints(graph, errors);

  return errors;
}

// Rule: The node count must be a non-negative integer
function checkNodeCount(graph: GraphDocument, errors: ValidationError[]): void {
  if (!Number.isInteger(graph.nodes) || graph.nodes < 0) {
    errors.push({
      rule: "node-count",
      message: `Graph has invalid node count: ${graph.nodes} (must be a non-negative integer)`,
      path: "nodes",
    });
  }
}

// Rule: Every endpoint must be an integer node index in [0, nodes)
function checkEdgeEndpoints(
  graph: GraphDocument,
  errors: ValidationError[]
): void {
  graph.edges.forEach((edge, i) => {
    for (const endpoint of edge) {
      if (!Number.isInteger(endpoint)) {
        errors.push({
          rule: "edge-endpoint-integer",
          message: `Edge ${i} has non-integer endpoint ${endpoint}`,
          path: `edges.${i}`,
        });
      } else if (endpoint < 0 || endpoint >= graph.nodes) {
        errors.push({
          rule: "edge-endpoint-range",
          message: `Edge ${i} endpoint ${endpoint} is outside [0, ${graph.nodes})`,
          path: `edges.${i}`,
        });
      }
    }
  });
}
