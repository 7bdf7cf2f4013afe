export type {
  Connectivity,
  Edge,
  GraphDocument,
  Strategy,
} from "./types.js";

export { OutOfRangeError } from "./errors.js";

export {
  DisjointSet,
  isSize,
  isNode,
  sizeOf,
  toSize,
} from "./disjoint-set.js";
export type { DisjointSetOptions } from "./disjoint-set.js";

export { UnbalancedForest } from "./forest.js";
export { RepresentativeArray } from "./representatives.js";

export { components, componentGroups } from "./components.js";
export type { ComponentsOptions } from "./components.js";

export { buildNeighbours, reachable } from "./neighbours.js";

export { validate } from "./validate.js";
export type { ValidationError } from "./validate.js";

export {
  parseGraph,
  serializeGraph,
  loadGraph,
  saveGraph,
  GraphDocumentSchema,
} from "./yaml.js";
