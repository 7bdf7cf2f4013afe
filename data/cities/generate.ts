/**
 * Generate a random road network for connectivity testing.
 * Run: npx tsx data/cities/generate.ts [towns] [roads]
 * Or: tsc && node dist/data/cities/generate.js
 *
 * Output is deterministic for a given town and road count.
 */
import * as path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import type { Edge, GraphDocument } from "../../src/components/types.js";
import { components } from "../../src/components/components.js";
import { validate } from "../../src/components/validate.js";
import { saveGraph } from "../../src/components/yaml.js";

const DIR = path.dirname(fileURLToPath(import.meta.url));

function checkCount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${label} must be a non-negative integer, got ${value}`);
  }
}

/** Distinct unordered town pairs, no loops, at most `roadCount` of them. */
export function randomRoads(
  towns: number,
  roadCount: number,
  seed = 42
): GraphDocument {
  checkCount("Town count", towns);
  checkCount("Road count", roadCount);

  // Deterministic pseudo-random (seeded LCG)
  let state = seed;
  const randInt = (min: number, max: number): number => {
    state = (state * 1664525 + 1013904223) & 0x7fffffff;
    return Math.floor((state / 0x7fffffff) * (max - min + 1)) + min;
  };

  const roads: Edge[] = [];
  const roadSet = new Set<string>();
  while (roads.length < roadCount && roadSet.size < (towns * (towns - 1)) / 2) {
    const v = randInt(0, towns - 1);
    const w = randInt(0, towns - 1);
    if (v === w) continue;
    const key = v < w ? `${v}-${w}` : `${w}-${v}`;
    if (roadSet.has(key)) continue;
    roadSet.add(key);
    roads.push([v, w]);
  }

  const graph = { nodes: towns, edges: roads };
  const errors = validate(graph);
  if (errors.length > 0) {
    throw new Error(errors.map((e) => e.message).join("; "));
  }
  return graph;
}

/** Writes `random-roads.yaml` into `dir`. Returns the process exit code. */
export function main(args: string[], dir: string = DIR): number {
  const towns = Number(args[0] ?? 40);
  const roadCount = Number(args[1] ?? 30);

  let graph: GraphDocument;
  try {
    graph = randomRoads(towns, roadCount);
  } catch (err) {
    console.error(`Cannot generate road network: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const filepath = path.join(dir, "random-roads.yaml");
  console.log("Generating road network...");
  saveGraph(graph, filepath);
  console.log(`  ${path.basename(filepath)}: ${towns} towns, ${graph.edges.length} roads`);

  // Print summary
  const network = components(graph.nodes, graph.edges);
  const regions = network.groups();
  const largest = Math.max(0, ...regions.map((r) => r.length));
  console.log(`\nSummary:`);
  console.log(`  Regions: ${network.componentCount}`);
  console.log(`  Largest region: ${largest} towns`);
  console.log(`  Isolated towns: ${regions.filter((r) => r.length === 1).length}`);
  return 0;
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = main(process.argv.slice(2));
}
