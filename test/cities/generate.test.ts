import { describe, it } from "node:test";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as assert from "node:assert/strict";
import { main, randomRoads } from "../../data/cities/generate.js";
import { validate } from "../../src/components/validate.js";
import { loadGraph } from "../../src/components/yaml.js";

function withTempDir(run: (dir: string) => void): void {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "graph-components-"));
  try {
    run(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

describe("randomRoads", () => {
  it("produces distinct roads between different towns", () => {
    const graph = randomRoads(6, 4);
    assert.equal(graph.nodes, 6);
    assert.equal(graph.edges.length, 4);
    assert.deepEqual(validate(graph), []);
    const keys = graph.edges.map(([v, w]) => (v < w ? `${v}-${w}` : `${w}-${v}`));
    assert.equal(new Set(keys).size, 4);
    for (const [v, w] of graph.edges) assert.notEqual(v, w);
  });

  it("is deterministic for the same counts", () => {
    assert.deepEqual(randomRoads(10, 7), randomRoads(10, 7));
  });

  it("stops once every pair of towns has a road", () => {
    assert.equal(randomRoads(3, 10).edges.length, 3);
    assert.deepEqual(randomRoads(0, 5), { nodes: 0, edges: [] });
  });

  it("rejects counts that are not non-negative integers", () => {
    assert.throws(() => randomRoads(-3, 4), {
      message: "Town count must be a non-negative integer, got -3",
    });
    assert.throws(() => randomRoads(4, 1.5), {
      message: "Road count must be a non-negative integer, got 1.5",
    });
    assert.throws(() => randomRoads(Number("many"), 4), {
      message: "Town count must be a non-negative integer, got NaN",
    });
  });
});

describe("main", () => {
  it("writes nothing for an invalid town count", () => {
    withTempDir((dir) => {
      assert.equal(main(["-3", "4"], dir), 1);
      assert.equal(fs.existsSync(path.join(dir, "random-roads.yaml")), false);
    });
  });

  it("writes a valid graph document", () => {
    withTempDir((dir) => {
      assert.equal(main(["5", "3"], dir), 0);
      const graph = loadGraph(path.join(dir, "random-roads.yaml"));
      assert.equal(graph.nodes, 5);
      assert.equal(graph.edges.length, 3);
      assert.deepEqual(validate(graph), []);
    });
  });
});
