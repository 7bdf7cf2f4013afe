import type { Connectivity } from "./types.js";
import { checkIndex, checkNodeCount } from "./errors.js";

/**
 * Each node stores the label of its component. Merging relabels every node
 * that carries the absorbed label, so a union costs O(n).
 */
export class RepresentativeArray implements Connectivity {
  readonly size: number;
  private readonly labels: number[];

  constructor(n: number) {
    checkNodeCount(n);
    this.size = n;
    this.labels = Array.from({ length: n }, (_, i) => i);
  }

  find(v: number): number {
    checkIndex(v, this.size);
    return this.labels[v];
  }

  union(v: number, w: number): boolean {
    const labelV = this.find(v);
    const labelW = this.find(w);
    if (labelV === labelW) return false;

    for (let i = 0; i < this.size; i++) {
      if (this.labels[i] === labelW) this.labels[i] = labelV;
    }
    return true;
  }

  connected(v: number, w: number): boolean {
    return this.find(v) === this.find(w);
  }

  toArray(): number[] {
    return [...this.labels];
  }
}
