/**
 * Thrown when a node index falls outside `[0, size)`. This is a caller
 * contract violation: the structure is left untouched and the index is never
 * clamped.
 */
export class OutOfRangeError extends RangeError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number, message?: string) {
    super(message ?? `Node index ${index} is out of range [0, ${size})`);
    this.name = "OutOfRangeError";
    this.index = index;
    this.size = size;
  }
}

export function checkIndex(index: number, size: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new OutOfRangeError(index, size);
  }
}

export function checkNodeCount(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new OutOfRangeError(
      n,
      0,
      `Node count ${n} must be a non-negative integer`
    );
  }
}
