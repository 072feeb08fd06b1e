/**
 * @fileoverview Byte-wise comparison of two buffers
 */

interface CompareResult {
  /** Offsets that differ within the common length, ascending */
  differences: number[];
  /** Stopped at the limit before the end of the common length */
  truncated: boolean;
  sizeMismatch: boolean;
  leftSize: number;
  rightSize: number;
}

/**
 * Offsets where `left` and `right` differ over their common length
 */
function findDifferences(left: Uint8Array, right: Uint8Array, limit: number = Number.POSITIVE_INFINITY): CompareResult {
  const common = Math.min(left.length, right.length);
  const differences: number[] = [];
  let truncated = false;

  for (let i = 0; i < common; i++) {
    if (left[i] === right[i]) continue;
    if (differences.length >= limit) {
      truncated = true;
      break;
    }
    differences.push(i);
  }

  return {
    differences,
    truncated,
    sizeMismatch: left.length !== right.length,
    leftSize: left.length,
    rightSize: right.length
  };
}

function isIdentical(result: CompareResult): boolean {
  return !result.sizeMismatch && result.differences.length === 0;
}

export {
  findDifferences,
  isIdentical,
  type CompareResult
};
