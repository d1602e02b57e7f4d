export type Vector3 = readonly [number, number, number];
export type Matrix3 = readonly [Vector3, Vector3, Vector3];

/**
 * Solves `matrix · x = rhs` by Gaussian elimination with partial pivoting.
 *
 * Returns `null` when a pivot is exactly zero or the solution is not finite.
 */
export function solveLinearSystem(matrix: Matrix3, rhs: Vector3): Vector3 | null {
  const size = 3;
  const augmented = matrix.map((row, index) => [...row, rhs[index]]);

  for (let column = 0; column < size; column += 1) {
    let pivotRow = column;
    for (let row = column + 1; row < size; row += 1) {
      if (Math.abs(augmented[row][column]) > Math.abs(augmented[pivotRow][column])) {
        pivotRow = row;
      }
    }

    const pivot = augmented[pivotRow][column];
    if (pivot === 0 || !Number.isFinite(pivot)) {
      return null;
    }

    if (pivotRow !== column) {
      [augmented[column], augmented[pivotRow]] = [augmented[pivotRow], augmented[column]];
    }

    for (let row = column + 1; row < size; row += 1) {
      const factor = augmented[row][column] / pivot;
      for (let k = column; k <= size; k += 1) {
        augmented[row][k] -= factor * augmented[column][k];
      }
    }
  }

  const solution = [0, 0, 0];
  for (let row = size - 1; row >= 0; row -= 1) {
    let sum = augmented[row][size];
    for (let k = row + 1; k < size; k += 1) {
      sum -= augmented[row][k] * solution[k];
    }
    solution[row] = sum / augmented[row][row];
  }

  if (!solution.every(Number.isFinite)) {
    return null;
  }
  return [solution[0], solution[1], solution[2]];
}
