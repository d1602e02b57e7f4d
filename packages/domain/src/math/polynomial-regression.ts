import { type Vector3, solveLinearSystem } from './linear-system';

export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Ordinary least-squares fit of `y ≈ a + b·x + c·x²` through the normal
 * equations. Returns `[a, b, c]`, or `null` when the system is singular.
 */
export function fitQuadratic(points: readonly Point[]): Vector3 | null {
  // powers[k] = Σ xᵏ for k in 0..4, moments[k] = Σ y·xᵏ for k in 0..2
  const powers = [0, 0, 0, 0, 0];
  const moments = [0, 0, 0];

  for (const { x, y } of points) {
    const x2 = x * x;
    powers[0] += 1;
    powers[1] += x;
    powers[2] += x2;
    powers[3] += x2 * x;
    powers[4] += x2 * x2;
    moments[0] += y;
    moments[1] += y * x;
    moments[2] += y * x2;
  }

  return solveLinearSystem(
    [
      [powers[0], powers[1], powers[2]],
      [powers[1], powers[2], powers[3]],
      [powers[2], powers[3], powers[4]],
    ],
    [moments[0], moments[1], moments[2]]
  );
}
