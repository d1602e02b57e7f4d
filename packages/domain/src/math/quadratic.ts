/**
 * Smallest strictly positive real root of `a·x² + b·x + c = 0`.
 *
 * Falls back to the linear equation when `a` is zero. Returns `null` when the
 * discriminant is negative or no root is positive. Every model inversion goes
 * through here so that both of them stay on the pre-peak branch of the curve.
 */
export function smallestPositiveRoot(a: number, b: number, c: number): number | null {
  if (a === 0) {
    if (b === 0) {
      return null;
    }
    const root = -c / b;
    return root > 0 && Number.isFinite(root) ? root : null;
  }

  const discriminant = b * b - 4 * a * c;
  if (discriminant < 0 || !Number.isFinite(discriminant)) {
    return null;
  }

  // q carries the sign of b so the addition never cancels
  const sqrtDiscriminant = Math.sqrt(discriminant);
  const q = -0.5 * (b + (b >= 0 ? sqrtDiscriminant : -sqrtDiscriminant));
  const roots = q === 0 ? [0] : [q / a, c / q];

  let smallest: number | null = null;
  for (const root of roots) {
    if (root > 0 && Number.isFinite(root) && (smallest === null || root < smallest)) {
      smallest = root;
    }
  }
  return smallest;
}
