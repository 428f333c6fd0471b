import type { CornerParams, CornerPathParams } from '../types';

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Control distances for a single squircle corner.
 *
 * Follows the construction from "Desperately seeking squircles" (Figma blog): the 90deg
 * turn is split into a circular arc of `arcMeasure` degrees flanked by two cubic curves
 * that absorb the rest of the turn. `p` is how far along each side the corner reaches.
 *
 * Without `preserveSmoothing` a corner that does not fit its budget gets a lower
 * smoothing value. With it, the smoothing stays and the outer control points (a, b)
 * are pulled in instead.
 */
export function getPathParamsForCorner(params: CornerParams): CornerPathParams {
  const { cornerRadius, preserveSmoothing, roundingAndSmoothingBudget: budget } = params;

  // A square corner. Must be handled before `budget / cornerRadius` below.
  if (cornerRadius === 0) {
    return { a: 0, b: 0, c: 0, d: 0, p: 0, cornerRadius: 0, arcSectionLength: 0 };
  }

  let cornerSmoothing = params.cornerSmoothing;
  // p = (1 + smoothing) * q, and q = R for a 90deg corner
  let p = (1 + cornerSmoothing) * cornerRadius;

  if (!preserveSmoothing) {
    const maxCornerSmoothing = budget / cornerRadius - 1;
    cornerSmoothing = Math.min(cornerSmoothing, maxCornerSmoothing);
    p = Math.min(p, budget);
  }

  const arcMeasure = 90 * (1 - cornerSmoothing);
  const arcSectionLength = Math.sin(toRadians(arcMeasure / 2)) * cornerRadius * Math.SQRT2;

  // distance between the two control points closest to the arc
  const angleAlpha = (90 - arcMeasure) / 2;
  const p3ToP4Distance = cornerRadius * Math.tan(toRadians(angleAlpha / 2));

  const angleBeta = toRadians(45 * cornerSmoothing);
  const c = p3ToP4Distance * Math.cos(angleBeta);
  const d = c * Math.tan(angleBeta);

  let b = (p - arcSectionLength - c - d) / 3;
  let a = 2 * b;

  if (preserveSmoothing && p > budget) {
    const p1ToP3MaxDistance = budget - d - arcSectionLength - c;
    // keep a gap between P1 and P2 so the curve does not fold
    const minA = p1ToP3MaxDistance / 6;
    const maxB = p1ToP3MaxDistance - minA;

    b = Math.min(b, maxB);
    a = p1ToP3MaxDistance - b;
    p = Math.min(p, budget);
  }

  return { a, b, c, d, p, cornerRadius, arcSectionLength };
}
