import { describe, expect, it } from 'vitest';
import { getPathParamsForCorner } from './corner';
import type { CornerPathParams } from '../types';

// Distance the corner covers along each side; equals p when the curve is consistent.
function reach({ a, b, c, d, arcSectionLength }: CornerPathParams): number {
  return a + b + c + d + arcSectionLength;
}

describe('getPathParamsForCorner', () => {
  it('collapses a zero radius to a square corner', () => {
    const params = getPathParamsForCorner({
      cornerRadius: 0,
      cornerSmoothing: 0.6,
      preserveSmoothing: false,
      roundingAndSmoothingBudget: 0,
    });
    expect(params).toEqual({ a: 0, b: 0, c: 0, d: 0, p: 0, cornerRadius: 0, arcSectionLength: 0 });
  });

  it('draws a plain quarter circle without smoothing', () => {
    const params = getPathParamsForCorner({
      cornerRadius: 20,
      cornerSmoothing: 0,
      preserveSmoothing: false,
      roundingAndSmoothingBudget: 50,
    });

    expect(params.p).toBe(20);
    expect(params.arcSectionLength).toBeCloseTo(20, 10);
    expect(params.c).toBe(0);
    expect(params.d).toBe(0);
    expect(params.a).toBeCloseTo(0, 10);
    expect(params.b).toBeCloseTo(0, 10);
  });

  it('replaces the arc with two curves at full smoothing', () => {
    const params = getPathParamsForCorner({
      cornerRadius: 50,
      cornerSmoothing: 1,
      preserveSmoothing: false,
      roundingAndSmoothingBudget: 100,
    });

    expect(params.p).toBe(100);
    expect(params.arcSectionLength).toBe(0);
    // c = d = R * (1 - 1/sqrt(2)) for a 45deg beta
    expect(params.c).toBeCloseTo(14.644661, 5);
    expect(params.d).toBeCloseTo(14.644661, 5);
    expect(params.b).toBeCloseTo(23.570226, 5);
    expect(params.a).toBeCloseTo(47.140452, 5);
  });

  it('gives the same result in both modes when the budget is large enough', () => {
    const base = { cornerRadius: 50, cornerSmoothing: 1, roundingAndSmoothingBudget: 100 };
    expect(getPathParamsForCorner({ ...base, preserveSmoothing: true })).toEqual(
      getPathParamsForCorner({ ...base, preserveSmoothing: false }),
    );
  });

  it('lowers the smoothing when the budget is tight', () => {
    const params = getPathParamsForCorner({
      cornerRadius: 50,
      cornerSmoothing: 1,
      preserveSmoothing: false,
      roundingAndSmoothingBudget: 60,
    });

    expect(params.p).toBe(60);
    // smoothing drops to 60 / 50 - 1, so a real arc of 72deg remains
    expect(params.arcSectionLength).toBeCloseTo(Math.sin((36 * Math.PI) / 180) * 50 * Math.SQRT2, 10);
    expect(params.a).toBeCloseTo(2 * params.b, 10);
    expect(reach(params)).toBeCloseTo(60, 10);
  });

  it('keeps the smoothing and pulls in the outer control points when preserving', () => {
    const params = getPathParamsForCorner({
      cornerRadius: 50,
      cornerSmoothing: 1,
      preserveSmoothing: true,
      roundingAndSmoothingBudget: 60,
    });

    expect(params.p).toBe(60);
    expect(params.arcSectionLength).toBe(0);
    expect(params.c).toBeCloseTo(14.644661, 5);
    expect(params.b).toBeCloseTo(23.570226, 5);
    expect(params.a).toBeCloseTo(7.140452, 5);
    expect(reach(params)).toBeCloseTo(60, 10);
  });

  it('reserves a sixth of the remaining room for the outermost control point', () => {
    const params = getPathParamsForCorner({
      cornerRadius: 40,
      cornerSmoothing: 1,
      preserveSmoothing: true,
      roundingAndSmoothingBudget: 40,
    });

    const room = 40 - params.c - params.d - params.arcSectionLength;
    expect(params.p).toBe(40);
    expect(params.a).toBeCloseTo(room / 6, 10);
    expect(params.b).toBeCloseTo((room * 5) / 6, 10);
    expect(reach(params)).toBeCloseTo(40, 10);
  });

  it('never lets p exceed the budget', () => {
    for (const preserveSmoothing of [false, true]) {
      for (const [cornerRadius, budget] of [
        [10, 10],
        [10, 12],
        [30, 45],
        [5, 100],
      ]) {
        for (const cornerSmoothing of [0, 0.3, 0.6, 1]) {
          const params = getPathParamsForCorner({
            cornerRadius,
            cornerSmoothing,
            preserveSmoothing,
            roundingAndSmoothingBudget: budget,
          });
          expect(params.p).toBeGreaterThanOrEqual(0);
          expect(params.p).toBeLessThanOrEqual(budget);
        }
      }
    }
  });

  it('accepts smoothing above 1', () => {
    const params = getPathParamsForCorner({
      cornerRadius: 10,
      cornerSmoothing: 1.5,
      preserveSmoothing: true,
      roundingAndSmoothingBudget: 100,
    });
    expect(params.p).toBe(25);
    expect(reach(params)).toBeCloseTo(25, 10);
  });
});
