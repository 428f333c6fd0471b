import type { Corner, NormalizedCorners, RoundedRectangle, Side } from '../types';

export type Adjacent = { corner: Corner; side: Side };

const ADJACENTS: Record<Corner, readonly [Adjacent, Adjacent]> = {
  topLeft: [
    { corner: 'topRight', side: 'top' },
    { corner: 'bottomLeft', side: 'left' },
  ],
  topRight: [
    { corner: 'topLeft', side: 'top' },
    { corner: 'bottomRight', side: 'right' },
  ],
  bottomLeft: [
    { corner: 'bottomRight', side: 'bottom' },
    { corner: 'topLeft', side: 'left' },
  ],
  bottomRight: [
    { corner: 'bottomLeft', side: 'bottom' },
    { corner: 'topRight', side: 'right' },
  ],
};

// Order matters for ties: the sort below is stable.
const CORNERS: readonly Corner[] = ['topLeft', 'topRight', 'bottomLeft', 'bottomRight'];

// Budgets are never negative, so -1 marks a corner that has not been processed yet.
const UNSET_BUDGET = -1;

export function getAdjacents(corner: Corner): readonly [Adjacent, Adjacent] {
  return ADJACENTS[corner];
}

function getSideLength(rect: RoundedRectangle, side: Side): number {
  return side === 'top' || side === 'bottom' ? rect.width : rect.height;
}

/**
 * Split each side between the two corners sharing it and clamp every radius to its share.
 *
 * Corners are processed from the largest radius down. A corner whose neighbour already
 * has a budget takes what is left of the shared side; otherwise the side is split in
 * proportion to the two radii. The tighter of the two sides wins.
 */
export function distributeAndNormalize(rect: RoundedRectangle): NormalizedCorners {
  const radii: Record<Corner, number> = {
    topLeft: rect.topLeftCornerRadius,
    topRight: rect.topRightCornerRadius,
    bottomLeft: rect.bottomLeftCornerRadius,
    bottomRight: rect.bottomRightCornerRadius,
  };
  const budgets: Record<Corner, number> = {
    topLeft: UNSET_BUDGET,
    topRight: UNSET_BUDGET,
    bottomLeft: UNSET_BUDGET,
    bottomRight: UNSET_BUDGET,
  };

  const ordered = CORNERS.map((corner) => ({ corner, radius: radii[corner] })).sort(
    (left, right) => right.radius - left.radius,
  );

  for (const { corner, radius } of ordered) {
    const budgetAlong = (adjacent: Adjacent): number => {
      const adjacentRadius = radii[adjacent.corner];
      if (radius === 0 && adjacentRadius === 0) return 0;

      const sideLength = getSideLength(rect, adjacent.side);
      const adjacentBudget = budgets[adjacent.corner];
      if (adjacentBudget >= 0) {
        // neighbour already claimed its part of the side
        return sideLength - adjacentBudget;
      }
      return (radius / (radius + adjacentRadius)) * sideLength;
    };

    const [first, second] = getAdjacents(corner);
    const budget = Math.min(budgetAlong(first), budgetAlong(second));

    budgets[corner] = budget;
    radii[corner] = Math.min(radius, budget);
  }

  return {
    topLeft: { radius: radii.topLeft, roundingAndSmoothingBudget: budgets.topLeft },
    topRight: { radius: radii.topRight, roundingAndSmoothingBudget: budgets.topRight },
    bottomLeft: { radius: radii.bottomLeft, roundingAndSmoothingBudget: budgets.bottomLeft },
    bottomRight: { radius: radii.bottomRight, roundingAndSmoothingBudget: budgets.bottomRight },
  };
}
