export type Corner = 'topLeft' | 'topRight' | 'bottomLeft' | 'bottomRight';
export type Side = 'top' | 'left' | 'right' | 'bottom';

export type Point = { x: number; y: number };

/** Rectangle with raw (unclamped) per-corner radii. */
export type RoundedRectangle = {
  width: number;
  height: number;
  topLeftCornerRadius: number;
  topRightCornerRadius: number;
  bottomRightCornerRadius: number;
  bottomLeftCornerRadius: number;
};

export type NormalizedCorner = {
  /** Radius clamped to the budget. */
  radius: number;
  /** Length of each adjacent side this corner's curve may consume. */
  roundingAndSmoothingBudget: number;
};

export type NormalizedCorners = Record<Corner, NormalizedCorner>;

export type CornerParams = {
  cornerRadius: number;
  cornerSmoothing: number;
  preserveSmoothing: boolean;
  roundingAndSmoothingBudget: number;
};

/**
 * Control distances for one corner, laid out as in the classic squircle construction:
 * `a` and `b` position the outer control points, `c` and `d` the points next to the arc.
 */
export type CornerPathParams = {
  a: number;
  b: number;
  c: number;
  d: number;
  /** Distance from the end of the straight side to the start of the corner curve. */
  p: number;
  cornerRadius: number;
  arcSectionLength: number;
};

export type SquircleParams = {
  width: number;
  height: number;
  /** 0 draws plain circular corners; 1 is the smoothest squircle. Values above 1 are allowed. */
  cornerSmoothing: number;
  /** Fallback for every per-corner radius that is omitted. Defaults to 0. */
  cornerRadius?: number;
  topLeftCornerRadius?: number;
  topRightCornerRadius?: number;
  bottomRightCornerRadius?: number;
  bottomLeftCornerRadius?: number;
  /**
   * Keep the requested smoothing when a corner runs out of room and squeeze the outer
   * control points instead. Defaults to false.
   */
  preserveSmoothing?: boolean;
};

export type ResolvedSquircleParams = RoundedRectangle & {
  cornerSmoothing: number;
  preserveSmoothing: boolean;
};
