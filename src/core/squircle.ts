import type { Corner, CornerPathParams, ResolvedSquircleParams, SquircleParams } from '../types';
import { getPathParamsForCorner } from './corner';
import { distributeAndNormalize } from './distribute';
import { buildSquirclePath, serializePath } from './path';
import type { SquirclePath } from './path';

export function resolveSquircleParams(params: SquircleParams): ResolvedSquircleParams {
  const cornerRadius = params.cornerRadius ?? 0;
  return {
    width: params.width,
    height: params.height,
    cornerSmoothing: params.cornerSmoothing,
    topLeftCornerRadius: params.topLeftCornerRadius ?? cornerRadius,
    topRightCornerRadius: params.topRightCornerRadius ?? cornerRadius,
    bottomRightCornerRadius: params.bottomRightCornerRadius ?? cornerRadius,
    bottomLeftCornerRadius: params.bottomLeftCornerRadius ?? cornerRadius,
    preserveSmoothing: params.preserveSmoothing ?? false,
  };
}

function hasUniformRadius(params: ResolvedSquircleParams): boolean {
  const radius = params.topLeftCornerRadius;
  return (
    params.topRightCornerRadius === radius &&
    params.bottomRightCornerRadius === radius &&
    params.bottomLeftCornerRadius === radius
  );
}

export function getSquirclePath(params: SquircleParams): SquirclePath {
  const resolved = resolveSquircleParams(params);
  const { width, height, cornerSmoothing, preserveSmoothing } = resolved;

  if (hasUniformRadius(resolved)) {
    // Every corner gets half of the shorter side; one set of params serves all four.
    const roundingAndSmoothingBudget = Math.min(width, height) / 2;
    const pathParams = getPathParamsForCorner({
      cornerRadius: Math.min(resolved.topLeftCornerRadius, roundingAndSmoothingBudget),
      cornerSmoothing,
      preserveSmoothing,
      roundingAndSmoothingBudget,
    });
    return buildSquirclePath({
      width,
      height,
      topLeftPathParams: pathParams,
      topRightPathParams: pathParams,
      bottomRightPathParams: pathParams,
      bottomLeftPathParams: pathParams,
    });
  }

  const corners = distributeAndNormalize(resolved);
  const paramsFor = (corner: Corner): CornerPathParams =>
    getPathParamsForCorner({
      cornerRadius: corners[corner].radius,
      cornerSmoothing,
      preserveSmoothing,
      roundingAndSmoothingBudget: corners[corner].roundingAndSmoothingBudget,
    });

  return buildSquirclePath({
    width,
    height,
    topLeftPathParams: paramsFor('topLeft'),
    topRightPathParams: paramsFor('topRight'),
    bottomRightPathParams: paramsFor('bottomRight'),
    bottomLeftPathParams: paramsFor('bottomLeft'),
  });
}

/**
 * SVG path data (`d` attribute) for a rectangle with squircle corners, anchored at the
 * origin. Per-corner radii fall back to `cornerRadius`; radii that do not fit are clamped.
 */
export function getSvgPath(params: SquircleParams): string {
  return serializePath(getSquirclePath(params));
}
