import type { Corner, CornerPathParams, Point } from '../types';

export type PathCommand =
  | { type: 'move'; x: number; y: number }
  | { type: 'line'; relative: boolean; x: number; y: number }
  | {
      type: 'cubic';
      relative: boolean;
      x1: number;
      y1: number;
      x2: number;
      y2: number;
      x: number;
      y: number;
    }
  | {
      type: 'arc';
      relative: boolean;
      rx: number;
      ry: number;
      rotation: number;
      largeArc: boolean;
      sweep: boolean;
      x: number;
      y: number;
    }
  | { type: 'close' };

export type SquirclePath = readonly PathCommand[];

/** How one corner is drawn: the squircle curve, or a plain join when the radius is 0. */
export type CornerSegment =
  | { kind: 'curve'; params: CornerPathParams }
  | { kind: 'straight'; length: number };

export type SquirclePathInput = {
  width: number;
  height: number;
  topRightPathParams: CornerPathParams;
  bottomRightPathParams: CornerPathParams;
  bottomLeftPathParams: CornerPathParams;
  topLeftPathParams: CornerPathParams;
};

/** Decimal places written for every number in a serialized path. */
export const PATH_PRECISION = 4;

// `along` is the direction of travel on the side entering the corner, `across` the
// direction on the side leaving it. The contour runs clockwise (y points down).
type CornerFrame = { along: Point; across: Point };

const CORNER_FRAMES: Record<Corner, CornerFrame> = {
  topRight: { along: { x: 1, y: 0 }, across: { x: 0, y: 1 } },
  bottomRight: { along: { x: 0, y: 1 }, across: { x: -1, y: 0 } },
  bottomLeft: { along: { x: -1, y: 0 }, across: { x: 0, y: -1 } },
  topLeft: { along: { x: 0, y: -1 }, across: { x: 1, y: 0 } },
};

function toFrame(frame: CornerFrame, along: number, across: number): Point {
  return {
    x: along * frame.along.x + across * frame.across.x,
    y: along * frame.along.y + across * frame.across.y,
  };
}

export function toCornerSegment(params: CornerPathParams): CornerSegment {
  if (params.cornerRadius > 0) return { kind: 'curve', params };
  return { kind: 'straight', length: params.p };
}

function relativeCubic(c1: Point, c2: Point, end: Point): PathCommand {
  return { type: 'cubic', relative: true, x1: c1.x, y1: c1.y, x2: c2.x, y2: c2.y, x: end.x, y: end.y };
}

function drawCorner(corner: Corner, params: CornerPathParams): PathCommand[] {
  const frame = CORNER_FRAMES[corner];
  const segment = toCornerSegment(params);

  if (segment.kind === 'straight') {
    const end = toFrame(frame, segment.length, 0);
    return [{ type: 'line', relative: true, x: end.x, y: end.y }];
  }

  const { a, b, c, d, cornerRadius, arcSectionLength } = segment.params;
  const arcEnd = toFrame(frame, arcSectionLength, arcSectionLength);
  return [
    relativeCubic(toFrame(frame, a, 0), toFrame(frame, a + b, 0), toFrame(frame, a + b + c, d)),
    {
      type: 'arc',
      relative: true,
      rx: cornerRadius,
      ry: cornerRadius,
      rotation: 0,
      largeArc: false,
      sweep: true,
      x: arcEnd.x,
      y: arcEnd.y,
    },
    relativeCubic(toFrame(frame, d, c), toFrame(frame, d, b + c), toFrame(frame, d, a + b + c)),
  ];
}

/**
 * Closed clockwise contour: top side, top-right corner, right side, bottom-right corner,
 * bottom side, bottom-left corner, left side, top-left corner. Sides are the absolute
 * lines between consecutive corners; the top side is drawn by the final close.
 */
export function buildSquirclePath(input: SquirclePathInput): SquirclePath {
  const { width, height, topRightPathParams, bottomRightPathParams, bottomLeftPathParams, topLeftPathParams } =
    input;

  return [
    { type: 'move', x: width - topRightPathParams.p, y: 0 },
    ...drawCorner('topRight', topRightPathParams),
    { type: 'line', relative: false, x: width, y: height - bottomRightPathParams.p },
    ...drawCorner('bottomRight', bottomRightPathParams),
    { type: 'line', relative: false, x: bottomLeftPathParams.p, y: height },
    ...drawCorner('bottomLeft', bottomLeftPathParams),
    { type: 'line', relative: false, x: 0, y: topLeftPathParams.p },
    ...drawCorner('topLeft', topLeftPathParams),
    { type: 'close' },
  ];
}

/** Fixed-precision number. Anything that rounds to zero is written unsigned. */
export function formatPathNumber(value: number): string {
  const fixed = value.toFixed(PATH_PRECISION);
  return Number(fixed) === 0 ? (0).toFixed(PATH_PRECISION) : fixed;
}

function serializeCommand(command: PathCommand): string {
  const n = formatPathNumber;
  switch (command.type) {
    case 'move':
      return `M ${n(command.x)} ${n(command.y)}`;
    case 'line':
      return `${command.relative ? 'l' : 'L'} ${n(command.x)} ${n(command.y)}`;
    case 'cubic':
      return `${command.relative ? 'c' : 'C'} ${n(command.x1)} ${n(command.y1)} ${n(command.x2)} ${n(command.y2)} ${n(command.x)} ${n(command.y)}`;
    case 'arc':
      return `${command.relative ? 'a' : 'A'} ${n(command.rx)} ${n(command.ry)} ${n(command.rotation)} ${command.largeArc ? 1 : 0} ${command.sweep ? 1 : 0} ${n(command.x)} ${n(command.y)}`;
    case 'close':
      return 'Z';
  }
}

export function serializePath(path: SquirclePath): string {
  return path.map(serializeCommand).join(' ');
}

export function getSvgPathFromPathParams(input: SquirclePathInput): string {
  return serializePath(buildSquirclePath(input));
}

/**
 * Absolute end point of every command, in order. Relative commands are resolved against
 * the previous end point and `close` returns to the start of the current subpath.
 */
export function getPathPoints(path: SquirclePath): Point[] {
  const points: Point[] = [];
  let current: Point = { x: 0, y: 0 };
  let subpathStart: Point = current;

  for (const command of path) {
    switch (command.type) {
      case 'move':
        current = { x: command.x, y: command.y };
        subpathStart = current;
        break;
      case 'close':
        current = subpathStart;
        break;
      default:
        current = command.relative
          ? { x: current.x + command.x, y: current.y + command.y }
          : { x: command.x, y: command.y };
    }
    points.push(current);
  }
  return points;
}
