import type { LayoutDirection, Point, Size } from "../types.js";

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Extent {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function isTransposed(direction: LayoutDirection): boolean {
  return direction === "LR" || direction === "RL";
}

export function emptyExtent(): Extent {
  return { minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity };
}

export function includeBox(extent: Extent, box: Box): void {
  extent.minX = Math.min(extent.minX, box.x);
  extent.minY = Math.min(extent.minY, box.y);
  extent.maxX = Math.max(extent.maxX, box.x + box.width);
  extent.maxY = Math.max(extent.maxY, box.y + box.height);
}

export function includePoint(extent: Extent, point: Point): void {
  includeBox(extent, { x: point.x, y: point.y, width: 0, height: 0 });
}

export function simplifyPolyline(points: Point[]): Point[] {
  const deduped: Point[] = [];
  for (const point of points) {
    const last = deduped[deduped.length - 1];
    if (last && Math.abs(last.x - point.x) < 1e-9 && Math.abs(last.y - point.y) < 1e-9) {
      continue;
    }
    deduped.push({ x: point.x, y: point.y });
  }

  if (deduped.length <= 2) {
    return deduped;
  }

  const out: Point[] = [deduped[0]];
  for (let i = 1; i < deduped.length - 1; i += 1) {
    const prev = out[out.length - 1];
    const curr = deduped[i];
    const next = deduped[i + 1];
    const cross = (curr.x - prev.x) * (next.y - curr.y) - (curr.y - prev.y) * (next.x - curr.x);
    const dot = (curr.x - prev.x) * (next.x - curr.x) + (curr.y - prev.y) * (next.y - curr.y);
    if (Math.abs(cross) < 1e-9 && dot >= 0) {
      continue;
    }
    out.push(curr);
  }
  out.push(deduped[deduped.length - 1]);
  return out;
}

export function midpointLabelPosition(points: Point[], label: Size, gap: number): Point | undefined {
  if (points.length < 2) {
    return undefined;
  }

  const lengths: number[] = [];
  let total = 0;

  for (let i = 0; i < points.length - 1; i += 1) {
    const length = Math.hypot(points[i + 1].x - points[i].x, points[i + 1].y - points[i].y);
    lengths.push(length);
    total += length;
  }

  if (total <= 0) {
    return { x: points[0].x, y: points[0].y };
  }

  const target = total / 2;
  let walked = 0;

  for (let i = 0; i < lengths.length; i += 1) {
    const segment = lengths[i];
    if (segment <= 0) {
      continue;
    }

    if (walked + segment < target) {
      walked += segment;
      continue;
    }

    const p0 = points[i];
    const p1 = points[i + 1];
    const t = (target - walked) / segment;
    const nx = -(p1.y - p0.y) / segment;
    const ny = (p1.x - p0.x) / segment;
    const distance = gap + (Math.abs(nx) * label.width) / 2 + (Math.abs(ny) * label.height) / 2;
    return {
      x: p0.x + (p1.x - p0.x) * t + nx * distance,
      y: p0.y + (p1.y - p0.y) * t + ny * distance,
    };
  }

  const last = points[points.length - 1];
  return { x: last.x, y: last.y };
}

export function orientPoint(point: Point, direction: LayoutDirection, frame: Size): Point {
  if (direction === "BT") {
    return { x: point.x, y: frame.height - point.y };
  }
  if (direction === "LR") {
    return { x: point.y, y: point.x };
  }
  if (direction === "RL") {
    return { x: frame.height - point.y, y: point.x };
  }
  return { x: point.x, y: point.y };
}

export function orientBox(box: Box, direction: LayoutDirection, frame: Size): Box {
  if (direction === "BT") {
    return { x: box.x, y: frame.height - box.y - box.height, width: box.width, height: box.height };
  }
  if (direction === "LR") {
    return { x: box.y, y: box.x, width: box.height, height: box.width };
  }
  if (direction === "RL") {
    return { x: frame.height - box.y - box.height, y: box.x, width: box.height, height: box.width };
  }
  return { ...box };
}

export function orientFrame(frame: Size, direction: LayoutDirection): Size {
  return isTransposed(direction) ? { width: frame.height, height: frame.width } : { width: frame.width, height: frame.height };
}
