import type { LayoutResult, NodeBox, Point } from "../types.js";

interface SegmentRef {
  edgeId: string;
  sourceId: string;
  targetId: string;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface LayoutMetrics {
  edgeCrossings: number;
  totalEdgeBends: number;
  nodeOverlapCount: number;
  edgeThroughNodeCount: number;
  totalEdgeLength: number;
}

function orientation(ax: number, ay: number, bx: number, by: number, cx: number, cy: number): number {
  return (bx - ax) * (cy - ay) - (by - ay) * (cx - ax);
}

function segmentsCross(a: SegmentRef, b: SegmentRef): boolean {
  const o1 = orientation(a.x1, a.y1, a.x2, a.y2, b.x1, b.y1);
  const o2 = orientation(a.x1, a.y1, a.x2, a.y2, b.x2, b.y2);
  const o3 = orientation(b.x1, b.y1, b.x2, b.y2, a.x1, a.y1);
  const o4 = orientation(b.x1, b.y1, b.x2, b.y2, a.x2, a.y2);
  const eps = 1e-6;
  if (Math.abs(o1) < eps || Math.abs(o2) < eps || Math.abs(o3) < eps || Math.abs(o4) < eps) {
    return false;
  }
  return (o1 > 0) !== (o2 > 0) && (o3 > 0) !== (o4 > 0);
}

function segmentEntersBox(segment: SegmentRef, box: NodeBox, inset: number): boolean {
  const minX = box.x + inset;
  const maxX = box.x + box.width - inset;
  const minY = box.y + inset;
  const maxY = box.y + box.height - inset;
  if (minX >= maxX || minY >= maxY) {
    return false;
  }

  const dx = segment.x2 - segment.x1;
  const dy = segment.y2 - segment.y1;
  const p = [-dx, dx, -dy, dy];
  const q = [segment.x1 - minX, maxX - segment.x1, segment.y1 - minY, maxY - segment.y1];
  let t0 = 0;
  let t1 = 1;

  for (let i = 0; i < 4; i += 1) {
    if (p[i] === 0) {
      if (q[i] < 0) {
        return false;
      }
      continue;
    }
    const t = q[i] / p[i];
    if (p[i] < 0) {
      t0 = Math.max(t0, t);
    } else {
      t1 = Math.min(t1, t);
    }
    if (t0 > t1) {
      return false;
    }
  }

  return t0 < t1;
}

function collectSegments(result: LayoutResult): SegmentRef[] {
  const segments: SegmentRef[] = [];
  for (const edge of result.edges) {
    for (let i = 0; i < edge.points.length - 1; i += 1) {
      const a = edge.points[i];
      const b = edge.points[i + 1];
      segments.push({
        edgeId: edge.id,
        sourceId: edge.source,
        targetId: edge.target,
        x1: a.x,
        y1: a.y,
        x2: b.x,
        y2: b.y,
      });
    }
  }
  return segments;
}

function boxesOverlap(a: NodeBox, b: NodeBox): boolean {
  const ox = Math.min(a.x + a.width, b.x + b.width) - Math.max(a.x, b.x);
  const oy = Math.min(a.y + a.height, b.y + b.height) - Math.max(a.y, b.y);
  return ox > 1e-6 && oy > 1e-6;
}

function polylineLength(points: readonly Point[]): number {
  let total = 0;
  for (let i = 0; i < points.length - 1; i += 1) {
    total += Math.hypot(points[i + 1].x - points[i].x, points[i + 1].y - points[i].y);
  }
  return total;
}

export function evaluateLayout(result: LayoutResult): LayoutMetrics {
  const segments = collectSegments(result);

  let edgeCrossings = 0;
  for (let i = 0; i < segments.length; i += 1) {
    for (let j = i + 1; j < segments.length; j += 1) {
      if (segments[i].edgeId === segments[j].edgeId) {
        continue;
      }
      if (segmentsCross(segments[i], segments[j])) {
        edgeCrossings += 1;
      }
    }
  }

  let edgeThroughNodeCount = 0;
  for (const segment of segments) {
    for (const node of result.nodes) {
      if (node.id === segment.sourceId || node.id === segment.targetId) {
        continue;
      }
      if (segmentEntersBox(segment, node, 0.5)) {
        edgeThroughNodeCount += 1;
      }
    }
  }

  let nodeOverlapCount = 0;
  for (let i = 0; i < result.nodes.length; i += 1) {
    for (let j = i + 1; j < result.nodes.length; j += 1) {
      if (boxesOverlap(result.nodes[i], result.nodes[j])) {
        nodeOverlapCount += 1;
      }
    }
  }

  let totalEdgeBends = 0;
  let totalEdgeLength = 0;
  for (const edge of result.edges) {
    totalEdgeBends += Math.max(0, edge.points.length - 2);
    totalEdgeLength += polylineLength(edge.points);
  }

  return {
    edgeCrossings,
    totalEdgeBends,
    nodeOverlapCount,
    edgeThroughNodeCount,
    totalEdgeLength,
  };
}
