export type LayoutDirection = "TB" | "BT" | "LR" | "RL";

export type RoutingStyle = "straight" | "orthogonal";

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface GraphNode {
  id: string;
  width: number;
  height: number;
}

export interface GraphEdge {
  id?: string;
  source: string;
  target: string;
  label?: Size;
}

export interface LayoutGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface LayoutConfig {
  layerSpacing: number;
  nodeSpacing: number;
  edgeSpacing: number;
  maxNodes: number;
  maxEdges: number;
  crossingIterations: number;
  alignmentPasses: number;
  routingStyle: RoutingStyle;
  direction: LayoutDirection;
  margin: number;
}

export interface NodeBox {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly layer: number;
  readonly order: number;
}

export interface EdgePath {
  readonly id: string;
  readonly source: string;
  readonly target: string;
  readonly points: readonly Point[];
  readonly labelPosition?: Point;
  readonly reversed: boolean;
  readonly selfLoop: boolean;
}

export interface LayoutStats {
  readonly layerCount: number;
  readonly dummyCount: number;
  readonly reversedEdges: number;
  readonly selfLoops: number;
  readonly initialCrossings: number;
  readonly crossings: number;
  readonly sweeps: number;
}

export interface LayoutResult {
  readonly nodes: readonly NodeBox[];
  readonly edges: readonly EdgePath[];
  readonly bounds: Readonly<Size>;
  readonly stats: LayoutStats;
}
