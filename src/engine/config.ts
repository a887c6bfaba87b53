import yaml from "js-yaml";
import type { LayoutConfig, LayoutDirection, RoutingStyle } from "../types.js";
import { DEFAULT_LAYOUT_CONFIG } from "./defaults.js";
import { ValidationError } from "./errors.js";

const ROUTING_STYLES: readonly RoutingStyle[] = ["straight", "orthogonal"];
const DIRECTIONS: readonly LayoutDirection[] = ["TB", "BT", "LR", "RL"];

type NumericKey = {
  [K in keyof LayoutConfig]: LayoutConfig[K] extends number ? K : never;
}[keyof LayoutConfig];

const COUNT_KEYS: readonly NumericKey[] = ["crossingIterations", "alignmentPasses"];
const LIMIT_KEYS: readonly NumericKey[] = ["maxNodes", "maxEdges"];

const CONFIG_KEYS = new Map<string, keyof LayoutConfig>([
  ["layerSpacing", "layerSpacing"],
  ["layer_spacing", "layerSpacing"],
  ["nodeSpacing", "nodeSpacing"],
  ["node_spacing", "nodeSpacing"],
  ["edgeSpacing", "edgeSpacing"],
  ["edge_spacing", "edgeSpacing"],
  ["maxNodes", "maxNodes"],
  ["max_nodes", "maxNodes"],
  ["maxEdges", "maxEdges"],
  ["max_edges", "maxEdges"],
  ["crossingIterations", "crossingIterations"],
  ["crossing_iterations", "crossingIterations"],
  ["alignmentPasses", "alignmentPasses"],
  ["alignment_passes", "alignmentPasses"],
  ["routingStyle", "routingStyle"],
  ["routing_style", "routingStyle"],
  ["direction", "direction"],
  ["margin", "margin"],
]);

function asNumber(input: unknown): number | undefined {
  return typeof input === "number" && Number.isFinite(input) ? input : undefined;
}

function isRoutingStyle(input: unknown): input is RoutingStyle {
  return ROUTING_STYLES.some((style) => style === input);
}

function isDirection(input: unknown): input is LayoutDirection {
  return DIRECTIONS.some((direction) => direction === input);
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function readNumber(key: NumericKey, value: unknown): number {
  const parsed = asNumber(value);
  if (parsed === undefined) {
    throw new ValidationError(`Config ${key} must be a finite number`);
  }
  if (parsed < 0) {
    throw new ValidationError(`Config ${key} must not be negative`);
  }
  if ((COUNT_KEYS.includes(key) || LIMIT_KEYS.includes(key)) && !Number.isInteger(parsed)) {
    throw new ValidationError(`Config ${key} must be an integer`);
  }
  if (LIMIT_KEYS.includes(key) && parsed < 1) {
    throw new ValidationError(`Config ${key} must be at least 1`);
  }
  return parsed;
}

function applyOverride(target: LayoutConfig, key: keyof LayoutConfig, value: unknown): void {
  if (key === "routingStyle") {
    if (!isRoutingStyle(value)) {
      throw new ValidationError(`Config routingStyle must be one of ${ROUTING_STYLES.join(", ")}`);
    }
    target.routingStyle = value;
    return;
  }

  if (key === "direction") {
    if (!isDirection(value)) {
      throw new ValidationError(`Config direction must be one of ${DIRECTIONS.join(", ")}`);
    }
    target.direction = value;
    return;
  }

  target[key] = readNumber(key, value);
}

export function resolveLayoutConfig(overrides: Partial<LayoutConfig> = {}): Readonly<LayoutConfig> {
  const config: LayoutConfig = { ...DEFAULT_LAYOUT_CONFIG };

  for (const [rawKey, value] of Object.entries(overrides)) {
    if (value === undefined) {
      continue;
    }
    const key = CONFIG_KEYS.get(rawKey);
    if (!key) {
      throw new ValidationError(`Unknown config key: ${rawKey}`);
    }
    applyOverride(config, key, value);
  }

  return Object.freeze(config);
}

export function parseLayoutConfigYaml(raw: string): Partial<LayoutConfig> {
  const loaded = yaml.load(raw);
  if (loaded === undefined || loaded === null) {
    return {};
  }
  if (!isRecord(loaded)) {
    throw new ValidationError("Layout config YAML must be a mapping");
  }

  const config: LayoutConfig = { ...DEFAULT_LAYOUT_CONFIG };
  const seen = new Set<keyof LayoutConfig>();
  for (const [rawKey, value] of Object.entries(loaded)) {
    const key = CONFIG_KEYS.get(rawKey);
    if (!key) {
      throw new ValidationError(`Unknown config key: ${rawKey}`);
    }
    if (seen.has(key)) {
      throw new ValidationError(`Config key ${key} given twice`);
    }
    seen.add(key);
    applyOverride(config, key, value);
  }

  const overrides: Partial<LayoutConfig> = {};
  for (const key of seen) {
    copyKey(overrides, config, key);
  }
  return overrides;
}

function copyKey<K extends keyof LayoutConfig>(target: Partial<LayoutConfig>, source: LayoutConfig, key: K): void {
  target[key] = source[key];
}
