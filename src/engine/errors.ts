export type LayoutErrorCode = "VALIDATION" | "RESOURCE_LIMIT" | "INVARIANT";

export type ResourceLimit = "maxNodes" | "maxEdges";

export class LayoutError extends Error {
  readonly code: LayoutErrorCode;

  constructor(code: LayoutErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LayoutError";
    this.code = code;
  }
}

export class ValidationError extends LayoutError {
  constructor(message: string) {
    super("VALIDATION", message);
    this.name = "ValidationError";
  }
}

export class ResourceLimitExceededError extends LayoutError {
  readonly limit: ResourceLimit;
  readonly actual: number;
  readonly max: number;

  constructor(limit: ResourceLimit, actual: number, max: number) {
    const what = limit === "maxNodes" ? "nodes" : "edges";
    super("RESOURCE_LIMIT", `Graph has ${actual} ${what}, ${limit} is ${max}`);
    this.name = "ResourceLimitExceeded";
    this.limit = limit;
    this.actual = actual;
    this.max = max;
  }
}

export class LayoutInvariantError extends LayoutError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVARIANT", message, options);
    this.name = "LayoutInvariantError";
  }
}

export function isLayoutError(error: unknown): error is LayoutError {
  return error instanceof LayoutError;
}
