/**
 * Error taxonomy for topology computation.
 */

export enum ErrorCode {
  FATAL_FETCH = "FATAL_FETCH",
  SOFT_FETCH = "SOFT_FETCH",
  FETCH_TIMEOUT = "FETCH_TIMEOUT",
  CANCELLED = "CANCELLED",
  CLUSTER_UNREACHABLE = "CLUSTER_UNREACHABLE",
  INVALID_CONFIG = "INVALID_CONFIG"
}

export type ResourceKind =
  | "services"
  | "pods"
  | "networkpolicies"
  | "meshpolicies"
  | "ebpfpolicies"
  | "policyascode"
  | "rbac"
  | "drift"
  | "ingress"
  | "egress"
  | "infrastructure"
  | "metrics";

/** services and pods are required to build a graph; everything else degrades. */
export const ESSENTIAL_RESOURCES: ReadonlySet<ResourceKind> = new Set<ResourceKind>(["services", "pods"]);

export class TopologyError extends Error {
  readonly code: ErrorCode;
  readonly resource?: ResourceKind;

  constructor(code: ErrorCode, message: string, options?: { resource?: ResourceKind; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.resource = options?.resource;
  }
}

export class FatalFetchError extends TopologyError {
  constructor(resource: ResourceKind, cause: unknown) {
    super(ErrorCode.FATAL_FETCH, `failed to fetch ${resource}: ${describeError(cause)}`, { resource, cause });
  }
}

export class SoftFetchError extends TopologyError {
  constructor(resource: ResourceKind, cause: unknown) {
    super(ErrorCode.SOFT_FETCH, `${resource} unavailable: ${describeError(cause)}`, { resource, cause });
  }
}

export class FetchTimeoutError extends TopologyError {
  constructor(resource: ResourceKind, timeoutMs: number) {
    super(ErrorCode.FETCH_TIMEOUT, `${resource} fetch exceeded ${timeoutMs}ms deadline`, { resource });
  }
}

export class CancelledError extends TopologyError {
  constructor(resource?: ResourceKind) {
    super(ErrorCode.CANCELLED, resource ? `${resource} fetch cancelled` : "topology computation cancelled", { resource });
  }
}

export class ClusterConnectionError extends TopologyError {
  constructor(cause: unknown) {
    super(
      ErrorCode.CLUSTER_UNREACHABLE,
      `Unable to connect to Kubernetes cluster. Ensure your kubeconfig is valid and accessible: ${describeError(cause)}`,
      { cause }
    );
  }
}

export class ConfigError extends TopologyError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(ErrorCode.INVALID_CONFIG, `invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/**
 * Wraps a failure for the resource kind it came from. Timeouts and
 * cancellations keep their own type; everything else becomes fatal or soft.
 */
export function classifyFetchError(resource: ResourceKind, e: unknown): TopologyError {
  if (e instanceof CancelledError) return e;
  if (ESSENTIAL_RESOURCES.has(resource)) {
    return e instanceof FatalFetchError ? e : new FatalFetchError(resource, e);
  }
  if (e instanceof FetchTimeoutError || e instanceof SoftFetchError) return e;
  return new SoftFetchError(resource, e);
}

export function httpStatusOf(e: unknown): number | undefined {
  if (!e || typeof e !== "object") return undefined;
  if ("statusCode" in e && typeof e.statusCode === "number") return e.statusCode;
  if ("response" in e && e.response && typeof e.response === "object") {
    const res = e.response;
    if ("statusCode" in res && typeof res.statusCode === "number") return res.statusCode;
  }
  return undefined;
}

export function isNotFound(e: unknown): boolean {
  return httpStatusOf(e) === 404;
}

function statusMessage(body: unknown): string | undefined {
  if (typeof body === "string") return body.trim() ? truncate(body) : undefined;
  if (!body || typeof body !== "object") return undefined;
  if ("message" in body && typeof body.message === "string" && body.message.trim()) return truncate(body.message);
  if ("reason" in body && typeof body.reason === "string" && body.reason.trim()) return truncate(body.reason);
  return undefined;
}

function truncate(s: string, max = 400): string {
  return s.length > max ? s.slice(0, max - 3) + "..." : s;
}

/** Renders Error messages and client-node HttpErrors (status + Status.message). */
export function describeError(e: unknown): string {
  if (e instanceof TopologyError) return e.message;
  const status = httpStatusOf(e);
  const body = e && typeof e === "object" && "body" in e ? e.body : undefined;
  const msg = statusMessage(body);
  const base = e instanceof Error ? e.message : String(e);
  if (status !== undefined && msg) return `HTTP ${status}: ${msg}`;
  if (status !== undefined) return base && base !== "[object Object]" ? `HTTP ${status}: ${base}` : `HTTP ${status}`;
  return base;
}
