import { EGRESS_GATEWAY, INGRESS_GATEWAY } from "./serviceKey";
import { ConnectivityEdge, GatewayRoute, HopKind, PathHop, PathTrace, ServiceKey, TopologyData } from "./types";

export const NO_PATH = "no connection path found";

type TraceState = { at: "ingress" } | { at: "egress" } | { at: "service"; key: ServiceKey };

type Resolved = TraceState | { at: "unknown" };

/**
 * "ingress-gateway" and "egress-gateway"/"external" name the gateways;
 * anything else is a service key or a bare service name, resolved in the
 * given namespace or by a unique name match.
 */
export function resolveEndpoint(ref: string, namespace: string, topology: TopologyData): Resolved {
  if (ref === INGRESS_GATEWAY) return { at: "ingress" };
  if (ref === EGRESS_GATEWAY || ref === "external") return { at: "egress" };
  if (topology.services[ref]) return { at: "service", key: ref };
  if (ref.includes("/")) return { at: "unknown" };

  const ns = namespace === "all" ? "" : namespace;
  if (ns && topology.services[`${ns}/${ref}`]) return { at: "service", key: `${ns}/${ref}` };

  const matches = Object.values(topology.services).filter((s) => s.name === ref);
  return matches.length === 1 ? { at: "service", key: matches[0].key } : { at: "unknown" };
}

function pickIngressRoute(routes: GatewayRoute[], destination: ServiceKey | undefined): GatewayRoute | undefined {
  const toDest = destination ? routes.filter((r) => r.target === destination) : [];
  const pool = toDest.length ? toDest : routes;
  return pool.find((r) => r.allowed) ?? pool[0];
}

function hopFromEdge(edge: ConnectivityEdge, kind: HopKind): PathHop {
  return {
    from: edge.source,
    to: edge.target,
    kind,
    allowed: edge.allowed,
    reason: edge.reason,
    policies: edge.blockingPolicies,
    meshType: edge.meshType
  };
}

/**
 * Walks ingress -> service -> destination. The hop list stops at the first
 * blocked hop; the trace is allowed only when every hop is.
 */
export function tracePath(source: string, destination: string, namespace: string, topology: TopologyData): PathTrace {
  const hops: PathHop[] = [];
  const fail = (reason: string): PathTrace => ({ source, destination, hops, allowed: false, reason });

  const start = resolveEndpoint(source, namespace, topology);
  if (start.at === "unknown") return fail(`source ${source} not found in topology`);
  const dest = resolveEndpoint(destination, namespace, topology);
  if (dest.at === "unknown") return fail(`destination ${destination} not found in topology`);
  if (dest.at === "ingress") return fail(NO_PATH);

  const destKey = dest.at === "service" ? dest.key : undefined;
  let state: TraceState = start;

  // each step consumes one hop; ingress -> service -> target at most
  for (let step = 0; step < 3; step++) {
    let hop: PathHop | undefined;
    let next: TraceState | undefined;

    if (state.at === "ingress") {
      const route = pickIngressRoute(topology.ingress.routes, destKey);
      if (route) {
        hop = {
          from: INGRESS_GATEWAY,
          to: route.target,
          kind: "ingress",
          allowed: route.allowed,
          reason: route.reason,
          policies: route.blockingPolicies
        };
        next = { at: "service", key: route.target };
      }
    } else if (state.at === "service") {
      const from: ServiceKey = state.key;
      const edges = topology.connectivity[from] ?? [];
      const target = dest.at === "egress" ? EGRESS_GATEWAY : destKey;
      const edge = edges.find((e) => e.target === target);
      if (edge) {
        hop = hopFromEdge(edge, dest.at === "egress" ? "egress" : "service");
        next = dest.at === "egress" ? { at: "egress" } : { at: "service", key: edge.target };
      }
    }

    if (!hop || !next) return fail(NO_PATH);

    hops.push(hop);
    if (!hop.allowed) {
      return { source, destination, hops, allowed: false, reason: hop.reason, blockedAt: { index: hops.length - 1, hop } };
    }

    const reached = dest.at === "egress" ? next.at === "egress" : next.at === "service" && next.key === destKey;
    if (reached) return { source, destination, hops, allowed: true, reason: "connection allowed" };
    state = next;
  }
  return fail(NO_PATH);
}
