import { INGRESS_GATEWAY } from "./serviceKey";
import { ConnectivityEdge, ConnectivityMap, GatewayNode, ServiceKey, ServiceNode, TopologySummary } from "./types";

/**
 * Adjacency map keyed by vertex identity: one entry per service (its
 * service edges followed by its egress edge) plus ingress-gateway when it
 * has routes.
 */
export function assembleConnectivity(
  serviceEdges: Map<ServiceKey, ConnectivityEdge[]>,
  egressEdges: Map<ServiceKey, ConnectivityEdge>,
  ingress: GatewayNode
): ConnectivityMap {
  const out: ConnectivityMap = {};
  for (const [key, edges] of serviceEdges) {
    const egress = egressEdges.get(key);
    out[key] = egress ? [...edges, egress] : [...edges];
  }
  if (ingress.routes.length) {
    out[INGRESS_GATEWAY] = ingress.routes.map((r) => ({
      source: INGRESS_GATEWAY,
      target: r.target,
      allowed: r.allowed,
      reason: r.reason,
      blockingPolicies: r.blockingPolicies,
      provenance: r.provenance,
      ...(r.defaultDeny ? { defaultDeny: true } : {}),
      viaServiceMesh: r.type === "istio",
      meshType: r.type === "istio" ? "istio" : "none",
      ...(r.port ? { port: r.port } : {})
    }));
  }
  return out;
}

function percent(n: number, total: number): number {
  return total ? Math.round((n / total) * 100) : 0;
}

export function summarize(services: ServiceNode[], connectivity: ConnectivityMap): TopologySummary {
  const edges = Object.values(connectivity).flat();
  const allowed = edges.filter((e) => e.allowed).length;
  const meshed = services.filter((s) => s.meshType !== "none").length;
  const total = services.length;

  return {
    totalServices: total,
    servicesWithMesh: meshed,
    totalConnections: edges.length,
    allowedConnections: allowed,
    blockedConnections: edges.length - allowed,
    meshCoverage: percent(meshed, total),
    istioCoverage: percent(services.filter((s) => s.meshType === "istio").length, total),
    ciliumCoverage: percent(services.filter((s) => s.meshType === "cilium").length, total)
  };
}
