import type { EgressObjects } from "../aggregator";
import { PolicyEvaluator } from "../policy/evaluator";
import { EGRESS_GATEWAY } from "../serviceKey";
import { ConnectivityEdge, EgressInfo, ExternalService, GatewayObject, GatewayRoute, ServiceKey, ServiceNode } from "../types";

const TLS_PROTOCOLS = new Set(["HTTPS", "TLS", "GRPC-TLS"]);

export type EgressResolution = {
  egress: EgressInfo;
  /** one edge per service, targeting egress-gateway */
  edges: Map<ServiceKey, ConnectivityEdge>;
};

/**
 * Egress node and per-service egress edges. Without an egress gateway the
 * edges are direct; a gateway routes them through the mesh.
 */
export function resolveEgress(
  objs: EgressObjects,
  graph: Map<ServiceKey, ServiceNode>,
  evaluator: PolicyEvaluator
): EgressResolution {
  const gateways: GatewayObject[] = objs.gateways.map((g): GatewayObject => ({
    name: g.metadata.name,
    namespace: g.metadata.namespace ?? "",
    type: "istio-egress",
    hosts: (g.spec.servers ?? []).flatMap((s) => s.hosts ?? []),
    ports: (g.spec.servers ?? []).map((s) => String(s.port?.number ?? "")).filter(Boolean),
    selector: g.spec.selector ?? {},
    tls: (g.spec.servers ?? []).some((s) => s.tls !== undefined)
  }));
  for (const d of objs.egressGatewayDeployments) {
    if (gateways.some((g) => g.name === d.name && g.namespace === d.namespace)) continue;
    gateways.push({ ...d, type: "istio-egress", hosts: [], ports: [], selector: {}, tls: false });
  }

  const externalServices: ExternalService[] = objs.serviceEntries.map((se) => ({
    name: se.metadata.name,
    namespace: se.metadata.namespace ?? "",
    hosts: se.spec.hosts ?? [],
    ports: (se.spec.ports ?? []).map((p) => `${p.number ?? ""}/${p.protocol ?? "TCP"}`)
  }));

  const routes: GatewayRoute[] = objs.serviceEntries.flatMap((se) => {
    const firstPort = se.spec.ports?.[0]?.number;
    return (se.spec.hosts ?? []).map(
      (host): GatewayRoute => ({
        source: se.metadata.name,
        type: "serviceentry",
        namespace: se.metadata.namespace ?? "",
        host,
        path: "",
        target: host,
        port: firstPort !== undefined ? String(firstPort) : undefined,
        tls: (se.spec.ports ?? []).some((p) => TLS_PROTOCOLS.has((p.protocol ?? "").toUpperCase())),
        allowed: true,
        reason: "Declared by ServiceEntry",
        blockingPolicies: [],
        provenance: "default"
      })
    );
  });

  const hasEgressGateway = objs.egressGatewayDeployments.length > 0 || objs.gateways.length > 0;
  const externalHosts = externalServices.flatMap((s) => s.hosts);

  const edges = new Map<ServiceKey, ConnectivityEdge>();
  for (const node of graph.values()) {
    const v = evaluator.verdict({ kind: "service", node }, { kind: "gateway", key: EGRESS_GATEWAY });
    edges.set(node.key, {
      source: node.key,
      target: EGRESS_GATEWAY,
      ...v,
      viaServiceMesh: hasEgressGateway,
      meshType: hasEgressGateway ? "istio" : node.meshType,
      directEgress: !hasEgressGateway,
      ...(externalHosts.length ? { externalHosts } : {})
    });
  }

  return {
    egress: {
      key: EGRESS_GATEWAY,
      kind: "egress",
      gateways,
      routes,
      externalServices,
      hasEgressGateway,
      directEgress: !hasEgressGateway
    },
    edges
  };
}
