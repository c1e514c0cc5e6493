import * as k8s from "@kubernetes/client-node";
import { IngressObjects, isEgressGateway } from "../aggregator";
import type { IstioGateway, VirtualService } from "../crds";
import { PolicyEvaluator } from "../policy/evaluator";
import { INGRESS_GATEWAY, keyForHost, serviceKey } from "../serviceKey";
import { GatewayNode, GatewayObject, GatewayRoute, ServiceKey, ServiceNode } from "../types";

type RouteDraft = Omit<GatewayRoute, "allowed" | "reason" | "blockingPolicies" | "provenance">;

function ingressClass(ing: k8s.V1Ingress): string {
  return ing.spec?.ingressClassName ?? ing.metadata?.annotations?.["kubernetes.io/ingress.class"] ?? "";
}

function ingressType(ing: k8s.V1Ingress): GatewayRoute["type"] {
  const cls = ingressClass(ing).toLowerCase();
  if (cls.includes("istio")) return "istio";
  if (cls === "" || cls.includes("nginx")) return "nginx";
  return "kubernetes";
}

function tlsCovers(ing: k8s.V1Ingress, host: string): boolean {
  return (ing.spec?.tls ?? []).some((t) => !t.hosts || t.hosts.length === 0 || t.hosts.includes(host));
}

function backendPort(b: k8s.V1IngressServiceBackend): string | undefined {
  if (b.port?.number !== undefined) return String(b.port.number);
  return b.port?.name;
}

/** One route per rule path, plus the default backend. */
export function routesFromIngress(ing: k8s.V1Ingress): RouteDraft[] {
  const name = ing.metadata?.name ?? "";
  const namespace = ing.metadata?.namespace ?? "";
  const type = ingressType(ing);
  const out: RouteDraft[] = [];

  for (const rule of ing.spec?.rules ?? []) {
    const host = rule.host ?? "*";
    for (const p of rule.http?.paths ?? []) {
      const svc = p.backend.service;
      if (!svc) continue;
      out.push({
        source: name,
        type,
        namespace,
        host,
        path: p.path ?? "/",
        target: serviceKey(svc.name, namespace),
        port: backendPort(svc),
        tls: tlsCovers(ing, host)
      });
    }
  }

  const def = ing.spec?.defaultBackend?.service;
  if (def) {
    out.push({
      source: name,
      type,
      namespace,
      host: "*",
      path: "/",
      target: serviceKey(def.name, namespace),
      port: backendPort(def),
      tls: tlsCovers(ing, "*")
    });
  }
  return out;
}

function gatewayRef(ref: string, vsNamespace: string): string {
  return ref.includes("/") ? ref : `${vsNamespace}/${ref}`;
}

function gatewayHasTls(g: IstioGateway): boolean {
  return (g.spec.servers ?? []).some((s) => s.tls !== undefined);
}

function uriOf(match: { uri?: { exact?: string; prefix?: string; regex?: string } } | undefined): string {
  return match?.uri?.exact ?? match?.uri?.prefix ?? match?.uri?.regex ?? "/";
}

/** Routes of VirtualServices bound to an edge gateway ("mesh" alone is in-mesh routing). */
export function routesFromVirtualService(vs: VirtualService, gateways: Map<string, IstioGateway>): RouteDraft[] {
  const bound = (vs.spec.gateways ?? []).filter((g) => g !== "mesh");
  if (!bound.length) return [];

  const namespace = vs.metadata.namespace ?? "";
  const host = vs.spec.hosts?.[0] ?? "*";
  const tls = bound.some((ref) => {
    const g = gateways.get(gatewayRef(ref, namespace));
    return g !== undefined && gatewayHasTls(g);
  });

  const out: RouteDraft[] = [];
  const push = (dest: { host: string; port?: { number?: number } }, path: string, routeTls: boolean) => {
    out.push({
      source: vs.metadata.name,
      type: "istio",
      namespace,
      host,
      path,
      target: keyForHost(dest.host, namespace),
      port: dest.port?.number !== undefined ? String(dest.port.number) : undefined,
      tls: routeTls
    });
  };

  for (const http of vs.spec.http ?? []) {
    const paths = (http.match ?? []).map((m) => uriOf(m));
    for (const r of http.route ?? []) {
      for (const path of paths.length ? paths : ["/"]) push(r.destination, path, tls);
    }
  }
  for (const t of vs.spec.tls ?? []) {
    for (const r of t.route ?? []) push(r.destination, "", true);
  }
  for (const t of vs.spec.tcp ?? []) {
    for (const r of t.route ?? []) push(r.destination, "", tls);
  }
  return out;
}

function gatewayObjects(objs: IngressObjects): GatewayObject[] {
  const out: GatewayObject[] = objs.gateways
    .filter((g) => !isEgressGateway(g))
    .map((g): GatewayObject => ({
      name: g.metadata.name,
      namespace: g.metadata.namespace ?? "",
      type: "istio",
      hosts: (g.spec.servers ?? []).flatMap((s) => s.hosts ?? []),
      ports: (g.spec.servers ?? []).map((s) => String(s.port?.number ?? "")).filter(Boolean),
      selector: g.spec.selector ?? {},
      tls: gatewayHasTls(g)
    }));
  for (const ing of objs.ingresses) {
    const tls = (ing.spec?.tls ?? []).length > 0;
    out.push({
      name: ing.metadata?.name ?? "",
      namespace: ing.metadata?.namespace ?? "",
      type: "kubernetes",
      hosts: (ing.spec?.rules ?? []).map((r) => r.host ?? "*"),
      ports: tls ? ["80", "443"] : ["80"],
      selector: {},
      tls
    });
  }
  return out;
}

/**
 * The ingress-gateway node. Each route is evaluated with the ingress
 * gateway as the caller; routes to services outside the graph are dropped.
 */
export function resolveIngress(
  objs: IngressObjects,
  graph: Map<ServiceKey, ServiceNode>,
  evaluator: PolicyEvaluator
): GatewayNode {
  const gatewaysByRef = new Map<string, IstioGateway>();
  for (const g of objs.gateways) gatewaysByRef.set(`${g.metadata.namespace ?? ""}/${g.metadata.name}`, g);

  const drafts = [
    ...objs.ingresses.flatMap(routesFromIngress),
    ...objs.virtualServices.flatMap((vs) => routesFromVirtualService(vs, gatewaysByRef))
  ];

  const routes: GatewayRoute[] = [];
  for (const d of drafts) {
    const node = graph.get(d.target);
    if (!node) continue;
    const v = evaluator.verdict({ kind: "gateway", key: INGRESS_GATEWAY }, { kind: "service", node });
    routes.push({ ...d, ...v });
  }

  return { key: INGRESS_GATEWAY, kind: "ingress", gateways: gatewayObjects(objs), routes };
}
