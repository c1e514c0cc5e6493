import { describe, expect, it } from "vitest";
import { gatewaySchema, parseItems, serviceEntrySchema, virtualServiceSchema } from "../src/analyzer/topology/crds";
import { resolveEgress } from "../src/analyzer/topology/gateways/egress";
import { resolveIngress, routesFromIngress } from "../src/analyzer/topology/gateways/ingress";
import { PolicyEvaluator } from "../src/analyzer/topology/policy/evaluator";
import { customObject, ingress, networkPolicy, pod, service } from "./fixtures/fakeCluster";
import { graphOf, nativeRule, ruleSet } from "./fixtures/topology";

const graph = () =>
  graphOf(
    [service("api", "ns1"), service("web", "ns1")],
    [pod("api-1", "ns1", { app: "api" }), pod("web-1", "ns1", { app: "web" })]
  );

const shopIngress = ingress("shop", "ns1", {
  ingressClassName: "nginx",
  tls: [{ hosts: ["shop.example.com"], secretName: "shop-tls" }],
  rules: [
    {
      host: "shop.example.com",
      http: {
        paths: [
          { path: "/api", pathType: "Prefix", backend: { service: { name: "api", port: { number: 8080 } } } },
          { path: "/ghost", pathType: "Prefix", backend: { service: { name: "ghost", port: { number: 80 } } } }
        ]
      }
    }
  ],
  defaultBackend: { service: { name: "web", port: { name: "http" } } }
});

describe("ingress resolution", () => {
  it("turns rule paths and the default backend into routes", () => {
    expect(routesFromIngress(shopIngress)).toEqual([
      {
        source: "shop",
        type: "nginx",
        namespace: "ns1",
        host: "shop.example.com",
        path: "/api",
        target: "ns1/api",
        port: "8080",
        tls: true
      },
      {
        source: "shop",
        type: "nginx",
        namespace: "ns1",
        host: "shop.example.com",
        path: "/ghost",
        target: "ns1/ghost",
        port: "80",
        tls: true
      },
      { source: "shop", type: "nginx", namespace: "ns1", host: "*", path: "/", target: "ns1/web", port: "http", tls: false }
    ]);
  });

  it("types ingresses by class", () => {
    const of = (cls: string | undefined) =>
      routesFromIngress(
        ingress("x", "ns1", { ingressClassName: cls, defaultBackend: { service: { name: "api", port: { number: 80 } } } })
      )[0].type;
    expect(of(undefined)).toBe("nginx");
    expect(of("istio")).toBe("istio");
    expect(of("traefik")).toBe("kubernetes");
  });

  it("evaluates routes and drops those to unknown services", () => {
    const node = resolveIngress(
      { ingresses: [shopIngress], gateways: [], virtualServices: [] },
      graph(),
      new PolicyEvaluator(ruleSet())
    );
    expect(node.key).toBe("ingress-gateway");
    expect(node.routes.map((r) => r.target)).toEqual(["ns1/api", "ns1/web"]);
    expect(node.routes[0]).toMatchObject({ allowed: true, reason: "No policy exists", provenance: "default" });
    expect(node.gateways).toEqual([
      { name: "shop", namespace: "ns1", type: "kubernetes", hosts: ["shop.example.com"], ports: ["80", "443"], selector: {}, tls: true }
    ]);
  });

  it("blocks routes into a default-deny target", () => {
    const deny = networkPolicy("deny-api", "ns1", { podSelector: { matchLabels: { app: "api" } }, policyTypes: ["Ingress"] });
    const node = resolveIngress(
      { ingresses: [shopIngress], gateways: [], virtualServices: [] },
      graph(),
      new PolicyEvaluator(ruleSet({ native: [nativeRule(deny)] }))
    );
    expect(node.routes[0]).toMatchObject({ target: "ns1/api", allowed: false, blockingPolicies: ["deny-api"] });
    expect(node.routes[1]).toMatchObject({ target: "ns1/web", allowed: true });
  });

  it("reads VirtualServices bound to an edge gateway", () => {
    const gateways = parseItems(gatewaySchema, [
      customObject("shop-gw", "ns1", {
        selector: { istio: "ingressgateway" },
        servers: [{ port: { number: 443, name: "https", protocol: "HTTPS" }, hosts: ["shop.example.com"], tls: { mode: "SIMPLE" } }]
      })
    ]);
    const virtualServices = parseItems(virtualServiceSchema, [
      customObject("shop-vs", "ns1", {
        hosts: ["shop.example.com"],
        gateways: ["shop-gw"],
        http: [{ match: [{ uri: { prefix: "/v2" } }], route: [{ destination: { host: "api", port: { number: 8080 } } }] }]
      }),
      customObject("internal", "ns1", {
        hosts: ["web"],
        gateways: ["mesh"],
        http: [{ route: [{ destination: { host: "web" } }] }]
      })
    ]);

    const node = resolveIngress({ ingresses: [], gateways, virtualServices }, graph(), new PolicyEvaluator(ruleSet()));
    expect(node.routes).toEqual([
      {
        source: "shop-vs",
        type: "istio",
        namespace: "ns1",
        host: "shop.example.com",
        path: "/v2",
        target: "ns1/api",
        port: "8080",
        tls: true,
        allowed: true,
        reason: "No policy exists",
        blockingPolicies: [],
        provenance: "default"
      }
    ]);
    expect(node.gateways).toEqual([
      {
        name: "shop-gw",
        namespace: "ns1",
        type: "istio",
        hosts: ["shop.example.com"],
        ports: ["443"],
        selector: { istio: "ingressgateway" },
        tls: true
      }
    ]);
  });
});

describe("egress resolution", () => {
  const noEgress = { serviceEntries: [], gateways: [], egressGatewayDeployments: [] };

  it("gives every service a direct egress edge without a gateway", () => {
    const { egress, edges } = resolveEgress(noEgress, graph(), new PolicyEvaluator(ruleSet()));
    expect(egress).toMatchObject({ key: "egress-gateway", kind: "egress", hasEgressGateway: false, directEgress: true, routes: [] });
    expect(edges.get("ns1/api")).toEqual({
      source: "ns1/api",
      target: "egress-gateway",
      allowed: true,
      reason: "No policy exists",
      blockingPolicies: [],
      provenance: "default",
      viaServiceMesh: false,
      meshType: "none",
      directEgress: true
    });
  });

  it("lists ServiceEntry hosts on the egress edges", () => {
    const serviceEntries = parseItems(serviceEntrySchema, [
      customObject("payments", "ns1", { hosts: ["api.payments.example"], ports: [{ number: 443, name: "tls", protocol: "TLS" }] })
    ]);
    const { egress, edges } = resolveEgress({ ...noEgress, serviceEntries }, graph(), new PolicyEvaluator(ruleSet()));

    expect(egress.externalServices).toEqual([
      { name: "payments", namespace: "ns1", hosts: ["api.payments.example"], ports: ["443/TLS"] }
    ]);
    expect(egress.routes[0]).toMatchObject({ type: "serviceentry", target: "api.payments.example", port: "443", tls: true });
    expect(edges.get("ns1/web")?.externalHosts).toEqual(["api.payments.example"]);
  });

  it("routes through the mesh when an egress gateway is deployed", () => {
    const { egress, edges } = resolveEgress(
      { ...noEgress, egressGatewayDeployments: [{ name: "istio-egressgateway", namespace: "istio-system" }] },
      graph(),
      new PolicyEvaluator(ruleSet())
    );
    expect(egress.hasEgressGateway).toBe(true);
    expect(egress.gateways.map((g) => g.name)).toEqual(["istio-egressgateway"]);
    expect(edges.get("ns1/api")).toMatchObject({ viaServiceMesh: true, meshType: "istio", directEgress: false });
  });

  it("applies egress-direction policies to egress edges", () => {
    const deny = networkPolicy("web-no-egress", "ns1", { podSelector: { matchLabels: { app: "web" } }, policyTypes: ["Egress"] });
    const { edges } = resolveEgress(noEgress, graph(), new PolicyEvaluator(ruleSet({ native: [nativeRule(deny)] })));
    expect(edges.get("ns1/web")).toMatchObject({
      allowed: false,
      reason: "Blocked by default-deny NetworkPolicy: web-no-egress (no egress rules)",
      blockingPolicies: ["web-no-egress"]
    });
    expect(edges.get("ns1/api")?.allowed).toBe(true);
  });
});
