import { describe, expect, it, vi } from "vitest";
import {
  BestPractice,
  evaluateBestPractices,
  getComplianceScore,
  getRecommendations
} from "../src/analyzer/recommendationAnalyzer";
import { BEST_PRACTICES } from "../src/analyzer/recommendationRules";
import { InfrastructureInfo, NativePolicyRule } from "../src/analyzer/topology/types";
import { ingress, networkPolicy, pod, service } from "./fixtures/fakeCluster";
import { NO_INFRA, ebpfRule, meshRule, nativeRule, offlineTopology } from "./fixtures/topology";

const MESH: InfrastructureInfo = { ...NO_INFRA, meshEnabled: true };
const sidecar = { "sidecar.istio.io/status": "{}" };

const ids = (topology: Parameters<typeof getRecommendations>[0]) => getRecommendations(topology).map((r) => r.id);

const webPolicy: NativePolicyRule = nativeRule(
  networkPolicy("web-policy", "shop", { podSelector: { matchLabels: { app: "web" } }, ingress: [{}] })
);

describe("best-practice checks", () => {
  it("flags a service without a network policy", () => {
    const topology = offlineTopology({ services: [service("web", "shop")], pods: [pod("web-1", "shop", { app: "web" })] });
    const recs = getRecommendations(topology);

    const np = recs.find((r) => r.id.startsWith("np-001"));
    expect(np).toMatchObject({
      id: "np-001-shop/web",
      service: "shop/web",
      namespace: "shop",
      category: "security",
      severity: "high",
      title: "Service shop/web lacks network policy"
    });
    expect(np?.fix.type).toBe("networkpolicy");
    expect(np?.fix.template).toContain("name: web-network-policy");
    expect(np?.fix.command?.startsWith("kubectl apply -f - <<EOF\n")).toBe(true);
    expect(ids(topology)).toEqual(["np-001-shop/web", "np-002"]);
  });

  it("skips system namespaces", () => {
    const topology = offlineTopology({ services: [service("dns", "kube-system")], pods: [] });
    expect(ids(topology)).toEqual([]);
  });

  it("suggests a CiliumNetworkPolicy when the eBPF engine is present", () => {
    const topology = offlineTopology({
      services: [service("web", "shop")],
      pods: [],
      infra: { ...NO_INFRA, cni: "cilium", ebpfEnabled: true }
    });
    expect(getRecommendations(topology)[0].fix.type).toBe("ciliumpolicy");
  });

  it("flags ingress routes without TLS once per ingress", () => {
    const plain = ingress("shop", "shop", {
      rules: [
        {
          host: "shop.example.com",
          http: {
            paths: [
              { path: "/a", pathType: "Prefix", backend: { service: { name: "web", port: { number: 80 } } } },
              { path: "/b", pathType: "Prefix", backend: { service: { name: "web", port: { number: 80 } } } }
            ]
          }
        }
      ]
    });
    const topology = offlineTopology({
      services: [service("web", "shop")],
      pods: [],
      rules: { native: [webPolicy] },
      ingress: { ingresses: [plain] }
    });
    const recs = getRecommendations(topology).filter((r) => r.id.startsWith("ingress-001"));
    expect(recs.map((r) => r.id)).toEqual(["ingress-001-shop/shop"]);
    expect(recs[0].severity).toBe("critical");
  });

  it("checks mesh-only practices when a mesh is present", () => {
    const topology = offlineTopology({
      services: [service("web", "shop")],
      pods: [pod("web-1", "shop", { app: "web" }, { annotations: sidecar })],
      infra: MESH,
      rules: { native: [webPolicy], mesh: [meshRule("authorizationpolicy", "allow-all", "shop")] }
    });
    expect(ids(topology)).toEqual(["egress-001", "mtls-001", "authz-001"]);

    const hardened = offlineTopology({
      services: [service("web", "shop")],
      pods: [pod("web-1", "shop", { app: "web" }, { annotations: sidecar })],
      infra: MESH,
      rules: { native: [webPolicy], mesh: [meshRule("peerauthentication", "default", "istio-system")] },
      egress: { egressGatewayDeployments: [{ name: "istio-egressgateway", namespace: "istio-system" }] }
    });
    expect(ids(hardened)).toEqual([]);
  });

  it("flags an eBPF engine running only native policies", () => {
    const infra = { ...NO_INFRA, cni: "cilium", ebpfEnabled: true };
    const native = offlineTopology({ services: [service("web", "shop")], pods: [], infra, rules: { native: [webPolicy] } });
    expect(ids(native)).toEqual(["ebpf-001"]);

    const withCilium = offlineTopology({
      services: [service("web", "shop")],
      pods: [],
      infra,
      rules: { native: [webPolicy], ebpf: [ebpfRule("web-l7", "shop")] }
    });
    expect(ids(withCilium)).toEqual([]);
  });

  it("flags a policy-as-code engine without policies", () => {
    const infra = { ...NO_INFRA, policyAsCodeEnabled: true };
    const topology = offlineTopology({ services: [service("web", "shop")], pods: [], infra, rules: { native: [webPolicy] } });
    expect(ids(topology)).toEqual(["pac-001"]);

    const covered = offlineTopology({
      services: [service("web", "shop")],
      pods: [],
      infra,
      rules: { native: [webPolicy] },
      policyAsCode: [{ name: "require-labels", namespace: "", kind: "clusterpolicy" }]
    });
    expect(ids(covered)).toEqual([]);
  });

  it("flags likely-unused services", () => {
    const topology = offlineTopology({
      services: [service("web", "shop")],
      pods: [pod("web-1", "shop", { app: "web" })],
      rules: { native: [webPolicy] },
      traffic: new Map([["shop/web", 0]])
    });
    const recs = getRecommendations(topology);
    expect(recs.map((r) => r.id)).toEqual(["cost-001-shop/web"]);
    expect(recs[0].impact).toBe("Potential saving of $0.00/mo");
  });

  it("flags blocked pairs when blocked edges exceed a tenth of all edges", () => {
    const gatewayOnly = nativeRule(
      networkPolicy("allow-gateway", "ns1", {
        podSelector: {},
        policyTypes: ["Ingress"],
        ingress: [{ from: [{ podSelector: { matchLabels: { app: "gateway" } } }] }]
      })
    );
    const topology = offlineTopology({
      services: [service("api", "ns1"), service("web", "ns1")],
      pods: [pod("api-1", "ns1", { app: "api" }), pod("web-1", "ns1", { app: "web" })],
      rules: { native: [gatewayOnly] }
    });
    expect(topology.summary).toMatchObject({ totalConnections: 4, allowedConnections: 2, blockedConnections: 2 });

    const blocked = getRecommendations(topology).filter((r) => r.id.startsWith("blocked-001"));
    expect(blocked.map((r) => r.id)).toEqual(["blocked-001-ns1/api-to-ns1/web", "blocked-001-ns1/web-to-ns1/api"]);
    expect(blocked[0].description).toBe("Connection from ns1/api to ns1/web is blocked by policy(ies): allow-gateway");
    expect(blocked[0].fix.template).toContain("# Allows a connection blocked by: allow-gateway\n");
  });

  it("does not count default-deny lockdown as blocked connections", () => {
    const denyAll = nativeRule(networkPolicy("deny-all", "ns1", { podSelector: {}, policyTypes: ["Ingress"] }));
    const topology = offlineTopology({
      services: [service("api", "ns1"), service("web", "ns1")],
      pods: [pod("api-1", "ns1", { app: "api" }), pod("web-1", "ns1", { app: "web" })],
      rules: { native: [denyAll] }
    });
    expect(topology.summary.blockedConnections).toBe(2);
    expect(topology.connectivity["ns1/api"][0]).toMatchObject({ allowed: false, defaultDeny: true });
    expect(getComplianceScore(topology).details.checks["blocked-001"]).toBe(true);
  });
});

describe("mesh coverage", () => {
  const meshed = (n: number, total: number) => {
    const services = Array.from({ length: total }, (_, i) => service(`svc${i}`, "shop"));
    const pods = services.map((s, i) =>
      pod(`svc${i}-1`, "shop", { app: `svc${i}` }, i < n ? { annotations: sidecar } : {})
    );
    return offlineTopology({ services, pods, infra: MESH, rules: { native: [webPolicy] } });
  };

  it("recommends sidecar injection below 80% coverage", () => {
    const low = meshed(3, 5);
    expect(low.summary.meshCoverage).toBe(60);
    const rec = getRecommendations(low).find((r) => r.id === "mesh-001");
    expect(rec?.description).toBe(
      "Only 60% of services are in the mesh (target: 80%). Services outside the mesh miss mTLS and telemetry."
    );
  });

  it("drops the recommendation once coverage is raised", () => {
    expect(ids(meshed(5, 5))).not.toContain("mesh-001");
    expect(ids(meshed(4, 5))).not.toContain("mesh-001");
  });
});

describe("compliance score", () => {
  const withPolicy = () =>
    offlineTopology({ services: [service("web", "shop")], pods: [pod("web-1", "shop", { app: "web" })], rules: { native: [webPolicy] } });
  const withoutPolicy = () =>
    offlineTopology({ services: [service("web", "shop")], pods: [pod("web-1", "shop", { app: "web" })] });

  it("derives score and details from one pass", () => {
    const { score, details } = getComplianceScore(withoutPolicy());
    expect(score).toBe(81);
    expect(details).toMatchObject({ score: 81, passedChecks: 9, totalChecks: 11, recommendationsCount: 2 });
    expect(details.checks["np-001"]).toBe(false);
    expect(details.checks["np-002"]).toBe(false);
    expect(details.checks["blocked-001"]).toBe(true);
    expect(Object.keys(details.checks)).toEqual(BEST_PRACTICES.map((b) => b.id));
  });

  it("does not rise when a relied-on policy is removed and recovers when it is restored", () => {
    const denyAll = nativeRule(networkPolicy("deny-all", "ns1", { podSelector: {}, policyTypes: ["Ingress"] }));
    const cluster = (native: NativePolicyRule[]) =>
      offlineTopology({
        services: [service("a", "ns1"), service("b", "ns1"), service("web", "ns2")],
        pods: [pod("a-1", "ns1", { app: "a" }), pod("b-1", "ns1", { app: "b" }), pod("web-1", "ns2", { app: "web" })],
        rules: { native }
      });

    const before = getComplianceScore(cluster([denyAll])).score;
    const removed = getComplianceScore(cluster([])).score;
    const restored = getComplianceScore(cluster([denyAll])).score;
    expect(before).toBe(81);
    expect(removed).toBeLessThanOrEqual(before);
    expect(restored).toBe(before);
  });

  it("runs each check exactly once", () => {
    const pass = vi.fn(() => ({ passed: true, findings: [] }));
    const fail = vi.fn(() => ({ passed: false, findings: [] }));
    const practices: BestPractice[] = [
      { id: "a", name: "A", category: "security", severity: "low", check: pass },
      { id: "b", name: "B", category: "security", severity: "low", check: fail },
      { id: "c", name: "C", category: "security", severity: "low", check: pass }
    ];
    const report = evaluateBestPractices(withPolicy(), practices);
    expect(report.score).toBe(66);
    expect(report.passed).toBe(2);
    expect(pass).toHaveBeenCalledTimes(2);
    expect(fail).toHaveBeenCalledTimes(1);
  });
});
