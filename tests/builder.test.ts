import { describe, expect, it } from "vitest";
import { BuildInput, buildServiceGraph, monthlyCost } from "../src/analyzer/topology/builder";
import { InfrastructureInfo } from "../src/analyzer/topology/types";
import { pod, service } from "./fixtures/fakeCluster";

const noInfra: InfrastructureInfo = {
  cni: "",
  ebpfEnabled: false,
  meshEnabled: false,
  policyAsCodeEnabled: false,
  hubbleEnabled: false
};

function input(overrides: Partial<BuildInput>): BuildInput {
  return { namespace: "shop", services: [], pods: [], infra: noInfra, unusedRpsThreshold: 0.001, ...overrides };
}

const withRequests = (name: string, ns: string, labels: Record<string, string>, extra: Record<string, string> = {}) =>
  pod(name, ns, labels, {
    annotations: extra,
    containers: [{ name: "app", resources: { requests: { cpu: "500m", memory: "512Mi" } } }]
  });

describe("buildServiceGraph", () => {
  it("matches pods by selector within the service's namespace", () => {
    const graph = buildServiceGraph(
      input({
        services: [service("web", "shop")],
        pods: [
          pod("web-1", "shop", { app: "web" }),
          pod("web-2", "shop", { app: "web" }, { phase: "Pending" }),
          pod("web-x", "other", { app: "web" }),
          pod("db-1", "shop", { app: "db" })
        ]
      })
    );

    const web = graph.get("shop/web");
    expect(web).toMatchObject({
      key: "shop/web",
      name: "web",
      namespace: "shop",
      type: "ClusterIP",
      ports: ["http:80/TCP"],
      pods: ["web-1", "web-2"],
      podCount: 2,
      healthyPods: 1,
      workload: "web",
      meshType: "none",
      podSecurity: "baseline",
      hasPolicy: false
    });
    expect(web?.cost).toBeUndefined();
    expect(web?.driftStatus).toBeUndefined();
  });

  it("selects no pods for an empty selector", () => {
    const graph = buildServiceGraph(
      input({ services: [service("external", "shop", {})], pods: [pod("web-1", "shop", { app: "web" })] })
    );
    expect(graph.get("shop/external")?.podCount).toBe(0);
  });

  it("detects Istio sidecars only when the mesh is present", () => {
    const services = [service("web", "shop")];
    const pods = [pod("web-1", "shop", { app: "web" }, { annotations: { "sidecar.istio.io/status": "{}" } })];

    expect(buildServiceGraph(input({ services, pods })).get("shop/web")?.meshType).toBe("none");
    const meshed = buildServiceGraph(input({ services, pods, infra: { ...noInfra, meshEnabled: true } }));
    expect(meshed.get("shop/web")?.meshType).toBe("istio");
  });

  it("detects istio-proxy containers", () => {
    const p = pod("web-1", "shop", { app: "web" }, {
      containers: [{ name: "app" }, { name: "istio-proxy", image: "docker.io/istio/proxyv2:1.20.0" }]
    });
    const graph = buildServiceGraph(
      input({ services: [service("web", "shop")], pods: [p], infra: { ...noInfra, meshEnabled: true } })
    );
    expect(graph.get("shop/web")?.meshType).toBe("istio");
  });

  it("detects Cilium policy annotations when the eBPF engine is present", () => {
    const graph = buildServiceGraph(
      input({
        services: [service("web", "shop")],
        pods: [pod("web-1", "shop", { app: "web" }, { annotations: { "io.cilium.k8s.policy.name": "x" } })],
        infra: { ...noInfra, cni: "cilium", ebpfEnabled: true }
      })
    );
    expect(graph.get("shop/web")?.meshType).toBe("cilium");
  });

  it("prices likely-unused services over every backing pod", () => {
    const graph = buildServiceGraph(
      input({
        services: [service("web", "shop")],
        pods: [withRequests("web-1", "shop", { app: "web" }), withRequests("web-2", "shop", { app: "web" })],
        traffic: new Map([["shop/web", 0]])
      })
    );
    expect(graph.get("shop/web")?.cost).toEqual({
      rps: 0,
      cpuMillicores: 1000,
      memoryMiB: 1024,
      likelyUnused: true,
      potentialMonthlySaving: 34
    });
  });

  it("reports no saving for services with traffic", () => {
    const graph = buildServiceGraph(
      input({
        services: [service("web", "shop")],
        pods: [withRequests("web-1", "shop", { app: "web" })],
        traffic: new Map([["shop/web", 12.5]])
      })
    );
    expect(graph.get("shop/web")?.cost).toMatchObject({ rps: 12.5, likelyUnused: false, potentialMonthlySaving: 0 });
  });

  it("reads a missing series as zero traffic only for meshed services", () => {
    const sidecar = { "sidecar.istio.io/status": "{}" };
    const graph = buildServiceGraph(
      input({
        services: [service("web", "shop"), service("db", "shop")],
        pods: [withRequests("web-1", "shop", { app: "web" }, sidecar), withRequests("db-1", "shop", { app: "db" })],
        infra: { ...noInfra, meshEnabled: true },
        traffic: new Map()
      })
    );
    expect(graph.get("shop/web")?.cost?.rps).toBe(0);
    expect(graph.get("shop/web")?.cost?.likelyUnused).toBe(true);
    expect(graph.get("shop/db")?.cost).toBeUndefined();
  });

  it("attaches drift status by application name", () => {
    const graph = buildServiceGraph(
      input({
        services: [service("web", "shop"), service("db", "shop")],
        drift: {
          gitOpsEnabled: true,
          applications: [{ name: "shop-web", namespace: "argocd", status: "OutOfSync", repoURL: "", targetRevision: "" }]
        }
      })
    );
    expect(graph.get("shop/web")?.driftStatus).toBe("OutOfSync");
    expect(graph.get("shop/db")?.driftStatus).toBe("Unknown");
  });
});

describe("monthlyCost", () => {
  it("charges per vCPU and per GiB", () => {
    expect(monthlyCost(250, 256)).toBe(8.5);
  });
});
