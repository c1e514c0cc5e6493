import * as k8s from "@kubernetes/client-node";
import { driftStatusFor } from "./drift";
import { podLabelsMatchSelector } from "./k8s";
import { classifyPod, worstTier } from "./podSecurity";
import { cpuMillicores, memoryMiB } from "./quantity";
import { serviceKey } from "./serviceKey";
import { CostSignal, DriftData, InfrastructureInfo, MeshType, ServiceKey, ServiceNode } from "./types";

export const CPU_MONTHLY_USD = 30; // per vCPU
export const MEMORY_MONTHLY_USD = 4; // per GiB

export type BuildInput = {
  namespace: string;
  services: k8s.V1Service[];
  pods: k8s.V1Pod[];
  infra: InfrastructureInfo;
  /** undefined when the metrics query failed or is disabled */
  traffic?: Map<ServiceKey, number>;
  drift?: DriftData;
  unusedRpsThreshold: number;
};

function hasIstioSidecar(pod: k8s.V1Pod): boolean {
  if (pod.metadata?.annotations?.["sidecar.istio.io/status"]) return true;
  const containers = [...(pod.spec?.initContainers ?? []), ...(pod.spec?.containers ?? [])];
  return containers.some((c) => c.name === "istio-proxy" || (c.image ?? "").includes("istio/proxy"));
}

function hasCiliumPolicyAnnotation(pod: k8s.V1Pod): boolean {
  return Object.keys(pod.metadata?.annotations ?? {}).some((k) => k.startsWith("io.cilium.k8s.policy"));
}

export function meshTypeOf(pods: k8s.V1Pod[], infra: InfrastructureInfo): MeshType {
  if (infra.meshEnabled && pods.some(hasIstioSidecar)) return "istio";
  if (infra.ebpfEnabled && pods.some(hasCiliumPolicyAnnotation)) return "cilium";
  return "none";
}

function formatPort(p: k8s.V1ServicePort): string {
  const proto = p.protocol ?? "TCP";
  return p.name ? `${p.name}:${p.port}/${proto}` : `${p.port}/${proto}`;
}

/** Sums container requests across every backing pod. */
export function requestedResources(pods: k8s.V1Pod[]): { cpuMillicores: number; memoryMiB: number } {
  let cpu = 0;
  let mem = 0;
  for (const pod of pods) {
    for (const c of pod.spec?.containers ?? []) {
      const requests = c.resources?.requests ?? {};
      cpu += cpuMillicores(requests["cpu"]);
      mem += memoryMiB(requests["memory"]);
    }
  }
  return { cpuMillicores: cpu, memoryMiB: mem };
}

export function monthlyCost(cpuMillis: number, memMiB: number): number {
  const usd = (cpuMillis / 1000) * CPU_MONTHLY_USD + (memMiB / 1024) * MEMORY_MONTHLY_USD;
  return Math.round(usd * 100) / 100;
}

function costSignal(
  key: ServiceKey,
  pods: k8s.V1Pod[],
  meshType: MeshType,
  input: BuildInput
): CostSignal | undefined {
  if (!input.traffic) return undefined;
  const rps = input.traffic.get(key);
  // istio_requests_total only has series for meshed workloads
  if (rps === undefined && meshType !== "istio") return undefined;

  const observed = rps ?? 0;
  const { cpuMillicores, memoryMiB } = requestedResources(pods);
  const likelyUnused = observed < input.unusedRpsThreshold;
  return {
    rps: observed,
    cpuMillicores,
    memoryMiB,
    likelyUnused,
    potentialMonthlySaving: likelyUnused ? monthlyCost(cpuMillicores, memoryMiB) : 0
  };
}

/**
 * Builds service nodes. Pods are indexed by namespace once, so each service
 * only scans the pods of its own namespace.
 */
export function buildServiceGraph(input: BuildInput): Map<ServiceKey, ServiceNode> {
  const podsByNs = new Map<string, k8s.V1Pod[]>();
  for (const pod of input.pods) {
    const ns = pod.metadata?.namespace ?? "";
    const list = podsByNs.get(ns);
    if (list) list.push(pod);
    else podsByNs.set(ns, [pod]);
  }

  const nodes = new Map<ServiceKey, ServiceNode>();
  for (const svc of input.services) {
    const name = svc.metadata?.name;
    if (!name) continue;
    const namespace = svc.metadata?.namespace ?? input.namespace;
    const key = serviceKey(name, namespace);
    const selector = svc.spec?.selector ?? {};

    const matching = (podsByNs.get(namespace) ?? []).filter((p) => podLabelsMatchSelector(p.metadata?.labels, selector));
    const meshType = meshTypeOf(matching, input.infra);

    const node: ServiceNode = {
      key,
      name,
      namespace,
      type: svc.spec?.type ?? "ClusterIP",
      clusterIP: svc.spec?.clusterIP ?? "",
      ports: (svc.spec?.ports ?? []).map(formatPort),
      labels: svc.metadata?.labels ?? {},
      selector,
      pods: matching.map((p) => p.metadata?.name ?? ""),
      podCount: matching.length,
      healthyPods: matching.filter((p) => p.status?.phase === "Running").length,
      podLabels: matching.map((p) => p.metadata?.labels ?? {}),
      workload: matching[0]?.metadata?.labels?.["app"],
      meshType,
      podSecurity: worstTier(matching.map(classifyPod)),
      hasPolicy: false
    };

    const drift = input.drift ? driftStatusFor(node, input.drift) : undefined;
    if (drift) node.driftStatus = drift;
    const cost = costSignal(key, matching, meshType, input);
    if (cost) node.cost = cost;

    nodes.set(key, node);
  }
  return nodes;
}
