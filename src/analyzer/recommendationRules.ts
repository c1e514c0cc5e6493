import type { BestPractice, CheckResult, Recommendation } from "./recommendationAnalyzer";
import { isGatewayKey } from "./topology/serviceKey";
import {
  allowConnectionPolicy,
  applyCommand,
  ciliumPolicyExample,
  ciliumPolicyFor,
  egressGatewayConfig,
  kyvernoRequireNetworkPolicy,
  networkPolicyFor,
  restrictiveAuthzPolicy,
  sidecarInjectionConfig,
  strictMtlsPolicy,
  tlsIngressFor
} from "./topology/templates";
import { ConnectivityEdge, ServiceNode, TopologyData } from "./topology/types";

export const MAX_FINDINGS = 10;
export const MESH_COVERAGE_TARGET = 80;
export const BLOCKED_RATIO_LIMIT = 0.1;

const SYSTEM_NAMESPACES = new Set(["kube-system", "kube-public", "kube-node-lease", "istio-system"]);

export function isSystemNamespace(ns: string): boolean {
  return SYSTEM_NAMESPACES.has(ns) || ns.startsWith("kube-") || ns.startsWith("istio-");
}

function result(findings: Recommendation[]): CheckResult {
  return { passed: findings.length === 0, findings };
}

function allEdges(topology: TopologyData): ConnectivityEdge[] {
  return Object.values(topology.connectivity).flat();
}

function coveredByPolicy(svc: ServiceNode, topology: TopologyData): boolean {
  if (topology.policies.native.some((p) => p.namespace === svc.namespace)) return true;
  return (
    topology.infrastructure.ebpfEnabled &&
    topology.policies.ebpf.some((p) => p.namespace === svc.namespace || p.namespace === "")
  );
}

export function checkServicePolicies(topology: TopologyData): CheckResult {
  const findings: Recommendation[] = [];
  let uncovered = 0;
  const ebpf = topology.infrastructure.ebpfEnabled;

  for (const svc of Object.values(topology.services)) {
    if (isSystemNamespace(svc.namespace) || coveredByPolicy(svc, topology)) continue;
    uncovered++;
    if (findings.length >= MAX_FINDINGS) continue;

    const connections = topology.connectivity[svc.key]?.length ?? 0;
    const fixType = ebpf ? "ciliumpolicy" : "networkpolicy";
    const template = ebpf ? ciliumPolicyFor(svc) : networkPolicyFor(svc);
    let description = `Service ${svc.key} has no ${fixType}`;
    description += connections
      ? `. It has ${connections} outgoing connections that should be protected by policy.`
      : ". Consider adding one for defense in depth.";
    if (topology.infrastructure.meshEnabled) {
      description += " This works alongside Istio AuthorizationPolicies for defense in depth.";
    }

    findings.push({
      id: `np-001-${svc.key}`,
      title: `Service ${svc.key} lacks network policy`,
      description,
      category: "security",
      severity: "high",
      service: svc.key,
      namespace: svc.namespace,
      fix: { type: fixType, template, command: applyCommand(template) },
      impact: `Protects ${connections} connections and adds defense in depth`
    });
  }
  return { passed: uncovered === 0, findings };
}

export function checkPolicyRatio(topology: TopologyData): CheckResult {
  const candidates = Object.values(topology.services).filter((s) => !isSystemNamespace(s.namespace));
  const services = candidates.length;
  const policies = topology.policies.native.length;
  const first = candidates[0];
  if (!first || policies * 2 >= services) return result([]);
  return result([
    {
      id: "np-002",
      title: "Few network policies for the number of services",
      description: `${policies} NetworkPolicies cover ${services} services; expected at least one policy per two services.`,
      category: "security",
      severity: "medium",
      fix: {
        type: "networkpolicy",
        template: networkPolicyFor(first),
        manualSteps: [
          "1. List services without a selecting policy",
          "2. Add a NetworkPolicy per workload group",
          "3. Re-run the compliance check"
        ]
      },
      impact: "Narrows the set of workloads reachable from a compromised pod"
    }
  ]);
}

export function checkIngressTls(topology: TopologyData): CheckResult {
  const findings: Recommendation[] = [];
  const seen = new Set<string>();
  for (const route of topology.ingress.routes) {
    if (route.tls) continue;
    const id = `ingress-001-${route.namespace}/${route.source}`;
    if (seen.has(id)) continue;
    seen.add(id);
    findings.push({
      id,
      title: `Ingress ${route.namespace}/${route.source} missing TLS configuration`,
      description: `Route ${route.host}${route.path} to ${route.target} does not have TLS configured, exposing traffic in plaintext.`,
      category: "security",
      severity: "critical",
      namespace: route.namespace,
      fix: {
        type: "ingress",
        template: tlsIngressFor(route),
        manualSteps: [
          "1. Ensure cert-manager is installed",
          "2. Verify a ClusterIssuer exists: kubectl get clusterissuer",
          "3. Add a TLS section to the ingress spec"
        ]
      },
      impact: "Encrypts traffic between clients and services"
    });
  }
  return result(findings);
}

export function checkEgressGateway(topology: TopologyData): CheckResult {
  if (!topology.infrastructure.meshEnabled || topology.egress.hasEgressGateway) return result([]);
  return result([
    {
      id: "egress-001",
      title: "Consider routing egress through Istio EgressGateway",
      description: "Services are accessing external resources directly. Routing through an EgressGateway gives one point of control and monitoring.",
      category: "security",
      severity: "medium",
      fix: {
        type: "egress",
        template: egressGatewayConfig(),
        manualSteps: [
          "1. Deploy the Istio EgressGateway",
          "2. Create a ServiceEntry per external dependency",
          "3. Route external hosts through the gateway with a VirtualService"
        ]
      },
      impact: "Centralizes control and monitoring of external traffic"
    }
  ]);
}

export function checkMeshCoverage(topology: TopologyData): CheckResult {
  const { totalServices, servicesWithMesh } = topology.summary;
  if (!topology.infrastructure.meshEnabled || totalServices === 0) return result([]);
  const coverage = Math.floor((servicesWithMesh * 100) / totalServices);
  if (coverage >= MESH_COVERAGE_TARGET) return result([]);
  return result([
    {
      id: "mesh-001",
      title: "Low Istio service mesh coverage",
      description: `Only ${coverage}% of services are in the mesh (target: ${MESH_COVERAGE_TARGET}%). Services outside the mesh miss mTLS and telemetry.`,
      category: "observability",
      severity: "medium",
      fix: {
        type: "istio",
        template: sidecarInjectionConfig(),
        manualSteps: [
          "1. Label namespaces: kubectl label namespace <ns> istio-injection=enabled",
          "2. Restart workloads to inject sidecars",
          "3. Verify the istio-proxy container is present"
        ]
      },
      impact: "Improves observability, mTLS and traffic management"
    }
  ]);
}

export function checkPeerAuthentication(topology: TopologyData): CheckResult {
  if (!topology.infrastructure.meshEnabled) return result([]);
  if (topology.policies.mesh.some((p) => p.kind === "peerauthentication")) return result([]);
  return result([
    {
      id: "mtls-001",
      title: "Enable STRICT mTLS mode in Istio",
      description: "Istio is detected but no PeerAuthentication was found. Create one with STRICT mTLS mode.",
      category: "security",
      severity: "high",
      fix: {
        type: "istiopolicy",
        template: strictMtlsPolicy(),
        manualSteps: ["1. Start in PERMISSIVE mode", "2. Watch for failing connections", "3. Switch to STRICT"]
      },
      impact: "Enforces mutual TLS between all services"
    }
  ]);
}

export function checkAllowAllAuthz(topology: TopologyData): CheckResult {
  if (!topology.infrastructure.meshEnabled) return result([]);
  const allowAll = topology.policies.mesh.find(
    (p) => p.kind === "authorizationpolicy" && p.name.toLowerCase().includes("allow-all")
  );
  if (!allowAll) return result([]);
  return result([
    {
      id: "authz-001",
      title: "Replace allow-all AuthorizationPolicy with restrictive policies",
      description: `AuthorizationPolicy ${allowAll.namespace}/${allowAll.name} allows all traffic. Replace it with namespace or service-specific policies.`,
      category: "security",
      severity: "high",
      namespace: allowAll.namespace,
      fix: {
        type: "istiopolicy",
        template: restrictiveAuthzPolicy(allowAll.namespace),
        manualSteps: ["1. Identify required callers", "2. Create scoped AuthorizationPolicies", "3. Remove the allow-all policy"]
      },
      impact: "Restricts service-to-service communication to necessary paths"
    }
  ]);
}

export function checkEbpfPolicies(topology: TopologyData): CheckResult {
  const { ebpfEnabled } = topology.infrastructure;
  if (!ebpfEnabled || topology.policies.ebpf.length > 0 || topology.policies.native.length === 0) return result([]);
  return result([
    {
      id: "ebpf-001",
      title: "Consider using CiliumNetworkPolicies for advanced features",
      description: "Cilium is detected but only Kubernetes NetworkPolicies are in use. CiliumNetworkPolicies add L7 filtering and DNS-based rules.",
      category: "security",
      severity: "medium",
      fix: { type: "ciliumpolicy", template: ciliumPolicyExample() },
      impact: "Enables L7-aware policies and Hubble visibility"
    }
  ]);
}

export function checkPolicyAsCode(topology: TopologyData): CheckResult {
  if (!topology.infrastructure.policyAsCodeEnabled || topology.policyAsCode.length > 0) return result([]);
  return result([
    {
      id: "pac-001",
      title: "Use Kyverno to enforce network policy standards",
      description: "Kyverno is installed but no policies were found. A ClusterPolicy can require NetworkPolicies in every namespace.",
      category: "security",
      severity: "medium",
      fix: { type: "kyverno", template: kyvernoRequireNetworkPolicy(), command: applyCommand(kyvernoRequireNetworkPolicy()) },
      impact: "Keeps new namespaces from shipping without network isolation"
    }
  ]);
}

export function checkUnusedServices(topology: TopologyData): CheckResult {
  const unused = Object.values(topology.services).filter((s) => s.cost?.likelyUnused);
  const findings: Recommendation[] = unused.slice(0, MAX_FINDINGS).map((svc): Recommendation => ({
    id: `cost-001-${svc.key}`,
    title: `Service ${svc.key} appears unused`,
    description: `Service ${svc.key} received ${svc.cost?.rps ?? 0} requests/s over the last 24h.`,
    category: "performance",
    severity: "low",
    service: svc.key,
    namespace: svc.namespace,
    fix: {
      type: "manual",
      template: "",
      manualSteps: ["1. Confirm the service has no callers", "2. Scale the workload to zero", "3. Remove it once confirmed"]
    },
    impact: `Potential saving of $${(svc.cost?.potentialMonthlySaving ?? 0).toFixed(2)}/mo`
  }));
  return { passed: unused.length === 0, findings };
}

export function checkBlockedRatio(topology: TopologyData): CheckResult {
  const edges = allEdges(topology);
  // default-deny is deliberate lockdown, not a misconfigured allow-list
  const blocked = edges.filter((e) => !e.allowed && !e.defaultDeny);
  if (edges.length === 0 || blocked.length / edges.length <= BLOCKED_RATIO_LIMIT) return result([]);

  const findings: Recommendation[] = [];
  for (const e of blocked) {
    if (findings.length >= MAX_FINDINGS) break;
    if (isGatewayKey(e.source) || isGatewayKey(e.target)) continue;
    const source = topology.services[e.source];
    const target = topology.services[e.target];
    if (!source || !target) continue;

    const template = allowConnectionPolicy(source, target, e.blockingPolicies);
    let description = `Connection from ${e.source} to ${e.target} is blocked`;
    if (e.blockingPolicies.length) description += ` by policy(ies): ${e.blockingPolicies.join(", ")}`;
    findings.push({
      id: `blocked-001-${e.source}-to-${e.target}`,
      title: `Blocked connection: ${e.source} -> ${e.target}`,
      description,
      category: "resilience",
      severity: "high",
      service: e.source,
      namespace: source.namespace,
      fix: {
        type: "networkpolicy",
        template,
        command: applyCommand(template),
        manualSteps: [
          `1. Review blocking policy(ies): ${e.blockingPolicies.join(", ")}`,
          `2. Allow the connection from ${e.source} to ${e.target} if it is intended`,
          "3. Trace the path again to confirm"
        ]
      },
      impact: `Restores connectivity between ${e.source} and ${e.target}`
    });
  }
  // a high ratio fails even when every blocked edge touches a gateway
  return { passed: false, findings };
}

export const BEST_PRACTICES: BestPractice[] = [
  {
    id: "np-001",
    name: "Services Should Have Network Policies",
    category: "security",
    severity: "high",
    check: checkServicePolicies
  },
  { id: "np-002", name: "Policy-to-Service Ratio", category: "security", severity: "medium", check: checkPolicyRatio },
  { id: "ingress-001", name: "Ingress Should Use TLS", category: "security", severity: "critical", check: checkIngressTls },
  {
    id: "egress-001",
    name: "Egress Should Route Through Gateway",
    category: "security",
    severity: "medium",
    check: checkEgressGateway
  },
  { id: "mesh-001", name: "Service Mesh Coverage", category: "observability", severity: "medium", check: checkMeshCoverage },
  { id: "mtls-001", name: "Mesh mTLS Should Be Configured", category: "security", severity: "high", check: checkPeerAuthentication },
  {
    id: "authz-001",
    name: "AuthorizationPolicies Should Be Restrictive",
    category: "security",
    severity: "high",
    check: checkAllowAllAuthz
  },
  { id: "ebpf-001", name: "Use eBPF Policies Where Available", category: "security", severity: "medium", check: checkEbpfPolicies },
  { id: "pac-001", name: "Use Policy-as-Code", category: "security", severity: "medium", check: checkPolicyAsCode },
  { id: "cost-001", name: "No Likely-Unused Services", category: "performance", severity: "low", check: checkUnusedServices },
  {
    id: "blocked-001",
    name: "Resolve Blocked Connections",
    category: "resilience",
    severity: "high",
    check: checkBlockedRatio
  }
];
