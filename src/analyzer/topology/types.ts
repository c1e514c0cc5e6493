import type * as k8s from "@kubernetes/client-node";

export type ServiceKey = string; // "namespace/name", or "name" when namespace-less

export type MeshType = "none" | "istio" | "cilium";

export type PodSecurityTier = "privileged" | "baseline" | "restricted";

export type CostSignal = {
  rps: number;
  cpuMillicores: number;
  memoryMiB: number;
  likelyUnused: boolean;
  potentialMonthlySaving: number; // USD
};

export type ServiceNode = {
  key: ServiceKey;
  name: string;
  namespace: string;
  type: string;
  clusterIP: string;
  ports: string[]; // "name:80/TCP" or "80/TCP"
  labels: Record<string, string>;
  selector: Record<string, string>;
  pods: string[];
  podCount: number;
  healthyPods: number;
  podLabels: Array<Record<string, string>>;
  workload?: string;
  meshType: MeshType;
  podSecurity: PodSecurityTier;
  hasPolicy: boolean; // set by the policy evaluator
  driftStatus?: string;
  cost?: CostSignal;
};

export type PolicyEngine = "native" | "mesh" | "ebpf";

export type NativePolicyRule = {
  engine: "native";
  kind: "networkpolicy";
  name: string;
  namespace: string;
  policy?: k8s.V1NetworkPolicy;
};

export type MeshPolicyKind =
  | "virtualservice"
  | "destinationrule"
  | "authorizationpolicy"
  | "peerauthentication";

export type MeshPolicyRule = {
  engine: "mesh";
  kind: MeshPolicyKind;
  name: string;
  namespace: string;
};

export type EbpfPolicyRule = {
  engine: "ebpf";
  kind: "ciliumnetworkpolicy" | "ciliumclusterwidenetworkpolicy";
  name: string;
  namespace: string; // "" for cluster-wide
};

export type PolicyRule = NativePolicyRule | MeshPolicyRule | EbpfPolicyRule;

export type PolicyRuleSet = {
  native: NativePolicyRule[];
  mesh: MeshPolicyRule[];
  ebpf: EbpfPolicyRule[];
};

export type PolicyAsCodeRecord = {
  name: string;
  namespace: string;
  kind: "policy" | "clusterpolicy";
};

/**
 * default: no rule applied. structured: decided from a parsed NetworkPolicy.
 * heuristic: decided from a rule name because its content is not parsed.
 */
export type VerdictProvenance = "default" | "structured" | "heuristic";

export type ConnectivityEdge = {
  source: ServiceKey;
  target: ServiceKey;
  allowed: boolean;
  reason: string;
  blockingPolicies: string[];
  provenance: VerdictProvenance;
  defaultDeny?: boolean;
  viaServiceMesh: boolean;
  meshType: MeshType;
  port?: string;
  protocol?: string;
  directEgress?: boolean;
  externalHosts?: string[];
};

export type GatewayKind = "ingress" | "egress";

export type GatewayRoute = {
  source: string; // Ingress / VirtualService / ServiceEntry name
  type: "kubernetes" | "nginx" | "istio" | "direct" | "serviceentry";
  namespace: string;
  host: string;
  path: string;
  target: ServiceKey;
  port?: string;
  tls: boolean;
  allowed: boolean;
  reason: string;
  blockingPolicies: string[];
  provenance: VerdictProvenance;
  defaultDeny?: boolean;
};

export type GatewayObject = {
  name: string;
  namespace: string;
  type: "istio" | "istio-egress" | "kubernetes";
  hosts: string[];
  ports: string[];
  selector: Record<string, string>;
  tls: boolean;
};

export type ExternalService = {
  name: string;
  namespace: string;
  hosts: string[];
  ports: string[];
};

export type GatewayNode = {
  key: "ingress-gateway" | "egress-gateway";
  kind: GatewayKind;
  gateways: GatewayObject[];
  routes: GatewayRoute[];
};

export type EgressInfo = GatewayNode & {
  externalServices: ExternalService[];
  hasEgressGateway: boolean;
  directEgress: boolean;
};

export type InfrastructureInfo = {
  cni: string; // "cilium", "calico", "flannel", "weave" or ""
  ebpfEnabled: boolean;
  meshEnabled: boolean;
  policyAsCodeEnabled: boolean;
  hubbleEnabled: boolean;
};

export type SubjectInfo = { kind: string; name: string; namespace?: string };

export type RoleBindingInfo = {
  name: string;
  namespace?: string;
  roleName: string;
  roleKind: string;
  subjects: SubjectInfo[];
};

export type RbacData = {
  roleBindings: RoleBindingInfo[];
  clusterRoleBindings: RoleBindingInfo[];
  serviceAccounts: Array<{ name: string; namespace: string }>;
};

export type DriftApplication = {
  name: string;
  namespace: string;
  status: string; // "Synced", "OutOfSync", ...
  repoURL: string;
  targetRevision: string;
};

export type DriftData = {
  gitOpsEnabled: boolean;
  applications: DriftApplication[];
};

export type TopologySummary = {
  totalServices: number;
  servicesWithMesh: number;
  totalConnections: number;
  allowedConnections: number;
  blockedConnections: number;
  meshCoverage: number; // percent, 0-100
  istioCoverage: number;
  ciliumCoverage: number;
};

export type ConnectivityMap = Record<string, ConnectivityEdge[]>;

export type TopologyData = {
  namespace: string; // "" = all namespaces
  generatedAt: string;
  services: Record<ServiceKey, ServiceNode>;
  connectivity: ConnectivityMap;
  ingress: GatewayNode;
  egress: EgressInfo;
  policies: PolicyRuleSet;
  policyAsCode: PolicyAsCodeRecord[];
  infrastructure: InfrastructureInfo;
  rbac: RbacData;
  drift: DriftData;
  summary: TopologySummary;
  warnings: string[];
};

export type HopKind = "ingress" | "service" | "egress";

export type PathHop = {
  from: string;
  to: string;
  kind: HopKind;
  allowed: boolean;
  reason: string;
  policies: string[];
  meshType?: MeshType;
};

export type PathTrace = {
  source: string;
  destination: string;
  hops: PathHop[];
  allowed: boolean;
  reason: string;
  blockedAt?: { index: number; hop: PathHop };
};
