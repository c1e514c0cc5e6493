import * as k8s from "@kubernetes/client-node";
import {
  CancelledError,
  ESSENTIAL_RESOURCES,
  FetchTimeoutError,
  ResourceKind,
  TopologyError,
  classifyFetchError,
  isNotFound
} from "../../errors";
import { Logger } from "../../logger";
import { CacheRegistry, TtlCache } from "./cache";
import {
  ARGO_APPLICATIONS,
  CILIUM_CLUSTERWIDE_POLICIES,
  CILIUM_NETWORK_POLICIES,
  ISTIO_NETWORKING_VERSIONS,
  ISTIO_SECURITY_VERSIONS,
  IstioGateway,
  KYVERNO_CLUSTER_POLICIES,
  KYVERNO_POLICIES,
  ServiceEntry,
  VirtualService,
  argoApplicationSchema,
  gatewaySchema,
  istioNetworking,
  istioSecurity,
  parseItems,
  parseNamed,
  serviceEntrySchema,
  virtualServiceSchema
} from "./crds";
import { ClusterApi, CustomResourceRef } from "./k8s";
import {
  DriftData,
  EbpfPolicyRule,
  MeshPolicyKind,
  MeshPolicyRule,
  NativePolicyRule,
  PolicyAsCodeRecord,
  PolicyEngine,
  RbacData,
  RoleBindingInfo
} from "./types";

export type FetchOutcome<T> = { ok: true; value: T } | { ok: false; error: TopologyError };

/** Shared by every fetch of one topology computation. */
export type FetchContext = {
  signal: AbortSignal;
  timeoutMs: number;
};

export type IngressObjects = {
  ingresses: k8s.V1Ingress[];
  gateways: IstioGateway[];
  virtualServices: VirtualService[];
};

export type EgressObjects = {
  serviceEntries: ServiceEntry[];
  gateways: IstioGateway[];
  egressGatewayDeployments: Array<{ name: string; namespace: string }>;
};

const EGRESS_GATEWAY_SELECTOR = "app=istio-egressgateway";

/**
 * Rejects with FetchTimeoutError or CancelledError as soon as the shared
 * signal aborts. The signal's reason tells the two apart.
 */
export function raceSignal<T>(p: Promise<T>, resource: ResourceKind, ctx: FetchContext): Promise<T> {
  const aborted = () =>
    ctx.signal.reason instanceof FetchTimeoutError
      ? new FetchTimeoutError(resource, ctx.timeoutMs)
      : new CancelledError(resource);

  if (ctx.signal.aborted) return Promise.reject(aborted());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(aborted());
    ctx.signal.addEventListener("abort", onAbort, { once: true });
    void p.then(
      (v) => {
        ctx.signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        ctx.signal.removeEventListener("abort", onAbort);
        reject(e);
      }
    );
  });
}

/** Returns [] when the CRD is not installed. */
async function listOrEmpty(api: ClusterApi, ref: CustomResourceRef, ns: string): Promise<unknown[]> {
  try {
    return await api.listCustomObjects(ref, ns);
  } catch (e) {
    if (isNotFound(e)) return [];
    throw e;
  }
}

function toRoleBinding(b: k8s.V1RoleBinding | k8s.V1ClusterRoleBinding): RoleBindingInfo {
  return {
    name: b.metadata?.name ?? "",
    namespace: b.metadata?.namespace,
    roleName: b.roleRef.name,
    roleKind: b.roleRef.kind,
    subjects: (b.subjects ?? []).map((s) => ({ kind: s.kind, name: s.name, namespace: s.namespace }))
  };
}

/**
 * One cached, deadline-bound fetch per resource kind. Failures of anything
 * but services and pods come back as soft errors.
 */
export class ResourceAggregator {
  private servicesCache: TtlCache<k8s.V1Service[]>;
  private podsCache: TtlCache<k8s.V1Pod[]>;
  private nativeCache: TtlCache<NativePolicyRule[]>;
  private meshCache: TtlCache<MeshPolicyRule[]>;
  private ebpfCache: TtlCache<EbpfPolicyRule[]>;
  private pacCache: TtlCache<PolicyAsCodeRecord[]>;
  private rbacCache: TtlCache<RbacData>;
  private driftCache: TtlCache<DriftData>;
  private ingressCache: TtlCache<IngressObjects>;
  private egressCache: TtlCache<EgressObjects>;
  private versionCache: TtlCache<string | null>;

  constructor(
    private api: ClusterApi,
    caches: CacheRegistry,
    private log: Logger
  ) {
    this.servicesCache = caches.create<k8s.V1Service[]>();
    this.podsCache = caches.create<k8s.V1Pod[]>();
    this.nativeCache = caches.create<NativePolicyRule[]>();
    this.meshCache = caches.create<MeshPolicyRule[]>();
    this.ebpfCache = caches.create<EbpfPolicyRule[]>();
    this.pacCache = caches.create<PolicyAsCodeRecord[]>();
    this.rbacCache = caches.create<RbacData>();
    this.driftCache = caches.create<DriftData>();
    this.ingressCache = caches.create<IngressObjects>();
    this.egressCache = caches.create<EgressObjects>();
    this.versionCache = caches.create<string | null>();
  }

  services(ns: string, ctx: FetchContext) {
    return this.fetch("services", this.servicesCache, `services:${ns}:`, ctx, () => this.api.listServices(ns));
  }

  pods(ns: string, ctx: FetchContext) {
    return this.fetch("pods", this.podsCache, `pods:${ns}:`, ctx, () => this.api.listPods(ns));
  }

  networkPolicies(ns: string, ctx: FetchContext) {
    return this.fetch("networkpolicies", this.nativeCache, `networkpolicies:${ns}:`, ctx, async () => {
      const items = await this.api.listNetworkPolicies(ns);
      return items.map(
        (p): NativePolicyRule => ({
          engine: "native",
          kind: "networkpolicy",
          name: p.metadata?.name ?? "",
          namespace: p.metadata?.namespace ?? "",
          policy: p
        })
      );
    });
  }

  meshPolicies(ns: string, ctx: FetchContext) {
    return this.fetch("meshpolicies", this.meshCache, `meshpolicies:${ns}:`, ctx, async () => {
      const version = await this.meshNetworkingVersion(ns);
      const rules: MeshPolicyRule[] = [];
      const add = (kind: MeshPolicyKind, items: unknown[]) => {
        for (const o of parseNamed(items)) {
          rules.push({ engine: "mesh", kind, name: o.metadata.name, namespace: o.metadata.namespace ?? "" });
        }
      };

      if (version) {
        const [vs, dr] = await Promise.all([
          listOrEmpty(this.api, istioNetworking("virtualservices", version), ns),
          listOrEmpty(this.api, istioNetworking("destinationrules", version), ns)
        ]);
        add("virtualservice", vs);
        add("destinationrule", dr);
      }
      add("authorizationpolicy", await this.listSecurity("authorizationpolicies", ns));
      add("peerauthentication", await this.listSecurity("peerauthentications", ns));
      return rules;
    });
  }

  ebpfPolicies(ns: string, ctx: FetchContext) {
    return this.fetch("ebpfpolicies", this.ebpfCache, `ebpfpolicies:${ns}:`, ctx, async () => {
      const [namespaced, clusterWide] = await Promise.all([
        listOrEmpty(this.api, CILIUM_NETWORK_POLICIES, ns),
        listOrEmpty(this.api, CILIUM_CLUSTERWIDE_POLICIES, "")
      ]);
      const rules: EbpfPolicyRule[] = parseNamed(namespaced).map((o): EbpfPolicyRule => ({
        engine: "ebpf",
        kind: "ciliumnetworkpolicy",
        name: o.metadata.name,
        namespace: o.metadata.namespace ?? ""
      }));
      for (const o of parseNamed(clusterWide)) {
        rules.push({ engine: "ebpf", kind: "ciliumclusterwidenetworkpolicy", name: o.metadata.name, namespace: "" });
      }
      return rules;
    });
  }

  policyAsCode(ns: string, ctx: FetchContext) {
    return this.fetch("policyascode", this.pacCache, `policyascode:${ns}:`, ctx, async () => {
      const [policies, clusterPolicies] = await Promise.all([
        listOrEmpty(this.api, KYVERNO_POLICIES, ns),
        listOrEmpty(this.api, KYVERNO_CLUSTER_POLICIES, "")
      ]);
      const records: PolicyAsCodeRecord[] = parseNamed(policies).map((o): PolicyAsCodeRecord => ({
        name: o.metadata.name,
        namespace: o.metadata.namespace ?? "",
        kind: "policy"
      }));
      for (const o of parseNamed(clusterPolicies)) {
        records.push({ name: o.metadata.name, namespace: "", kind: "clusterpolicy" });
      }
      return records;
    });
  }

  rbac(ns: string, ctx: FetchContext) {
    return this.fetch("rbac", this.rbacCache, `rbac:${ns}:`, ctx, async () => {
      const [roleBindings, clusterRoleBindings, serviceAccounts] = await Promise.all([
        this.api.listRoleBindings(ns),
        this.api.listClusterRoleBindings(),
        this.api.listServiceAccounts(ns)
      ]);
      return {
        roleBindings: roleBindings.map(toRoleBinding),
        clusterRoleBindings: clusterRoleBindings.map(toRoleBinding),
        serviceAccounts: serviceAccounts.map((sa) => ({
          name: sa.metadata?.name ?? "",
          namespace: sa.metadata?.namespace ?? ""
        }))
      };
    });
  }

  drift(ns: string, ctx: FetchContext) {
    return this.fetch("drift", this.driftCache, `drift:${ns}:`, ctx, async (): Promise<DriftData> => {
      let items: unknown[];
      try {
        items = await this.api.listCustomObjects(ARGO_APPLICATIONS, ns);
      } catch (e) {
        if (isNotFound(e)) return { gitOpsEnabled: false, applications: [] };
        throw e;
      }
      return {
        gitOpsEnabled: true,
        applications: parseItems(argoApplicationSchema, items).map((app) => ({
          name: app.metadata.name,
          namespace: app.metadata.namespace ?? "",
          status: app.status?.sync?.status ?? "Unknown",
          repoURL: app.spec.source?.repoURL ?? "",
          targetRevision: app.spec.source?.targetRevision ?? ""
        }))
      };
    });
  }

  ingressObjects(ns: string, meshEnabled: boolean, ctx: FetchContext) {
    const key = `ingress:${ns}:mesh=${meshEnabled}`;
    return this.fetch("ingress", this.ingressCache, key, ctx, async (): Promise<IngressObjects> => {
      const ingresses = await this.api.listIngresses(ns);
      const version = meshEnabled ? await this.meshNetworkingVersion(ns) : null;
      if (!version) return { ingresses, gateways: [], virtualServices: [] };

      const [gw, vs] = await Promise.all([
        listOrEmpty(this.api, istioNetworking("gateways", version), ns),
        listOrEmpty(this.api, istioNetworking("virtualservices", version), ns)
      ]);
      return {
        ingresses,
        gateways: parseItems(gatewaySchema, gw),
        virtualServices: parseItems(virtualServiceSchema, vs)
      };
    });
  }

  egressObjects(ns: string, meshEnabled: boolean, ctx: FetchContext) {
    const key = `egress:${ns}:mesh=${meshEnabled}`;
    return this.fetch("egress", this.egressCache, key, ctx, async (): Promise<EgressObjects> => {
      if (!meshEnabled) return { serviceEntries: [], gateways: [], egressGatewayDeployments: [] };
      const version = await this.meshNetworkingVersion(ns);
      const [se, gw, deployments] = await Promise.all([
        version ? listOrEmpty(this.api, istioNetworking("serviceentries", version), ns) : Promise.resolve([]),
        version ? listOrEmpty(this.api, istioNetworking("gateways", version), ns) : Promise.resolve([]),
        this.api.listDeployments("", EGRESS_GATEWAY_SELECTOR)
      ]);
      return {
        serviceEntries: parseItems(serviceEntrySchema, se),
        gateways: parseItems(gatewaySchema, gw).filter((g) => isEgressGateway(g)),
        egressGatewayDeployments: deployments.map((d) => ({
          name: d.metadata?.name ?? "",
          namespace: d.metadata?.namespace ?? ""
        }))
      };
    });
  }

  invalidatePolicies(engine: PolicyEngine) {
    if (engine === "native") this.nativeCache.clear();
    else if (engine === "mesh") this.meshCache.clear();
    else this.ebpfCache.clear();
  }

  /**
   * First Istio networking version that answers a list, or null when
   * none is served.
   */
  private meshNetworkingVersion(ns: string): Promise<string | null> {
    return this.versionCache.getOrLoad(`meshversion:${ns}:`, async () => {
      for (const version of ISTIO_NETWORKING_VERSIONS) {
        try {
          await this.api.listCustomObjects(istioNetworking("virtualservices", version), ns);
          return version;
        } catch (e) {
          if (!isNotFound(e)) throw e;
        }
      }
      return null;
    });
  }

  private async listSecurity(plural: string, ns: string): Promise<unknown[]> {
    for (const version of ISTIO_SECURITY_VERSIONS) {
      try {
        return await this.api.listCustomObjects(istioSecurity(plural, version), ns);
      } catch (e) {
        if (!isNotFound(e)) throw e;
      }
    }
    return [];
  }

  private async fetch<T>(
    resource: ResourceKind,
    cache: TtlCache<T>,
    key: string,
    ctx: FetchContext,
    loader: () => Promise<T>
  ): Promise<FetchOutcome<T>> {
    try {
      const value = await raceSignal(cache.getOrLoad(key, loader), resource, ctx);
      return { ok: true, value };
    } catch (e) {
      const error = classifyFetchError(resource, e);
      if (ESSENTIAL_RESOURCES.has(resource) || error instanceof CancelledError) {
        this.log.error(error.message, { resource, key });
      } else {
        this.log.warn(error.message, { resource });
      }
      return { ok: false, error };
    }
  }
}

export function isEgressGateway(g: IstioGateway): boolean {
  return Object.values(g.spec.selector ?? {}).some((v) => v.includes("egressgateway"));
}
