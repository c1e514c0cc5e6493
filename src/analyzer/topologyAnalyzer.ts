import { EngineConfig } from "../config";
import { CancelledError, FatalFetchError, FetchTimeoutError, classifyFetchError } from "../errors";
import { Logger, silentLogger } from "../logger";
import {
  ComplianceDetails,
  Recommendation,
  getComplianceScore,
  getRecommendations
} from "./recommendationAnalyzer";
import { FetchContext, FetchOutcome, ResourceAggregator, raceSignal } from "./topology/aggregator";
import { buildServiceGraph } from "./topology/builder";
import { CacheRegistry, Clock, TtlCache } from "./topology/cache";
import { resolveEgress } from "./topology/gateways/egress";
import { resolveIngress } from "./topology/gateways/ingress";
import { InfrastructureDetector } from "./topology/infrastructure";
import { ClusterApi } from "./topology/k8s";
import { PrometheusMetricsSource, TrafficMetricsSource } from "./topology/metrics";
import { tracePath } from "./topology/pathTracer";
import { PolicyEvaluator } from "./topology/policy/evaluator";
import { assembleConnectivity, summarize } from "./topology/summary";
import {
  EbpfPolicyRule,
  InfrastructureInfo,
  MeshPolicyRule,
  PathTrace,
  PolicyAsCodeRecord,
  PolicyEngine,
  ServiceKey,
  TopologyData
} from "./topology/types";
import { PolicyEventListener, PolicyWatcher } from "./topology/watcher";

export type TopologyEngineOptions = {
  logger?: Logger;
  /** defaults to Prometheus at config.metricsUrl; null disables the traffic signal */
  metrics?: TrafficMetricsSource | null;
  clock?: Clock;
};

export type GetTopologyOptions = {
  signal?: AbortSignal;
  forceRefresh?: boolean;
};

/** "all" and "" both mean every namespace. */
export function normalizeNamespace(namespace: string | undefined): string {
  const ns = (namespace ?? "").trim();
  return ns === "all" ? "" : ns;
}

function skipped<T>(value: T): Promise<FetchOutcome<T>> {
  return Promise.resolve({ ok: true, value });
}

export class TopologyEngine {
  private log: Logger;
  private now: Clock;
  private caches: CacheRegistry;
  private topologyCache: TtlCache<TopologyData>;
  private aggregator: ResourceAggregator;
  private infrastructure: InfrastructureDetector;
  private metrics?: TrafficMetricsSource;
  private watcher: PolicyWatcher;
  // bumped on every invalidation; a computation started before one is not cached
  private generation = 0;

  constructor(
    api: ClusterApi,
    private config: EngineConfig,
    options: TopologyEngineOptions = {}
  ) {
    this.log = options.logger ?? silentLogger;
    this.now = options.clock ?? Date.now;
    this.caches = new CacheRegistry(config.cacheTtlMs, this.now);
    this.topologyCache = this.caches.create<TopologyData>();
    this.aggregator = new ResourceAggregator(api, this.caches, this.log.child("fetch"));
    this.infrastructure = new InfrastructureDetector(api, this.log.child("infra"));
    if (options.metrics !== undefined) {
      this.metrics = options.metrics ?? undefined;
    } else if (config.metricsUrl) {
      this.metrics = new PrometheusMetricsSource(config.metricsUrl, config.metricsTimeoutMs);
    }

    this.watcher = new PolicyWatcher(api, this.log.child("watch"));
    this.watcher.onEvent((eventType, engine, name, namespace) => {
      this.log.debug(`${eventType} ${engine} policy ${namespace}/${name}`);
      this.invalidatePolicies(engine);
    });
  }

  async getTopology(namespace: string, options: GetTopologyOptions = {}): Promise<TopologyData> {
    const ns = normalizeNamespace(namespace);
    const key = `topology:${ns}:`;
    if (options.forceRefresh) this.refresh();

    const hit = this.topologyCache.get(key);
    if (hit.found) return hit.value;

    const generation = this.generation;
    const topology = await this.withDeadline(options.signal, (ctx) => this.compute(ns, ctx));
    if (generation === this.generation) this.topologyCache.set(key, topology);
    return topology;
  }

  tracePath(source: string, destination: string, namespace: string, topology: TopologyData): PathTrace {
    return tracePath(source, destination, normalizeNamespace(namespace), topology);
  }

  getRecommendations(topology: TopologyData): Recommendation[] {
    return getRecommendations(topology);
  }

  getComplianceScore(topology: TopologyData): { score: number; details: ComplianceDetails } {
    return getComplianceScore(topology);
  }

  refresh() {
    this.generation++;
    this.caches.clear();
    this.log.debug("caches cleared");
  }

  onPolicyEvent(listener: PolicyEventListener): () => void {
    return this.watcher.onEvent(listener);
  }

  /** Returns the number of policy engines being watched. */
  watchPolicies(namespace: string): Promise<number> {
    return this.watcher.watch(normalizeNamespace(namespace));
  }

  stopWatching() {
    this.watcher.stop();
  }

  private invalidatePolicies(engine: PolicyEngine) {
    this.generation++;
    this.topologyCache.clear();
    this.aggregator.invalidatePolicies(engine);
  }

  /**
   * One deadline per computation. The abort reason says whether the
   * deadline or the caller stopped it.
   */
  private async withDeadline<T>(signal: AbortSignal | undefined, fn: (ctx: FetchContext) => Promise<T>): Promise<T> {
    const timeoutMs = this.config.requestTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new FetchTimeoutError("services", timeoutMs)), timeoutMs);
    const onCallerAbort = () => controller.abort(new CancelledError());

    if (signal?.aborted) onCallerAbort();
    else signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      return await fn({ signal: controller.signal, timeoutMs });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async compute(ns: string, ctx: FetchContext): Promise<TopologyData> {
    const started = this.now();
    let infra: InfrastructureInfo;
    try {
      infra = await raceSignal(this.infrastructure.detect(), "infrastructure", ctx);
    } catch (e) {
      // no graph without infrastructure: a deadline here is fatal
      if (e instanceof CancelledError) throw e;
      throw new FatalFetchError("infrastructure", e);
    }

    const a = this.aggregator;
    const [services, pods, native, mesh, ebpf, policyAsCode, rbac, drift, ingressObjs, egressObjs, traffic] =
      await Promise.all([
        a.services(ns, ctx),
        a.pods(ns, ctx),
        a.networkPolicies(ns, ctx),
        infra.meshEnabled ? a.meshPolicies(ns, ctx) : skipped<MeshPolicyRule[]>([]),
        infra.ebpfEnabled ? a.ebpfPolicies(ns, ctx) : skipped<EbpfPolicyRule[]>([]),
        infra.policyAsCodeEnabled ? a.policyAsCode(ns, ctx) : skipped<PolicyAsCodeRecord[]>([]),
        a.rbac(ns, ctx),
        a.drift(ns, ctx),
        a.ingressObjects(ns, infra.meshEnabled, ctx),
        a.egressObjects(ns, infra.meshEnabled, ctx),
        this.traffic(ns, ctx)
      ]);

    // cancellation wins over any other failure, then services/pods
    const all: Array<FetchOutcome<unknown>> = [services, pods, native, mesh, ebpf, policyAsCode, rbac, drift, ingressObjs, egressObjs, traffic];
    for (const o of all) {
      if (!o.ok && o.error instanceof CancelledError) throw o.error;
    }
    if (!services.ok) throw services.error;
    if (!pods.ok) throw pods.error;

    const warnings: string[] = [];
    for (const o of all.slice(2)) {
      if (!o.ok) warnings.push(o.error.message);
    }

    const valueOr = <T>(o: FetchOutcome<T>, empty: T): T => (o.ok ? o.value : empty);
    const policies = {
      native: valueOr(native, []),
      mesh: valueOr(mesh, []),
      ebpf: valueOr(ebpf, [])
    };

    const graph = buildServiceGraph({
      namespace: ns,
      services: services.value,
      pods: pods.value,
      infra,
      traffic: traffic.ok ? traffic.value : undefined,
      drift: drift.ok ? drift.value : undefined,
      unusedRpsThreshold: this.config.unusedRpsThreshold
    });

    const evaluator = new PolicyEvaluator(policies);
    const serviceEdges = evaluator.evaluate(graph);
    const ingress = resolveIngress(
      valueOr(ingressObjs, { ingresses: [], gateways: [], virtualServices: [] }),
      graph,
      evaluator
    );
    const { egress, edges: egressEdges } = resolveEgress(
      valueOr(egressObjs, { serviceEntries: [], gateways: [], egressGatewayDeployments: [] }),
      graph,
      evaluator
    );
    const connectivity = assembleConnectivity(serviceEdges, egressEdges, ingress);

    const topology: TopologyData = {
      namespace: ns,
      generatedAt: new Date(this.now()).toISOString(),
      services: Object.fromEntries(graph),
      connectivity,
      ingress,
      egress,
      policies,
      policyAsCode: valueOr(policyAsCode, []),
      infrastructure: infra,
      rbac: valueOr(rbac, { roleBindings: [], clusterRoleBindings: [], serviceAccounts: [] }),
      drift: valueOr(drift, { gitOpsEnabled: false, applications: [] }),
      summary: summarize([...graph.values()], connectivity),
      warnings
    };

    this.log.info(`topology for ${ns || "all namespaces"} computed`, {
      services: topology.summary.totalServices,
      connections: topology.summary.totalConnections,
      warnings: warnings.length,
      ms: this.now() - started
    });
    return topology;
  }

  /** Best-effort; undefined rates mean "no signal", not "no traffic". */
  private async traffic(ns: string, ctx: FetchContext): Promise<FetchOutcome<Map<ServiceKey, number> | undefined>> {
    if (!this.metrics) return { ok: true, value: undefined };
    try {
      return { ok: true, value: await raceSignal(this.metrics.requestRates(ns, ctx.signal), "metrics", ctx) };
    } catch (e) {
      const error = classifyFetchError("metrics", e);
      this.log.warn(error.message, { resource: "metrics" });
      return { ok: false, error };
    }
  }
}
