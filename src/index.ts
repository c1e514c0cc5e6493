import { EngineConfig, loadConfig } from "./config";
import { kubeConnect } from "./kubeClient";
import { createLogger } from "./logger";
import { TopologyEngine, TopologyEngineOptions } from "./analyzer/topologyAnalyzer";
import { KubeClusterApi } from "./analyzer/topology/k8s";

/**
 * Connects with the ambient kubeconfig and returns an engine configured
 * from the environment.
 */
export async function createTopologyEngine(
  config: EngineConfig = loadConfig(),
  options: TopologyEngineOptions = {}
): Promise<TopologyEngine> {
  const logger = options.logger ?? createLogger("engine", config.logLevel);
  const kc = await kubeConnect({ context: config.kubeContext });
  logger.info(`connected to ${kc.getCurrentContext()}`);
  return new TopologyEngine(new KubeClusterApi(kc), config, { ...options, logger });
}

export { TopologyEngine, normalizeNamespace } from "./analyzer/topologyAnalyzer";
export type { GetTopologyOptions, TopologyEngineOptions } from "./analyzer/topologyAnalyzer";
export {
  evaluateBestPractices,
  getComplianceScore,
  getRecommendations
} from "./analyzer/recommendationAnalyzer";
export type {
  BestPractice,
  BestPracticeReport,
  ComplianceDetails,
  FixRecommendation,
  Recommendation,
  RecommendationCategory,
  RecommendationSeverity
} from "./analyzer/recommendationAnalyzer";
export { BEST_PRACTICES } from "./analyzer/recommendationRules";
export { KubeClusterApi } from "./analyzer/topology/k8s";
export type { ClusterApi, CustomResourceRef, WatchHandle } from "./analyzer/topology/k8s";
export { PrometheusMetricsSource } from "./analyzer/topology/metrics";
export type { TrafficMetricsSource } from "./analyzer/topology/metrics";
export { tracePath, NO_PATH } from "./analyzer/topology/pathTracer";
export { toMermaid } from "./analyzer/topology/mermaid";
export type { PolicyEventListener, PolicyEventType } from "./analyzer/topology/watcher";
export { INGRESS_GATEWAY, EGRESS_GATEWAY } from "./analyzer/topology/serviceKey";
export * from "./analyzer/topology/types";
export * from "./errors";
export { loadConfig, DEFAULT_METRICS_URL } from "./config";
export type { EngineConfig } from "./config";
export { createLogger, silentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export { kubeConnect } from "./kubeClient";
export type { KubeConnectOptions } from "./kubeClient";
