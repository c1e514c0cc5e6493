/**
 * Engine configuration, read from environment variables.
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import type { LogLevel } from "./logger";

export const DEFAULT_METRICS_URL = "http://kube-prometheus-stack-prometheus.monitoring.svc.cluster.local:9090";

const MIN_REQUEST_TIMEOUT_MS = 10_000;
const MAX_REQUEST_TIMEOUT_MS = 30_000;

const envSchema = z.object({
  CACHE_TTL: z.coerce.number().nonnegative().default(30),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  METRICS_URL: z
    .union([z.literal(""), z.string().url()])
    .default(DEFAULT_METRICS_URL),
  METRICS_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  UNUSED_RPS_THRESHOLD: z.coerce.number().nonnegative().default(0.001),
  KUBE_CONTEXT: z.string().trim().min(1).optional(),
  POD_NAMESPACE: z.string().trim().min(1).default("default"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

export type EngineConfig = {
  cacheTtlMs: number;
  requestTimeoutMs: number;
  metricsUrl?: string;
  metricsTimeoutMs: number;
  unusedRpsThreshold: number;
  kubeContext?: string;
  defaultNamespace: string;
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  // empty strings count as unset, except METRICS_URL where "" disables metrics
  const raw: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const v = env[key];
    if (v === undefined) continue;
    if (v.trim() === "" && key !== "METRICS_URL") continue;
    raw[key] = v.trim();
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const v = parsed.data;

  return {
    cacheTtlMs: v.CACHE_TTL * 1000,
    requestTimeoutMs: Math.min(MAX_REQUEST_TIMEOUT_MS, Math.max(MIN_REQUEST_TIMEOUT_MS, v.REQUEST_TIMEOUT_MS)),
    metricsUrl: v.METRICS_URL === "" ? undefined : v.METRICS_URL.replace(/\/+$/, ""),
    metricsTimeoutMs: v.METRICS_TIMEOUT_MS,
    unusedRpsThreshold: v.UNUSED_RPS_THRESHOLD,
    kubeContext: v.KUBE_CONTEXT,
    defaultNamespace: v.POD_NAMESPACE,
    logLevel: v.LOG_LEVEL
  };
}
