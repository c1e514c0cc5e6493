import { DriftData, ServiceNode } from "./types";

/**
 * Matches applications to services by name (an application whose name
 * contains the service name). Services without a match read "Unknown"
 * when a GitOps controller is present.
 */
export function driftStatusFor(svc: Pick<ServiceNode, "name" | "namespace">, drift: DriftData): string | undefined {
  if (!drift.gitOpsEnabled) return undefined;
  const name = svc.name.toLowerCase();
  const app =
    drift.applications.find((a) => a.namespace === svc.namespace && a.name.toLowerCase().includes(name)) ??
    drift.applications.find((a) => a.name.toLowerCase().includes(name));
  return app?.status ?? "Unknown";
}
