import * as k8s from "@kubernetes/client-node";
import { PodSecurityTier } from "./types";

const TIER_RANK: Record<PodSecurityTier, number> = { restricted: 0, baseline: 1, privileged: 2 };

function allContainers(spec: k8s.V1PodSpec): k8s.V1Container[] {
  return [...(spec.initContainers ?? []), ...spec.containers];
}

export function classifyPod(pod: k8s.V1Pod): PodSecurityTier {
  const spec = pod.spec;
  if (!spec) return "baseline";

  if (spec.hostNetwork || spec.hostPID || spec.hostIPC) return "privileged";
  const containers = allContainers(spec);
  if (containers.some((c) => c.securityContext?.privileged)) return "privileged";

  const podNonRoot = spec.securityContext?.runAsNonRoot === true;
  const restricted =
    containers.length > 0 &&
    containers.every((c) => {
      const sc = c.securityContext;
      if (!sc) return false;
      const nonRoot = sc.runAsNonRoot ?? podNonRoot;
      return nonRoot === true && sc.allowPrivilegeEscalation === false;
    });

  return restricted ? "restricted" : "baseline";
}

/** Least restrictive tier across pods; no pods reads as baseline. */
export function worstTier(tiers: PodSecurityTier[]): PodSecurityTier {
  if (tiers.length === 0) return "baseline";
  return tiers.reduce((a, b) => (TIER_RANK[b] > TIER_RANK[a] ? b : a));
}
