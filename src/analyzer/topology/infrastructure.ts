import { describeError } from "../../errors";
import { Logger } from "../../logger";
import { ClusterApi } from "./k8s";
import { InfrastructureInfo } from "./types";

const CNI_NAMES = ["calico", "flannel", "weave"] as const;

export function cniFromDaemonSets(names: string[]): string {
  const lower = names.map((n) => n.toLowerCase());
  if (lower.some((n) => n.includes("cilium"))) return "cilium";
  for (const cni of CNI_NAMES) {
    if (lower.some((n) => n.includes(cni))) return cni;
  }
  return "";
}

/**
 * Probes the cluster for CNI, mesh, policy-as-code and Hubble. Every probe
 * reads as "absent" when it fails.
 */
export class InfrastructureDetector {
  constructor(
    private api: ClusterApi,
    private log: Logger
  ) {}

  async detect(): Promise<InfrastructureInfo> {
    const [cni, meshEnabled, policyAsCodeEnabled, hubbleEnabled] = await Promise.all([
      this.probe("cni", "", async () => cniFromDaemonSets((await this.api.listDaemonSets("")).map((d) => d.metadata?.name ?? ""))),
      this.probe("mesh", false, () => this.controlPlane("istio-system", "istiod")),
      this.probe("policy-as-code", false, () => this.controlPlane("kyverno", "kyverno")),
      this.probe("hubble", false, () => this.hubble())
    ]);

    return {
      cni,
      ebpfEnabled: cni === "cilium",
      meshEnabled,
      policyAsCodeEnabled,
      hubbleEnabled
    };
  }

  /** The namespace alone is not enough; the control-plane deployment must exist too. */
  private async controlPlane(namespace: string, deployment: string): Promise<boolean> {
    if (!(await this.api.namespaceExists(namespace))) return false;
    return this.api.deploymentExists(deployment, namespace);
  }

  private async hubble(): Promise<boolean> {
    const [relay, hubble] = await Promise.all([
      this.api.listDeployments("", "k8s-app=hubble-relay"),
      this.api.listDeployments("", "k8s-app=hubble")
    ]);
    return relay.length > 0 || hubble.length > 0;
  }

  private async probe<T>(what: string, absent: T, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      this.log.debug(`${what} probe failed, treating as absent: ${describeError(e)}`);
      return absent;
    }
  }
}
