import * as k8s from "@kubernetes/client-node";
import { ClusterConnectionError } from "./errors";

export type KubeConnectOptions = {
  /** kubeconfig context to switch to; the current context when unset */
  context?: string;
};

/**
 * Loads kubeconfig using the standard kubeconfig loading rules:
 * - KUBECONFIG env var
 * - ~/.kube/config
 * - in-cluster service account (if applicable)
 *
 * and checks the cluster answers a one-item namespace list.
 */
export async function kubeConnect(options: KubeConnectOptions = {}): Promise<k8s.KubeConfig> {
  try {
    const kc = new k8s.KubeConfig();
    kc.loadFromDefault();
    if (options.context) kc.setCurrentContext(options.context);
    const coreV1 = kc.makeApiClient(k8s.CoreV1Api);
    await coreV1.listNamespace(undefined, undefined, undefined, undefined, undefined, 1);
    return kc;
  } catch (err) {
    throw new ClusterConnectionError(err);
  }
}
