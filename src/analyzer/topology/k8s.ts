import * as k8s from "@kubernetes/client-node";
import { isNotFound } from "../../errors";

/** Group/version/plural of a custom resource. */
export type CustomResourceRef = {
  group: string;
  version: string;
  plural: string;
};

export type WatchHandle = { abort(): void };

export type WatchEventHandler = (type: string, obj: unknown) => void;

/**
 * Read-only view of the cluster used by the engine. An empty namespace
 * means all namespaces.
 */
export type ClusterApi = {
  listServices(ns: string): Promise<k8s.V1Service[]>;
  listPods(ns: string): Promise<k8s.V1Pod[]>;
  listNetworkPolicies(ns: string): Promise<k8s.V1NetworkPolicy[]>;
  listIngresses(ns: string): Promise<k8s.V1Ingress[]>;
  listDaemonSets(ns: string): Promise<k8s.V1DaemonSet[]>;
  listDeployments(ns: string, labelSelector?: string): Promise<k8s.V1Deployment[]>;
  namespaceExists(name: string): Promise<boolean>;
  deploymentExists(name: string, ns: string): Promise<boolean>;
  listRoleBindings(ns: string): Promise<k8s.V1RoleBinding[]>;
  listClusterRoleBindings(): Promise<k8s.V1ClusterRoleBinding[]>;
  listServiceAccounts(ns: string): Promise<k8s.V1ServiceAccount[]>;
  /** Raw list body items; cluster-wide when ns is empty. */
  listCustomObjects(ref: CustomResourceRef, ns: string): Promise<unknown[]>;
  watch(path: string, onEvent: WatchEventHandler, onDone: (err?: unknown) => void): Promise<WatchHandle>;
};

export function makeClients(kc: k8s.KubeConfig) {
  return {
    core: kc.makeApiClient(k8s.CoreV1Api),
    apps: kc.makeApiClient(k8s.AppsV1Api),
    net: kc.makeApiClient(k8s.NetworkingV1Api),
    rbac: kc.makeApiClient(k8s.RbacAuthorizationV1Api),
    custom: kc.makeApiClient(k8s.CustomObjectsApi)
  };
}

function itemsOf(body: unknown): unknown[] {
  if (!body || typeof body !== "object" || !("items" in body)) return [];
  return Array.isArray(body.items) ? body.items : [];
}

export class KubeClusterApi implements ClusterApi {
  private clients: ReturnType<typeof makeClients>;

  constructor(private kc: k8s.KubeConfig) {
    this.clients = makeClients(kc);
  }

  async listServices(ns: string) {
    const { core } = this.clients;
    const res = ns ? await core.listNamespacedService(ns) : await core.listServiceForAllNamespaces();
    return res.body.items;
  }

  async listPods(ns: string) {
    const { core } = this.clients;
    const res = ns ? await core.listNamespacedPod(ns) : await core.listPodForAllNamespaces();
    return res.body.items;
  }

  async listNetworkPolicies(ns: string) {
    const { net } = this.clients;
    const res = ns ? await net.listNamespacedNetworkPolicy(ns) : await net.listNetworkPolicyForAllNamespaces();
    return res.body.items;
  }

  async listIngresses(ns: string) {
    const { net } = this.clients;
    const res = ns ? await net.listNamespacedIngress(ns) : await net.listIngressForAllNamespaces();
    return res.body.items;
  }

  async listDaemonSets(ns: string) {
    const { apps } = this.clients;
    const res = ns ? await apps.listNamespacedDaemonSet(ns) : await apps.listDaemonSetForAllNamespaces();
    return res.body.items;
  }

  async listDeployments(ns: string, labelSelector?: string) {
    const { apps } = this.clients;
    const res = ns
      ? await apps.listNamespacedDeployment(ns, undefined, undefined, undefined, undefined, labelSelector)
      : await apps.listDeploymentForAllNamespaces(undefined, undefined, undefined, labelSelector);
    return res.body.items;
  }

  async namespaceExists(name: string) {
    try {
      await this.clients.core.readNamespace(name);
      return true;
    } catch (e) {
      if (isNotFound(e)) return false;
      throw e;
    }
  }

  async deploymentExists(name: string, ns: string) {
    try {
      await this.clients.apps.readNamespacedDeployment(name, ns);
      return true;
    } catch (e) {
      if (isNotFound(e)) return false;
      throw e;
    }
  }

  async listRoleBindings(ns: string) {
    const { rbac } = this.clients;
    const res = ns ? await rbac.listNamespacedRoleBinding(ns) : await rbac.listRoleBindingForAllNamespaces();
    return res.body.items;
  }

  async listClusterRoleBindings() {
    return (await this.clients.rbac.listClusterRoleBinding()).body.items;
  }

  async listServiceAccounts(ns: string) {
    const { core } = this.clients;
    const res = ns ? await core.listNamespacedServiceAccount(ns) : await core.listServiceAccountForAllNamespaces();
    return res.body.items;
  }

  async listCustomObjects(ref: CustomResourceRef, ns: string) {
    const { custom } = this.clients;
    const res = ns
      ? await custom.listNamespacedCustomObject(ref.group, ref.version, ns, ref.plural)
      : await custom.listClusterCustomObject(ref.group, ref.version, ref.plural);
    return itemsOf(res.body);
  }

  async watch(path: string, onEvent: WatchEventHandler, onDone: (err?: unknown) => void): Promise<WatchHandle> {
    const req: unknown = await new k8s.Watch(this.kc).watch(path, {}, (type, obj) => onEvent(type, obj), (err) => onDone(err));
    if (req && typeof req === "object" && "abort" in req && typeof req.abort === "function") {
      const abort = req.abort;
      return { abort: () => abort.call(req) };
    }
    return { abort: () => undefined };
  }
}

/** Service selector semantics: an empty selector selects nothing. */
export function podLabelsMatchSelector(
  podLabels: Record<string, string> | undefined,
  selector: Record<string, string> | undefined
): boolean {
  if (!selector || Object.keys(selector).length === 0) return false;
  if (!podLabels) return false;
  for (const [k, v] of Object.entries(selector)) {
    if (podLabels[k] !== v) return false;
  }
  return true;
}

/**
 * metav1.LabelSelector semantics: an empty (or absent) selector selects
 * everything; matchLabels and matchExpressions are ANDed.
 */
export function labelSelectorMatches(
  selector: k8s.V1LabelSelector | undefined,
  labels: Record<string, string> | undefined
): boolean {
  const l = labels ?? {};
  for (const [k, v] of Object.entries(selector?.matchLabels ?? {})) {
    if (l[k] !== v) return false;
  }
  for (const expr of selector?.matchExpressions ?? []) {
    const has = Object.prototype.hasOwnProperty.call(l, expr.key);
    const values = expr.values ?? [];
    switch (expr.operator) {
      case "In":
        if (!has || !values.includes(l[expr.key])) return false;
        break;
      case "NotIn":
        if (has && values.includes(l[expr.key])) return false;
        break;
      case "Exists":
        if (!has) return false;
        break;
      case "DoesNotExist":
        if (has) return false;
        break;
      default:
        return false;
    }
  }
  return true;
}
