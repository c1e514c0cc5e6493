import { describeError } from "../../errors";
import { Logger } from "../../logger";
import { parseNamed } from "./crds";
import { ClusterApi, WatchHandle } from "./k8s";
import { PolicyEngine } from "./types";

export type PolicyEventType = "ADDED" | "MODIFIED" | "DELETED";

export type PolicyEventListener = (eventType: PolicyEventType, policyEngine: PolicyEngine, name: string, namespace: string) => void;

type WatchTarget = { engine: PolicyEngine; group: string; version: string; plural: string };

const WATCH_TARGETS: WatchTarget[] = [
  { engine: "native", group: "networking.k8s.io", version: "v1", plural: "networkpolicies" },
  { engine: "ebpf", group: "cilium.io", version: "v2", plural: "ciliumnetworkpolicies" },
  { engine: "mesh", group: "security.istio.io", version: "v1", plural: "authorizationpolicies" }
];

export function watchPath(t: Pick<WatchTarget, "group" | "version" | "plural">, namespace: string): string {
  const base = `/apis/${t.group}/${t.version}`;
  return namespace ? `${base}/namespaces/${namespace}/${t.plural}` : `${base}/${t.plural}`;
}

function isPolicyEventType(t: string): t is PolicyEventType {
  return t === "ADDED" || t === "MODIFIED" || t === "DELETED";
}

/**
 * Watches policy objects of every engine and fans change events out to
 * listeners. Watches that end are not restarted; call watch() again.
 */
export class PolicyWatcher {
  private listeners = new Set<PolicyEventListener>();
  private handles: WatchHandle[] = [];

  constructor(
    private api: ClusterApi,
    private log: Logger
  ) {}

  onEvent(listener: PolicyEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(eventType: PolicyEventType, engine: PolicyEngine, name: string, namespace: string) {
    for (const l of this.listeners) {
      try {
        l(eventType, engine, name, namespace);
      } catch (e) {
        this.log.warn(`policy event listener failed: ${describeError(e)}`);
      }
    }
  }

  /** Starts one watch per engine; engines whose CRDs are missing are skipped. */
  async watch(namespace: string): Promise<number> {
    const results = await Promise.allSettled(
      WATCH_TARGETS.map((t) =>
        this.api.watch(
          watchPath(t, namespace),
          (type, obj) => this.handle(t.engine, type, obj),
          (err) => {
            if (err) this.log.warn(`watch on ${t.plural} ended: ${describeError(err)}`);
          }
        )
      )
    );

    let started = 0;
    results.forEach((r, i) => {
      if (r.status === "fulfilled") {
        this.handles.push(r.value);
        started++;
      } else {
        this.log.debug(`not watching ${WATCH_TARGETS[i].plural}: ${describeError(r.reason)}`);
      }
    });
    return started;
  }

  stop() {
    for (const h of this.handles) h.abort();
    this.handles = [];
  }

  private handle(engine: PolicyEngine, type: string, obj: unknown) {
    if (!isPolicyEventType(type)) return;
    const [named] = parseNamed([obj]);
    if (!named) return;
    this.emit(type, engine, named.metadata.name, named.metadata.namespace ?? "");
  }
}
