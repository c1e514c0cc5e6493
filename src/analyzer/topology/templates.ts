/**
 * Remediation manifests attached to recommendations.
 */

import { stringify } from "yaml";
import { parseServiceKey } from "./serviceKey";
import { GatewayRoute, ServiceNode } from "./types";

function doc(obj: object): string {
  return stringify(obj);
}

function podSelectorFor(svc: ServiceNode): Record<string, string> {
  return Object.keys(svc.selector).length ? svc.selector : { app: svc.name };
}

function portList(svc: ServiceNode): Array<{ protocol: string; port: number }> {
  const out: Array<{ protocol: string; port: number }> = [];
  for (const p of svc.ports) {
    const bare = p.includes(":") ? p.slice(p.indexOf(":") + 1) : p;
    const [num, protocol = "TCP"] = bare.split("/");
    const port = Number.parseInt(num, 10);
    if (Number.isFinite(port)) out.push({ protocol, port });
  }
  return out;
}

/** Admits same-namespace callers on the service's declared ports. */
export function networkPolicyFor(svc: ServiceNode): string {
  const ports = portList(svc);
  return doc({
    apiVersion: "networking.k8s.io/v1",
    kind: "NetworkPolicy",
    metadata: { name: `${svc.name}-network-policy`, namespace: svc.namespace },
    spec: {
      podSelector: { matchLabels: podSelectorFor(svc) },
      policyTypes: ["Ingress"],
      ingress: [{ from: [{ podSelector: {} }], ...(ports.length ? { ports } : {}) }]
    }
  });
}

export function ciliumPolicyFor(svc: ServiceNode): string {
  const ports = portList(svc).map((p) => ({ port: String(p.port), protocol: p.protocol }));
  return doc({
    apiVersion: "cilium.io/v2",
    kind: "CiliumNetworkPolicy",
    metadata: { name: `${svc.name}-cilium-policy`, namespace: svc.namespace },
    spec: {
      endpointSelector: { matchLabels: podSelectorFor(svc) },
      ingress: [
        {
          fromEndpoints: [{ matchLabels: { "k8s:io.kubernetes.pod.namespace": svc.namespace } }],
          ...(ports.length ? { toPorts: [{ ports }] } : {})
        }
      ]
    }
  });
}

export function allowConnectionPolicy(source: ServiceNode, target: ServiceNode, blockedBy: string[]): string {
  const ports = portList(target);
  const header = blockedBy.length ? `# Allows a connection blocked by: ${blockedBy.join(", ")}\n` : "";
  const peer =
    source.namespace === target.namespace
      ? { podSelector: { matchLabels: podSelectorFor(source) } }
      : {
          namespaceSelector: { matchLabels: { "kubernetes.io/metadata.name": source.namespace } },
          podSelector: { matchLabels: podSelectorFor(source) }
        };
  return (
    header +
    doc({
      apiVersion: "networking.k8s.io/v1",
      kind: "NetworkPolicy",
      metadata: { name: `allow-${source.name}-to-${target.name}`, namespace: target.namespace },
      spec: {
        podSelector: { matchLabels: podSelectorFor(target) },
        policyTypes: ["Ingress"],
        ingress: [{ from: [peer], ...(ports.length ? { ports } : {}) }]
      }
    })
  );
}

export function tlsIngressFor(route: GatewayRoute): string {
  const host = route.host === "*" ? "example.com" : route.host;
  const { name } = parseServiceKey(route.target);
  return doc({
    apiVersion: "networking.k8s.io/v1",
    kind: "Ingress",
    metadata: {
      name: route.source,
      namespace: route.namespace,
      annotations: { "cert-manager.io/cluster-issuer": "letsencrypt-prod" }
    },
    spec: {
      tls: [{ hosts: [host], secretName: `${route.source}-tls` }],
      rules: [
        {
          host,
          http: {
            paths: [
              {
                path: route.path || "/",
                pathType: "Prefix",
                backend: { service: { name, port: { number: Number.parseInt(route.port ?? "80", 10) || 80 } } }
              }
            ]
          }
        }
      ]
    }
  });
}

export function strictMtlsPolicy(): string {
  return doc({
    apiVersion: "security.istio.io/v1",
    kind: "PeerAuthentication",
    metadata: { name: "default", namespace: "istio-system" },
    spec: { mtls: { mode: "STRICT" } }
  });
}

export function restrictiveAuthzPolicy(namespace: string): string {
  return doc({
    apiVersion: "security.istio.io/v1",
    kind: "AuthorizationPolicy",
    metadata: { name: "allow-namespace-communication", namespace },
    spec: {
      action: "ALLOW",
      rules: [
        { from: [{ source: { namespaces: [namespace] } }] },
        { from: [{ source: { principals: ["cluster.local/ns/istio-system/sa/istio-ingressgateway-service-account"] } }] }
      ]
    }
  });
}

export function egressGatewayConfig(): string {
  const serviceEntry = {
    apiVersion: "networking.istio.io/v1beta1",
    kind: "ServiceEntry",
    metadata: { name: "external-api", namespace: "istio-system" },
    spec: {
      hosts: ["api.example.com"],
      ports: [{ number: 443, name: "tls", protocol: "TLS" }],
      resolution: "DNS",
      location: "MESH_EXTERNAL"
    }
  };
  const gateway = {
    apiVersion: "networking.istio.io/v1beta1",
    kind: "Gateway",
    metadata: { name: "istio-egressgateway", namespace: "istio-system" },
    spec: {
      selector: { istio: "egressgateway" },
      servers: [{ port: { number: 443, name: "tls", protocol: "TLS" }, hosts: ["api.example.com"], tls: { mode: "PASSTHROUGH" } }]
    }
  };
  return `${doc(serviceEntry)}---\n${doc(gateway)}`;
}

export function ciliumPolicyExample(): string {
  return doc({
    apiVersion: "cilium.io/v2",
    kind: "CiliumNetworkPolicy",
    metadata: { name: "l7-http-policy", namespace: "<namespace>" },
    spec: {
      endpointSelector: { matchLabels: { app: "<app-name>" } },
      ingress: [
        {
          fromEndpoints: [{ matchLabels: { app: "<client-app>" } }],
          toPorts: [{ ports: [{ port: "80", protocol: "TCP" }], rules: { http: [{ method: "GET", path: "/api/.*" }] } }]
        }
      ]
    }
  });
}

export function kyvernoRequireNetworkPolicy(): string {
  return doc({
    apiVersion: "kyverno.io/v1",
    kind: "ClusterPolicy",
    metadata: { name: "require-network-policy" },
    spec: {
      validationFailureAction: "Audit",
      background: true,
      rules: [
        {
          name: "check-network-policy",
          match: { any: [{ resources: { kinds: ["Namespace"] } }] },
          validate: {
            message: "Namespace must have at least one NetworkPolicy",
            deny: { conditions: { any: [{ key: "{{ count(NetworkPolicy) }}", operator: "LessThan", value: 1 }] } }
          }
        }
      ]
    }
  });
}

export function sidecarInjectionConfig(): string {
  return doc({
    apiVersion: "v1",
    kind: "Namespace",
    metadata: { name: "<namespace>", labels: { "istio-injection": "enabled" } }
  });
}

export function applyCommand(template: string): string {
  return `kubectl apply -f - <<EOF\n${template}EOF`;
}
