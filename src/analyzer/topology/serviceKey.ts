import { ServiceKey } from "./types";

export const INGRESS_GATEWAY = "ingress-gateway";
export const EGRESS_GATEWAY = "egress-gateway";

export function serviceKey(name: string, namespace?: string): ServiceKey {
  return namespace ? `${namespace}/${name}` : name;
}

export function parseServiceKey(key: ServiceKey): { namespace: string; name: string } {
  const i = key.indexOf("/");
  if (i < 0) return { namespace: "", name: key };
  return { namespace: key.slice(0, i), name: key.slice(i + 1) };
}

export function isGatewayKey(key: string): boolean {
  return key === INGRESS_GATEWAY || key === EGRESS_GATEWAY;
}

/**
 * Resolves a backend host as written in an Ingress or VirtualService
 * ("api", "api.shop", "api.shop.svc.cluster.local") to a service key.
 */
export function keyForHost(host: string, defaultNamespace: string): ServiceKey {
  const parts = host.split(".");
  if (parts.length === 1) return serviceKey(parts[0], defaultNamespace);
  return serviceKey(parts[0], parts[1]);
}
