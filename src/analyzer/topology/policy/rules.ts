import * as k8s from "@kubernetes/client-node";
import { labelSelectorMatches } from "../k8s";
import { PolicyRule, ServiceNode } from "../types";

export type Direction = "ingress" | "egress";

export const NAMESPACE_NAME_LABEL = "kubernetes.io/metadata.name";

const DENY_WORDS = ["deny", "block"];

export function looksLikeDeny(name: string): boolean {
  const lower = name.toLowerCase();
  return DENY_WORDS.some((w) => lower.includes(w));
}

/**
 * Policy types in effect. Without an explicit list, Ingress always
 * applies and Egress applies when egress rules are present.
 */
export function policyTypes(policy: k8s.V1NetworkPolicy): Set<Direction> {
  const declared = policy.spec?.policyTypes;
  if (declared && declared.length) {
    const out = new Set<Direction>();
    for (const t of declared) {
      if (t === "Ingress") out.add("ingress");
      if (t === "Egress") out.add("egress");
    }
    return out;
  }
  const out = new Set<Direction>(["ingress"]);
  if (policy.spec?.egress) out.add("egress");
  return out;
}

/** Label sets standing in for the service's pods; the selector when none are running. */
function podLabelSets(node: ServiceNode): Array<Record<string, string>> {
  return node.podLabels.length ? node.podLabels : [node.selector];
}

export function policySelectsService(policy: k8s.V1NetworkPolicy, node: ServiceNode): boolean {
  if ((policy.metadata?.namespace ?? "") !== node.namespace) return false;
  const selector = policy.spec?.podSelector;
  return podLabelSets(node).some((labels) => labelSelectorMatches(selector, labels));
}

export function ruleEntries(policy: k8s.V1NetworkPolicy, dir: Direction): number {
  return dir === "ingress" ? (policy.spec?.ingress?.length ?? 0) : (policy.spec?.egress?.length ?? 0);
}

/** The peer lists of every rule entry for the direction. */
export function rulePeers(policy: k8s.V1NetworkPolicy, dir: Direction): Array<k8s.V1NetworkPolicyPeer[] | undefined> {
  if (dir === "ingress") return (policy.spec?.ingress ?? []).map((r) => r.from);
  return (policy.spec?.egress ?? []).map((r) => r.to);
}

/**
 * Whether a peer admits the given service. podSelector without a
 * namespaceSelector is scoped to the policy's own namespace.
 */
export function peerMatchesService(peer: k8s.V1NetworkPolicyPeer, policyNamespace: string, node: ServiceNode): boolean {
  if (!peer.podSelector && !peer.namespaceSelector) return false; // ipBlock only
  const nsOk = peer.namespaceSelector
    ? labelSelectorMatches(peer.namespaceSelector, { [NAMESPACE_NAME_LABEL]: node.namespace })
    : node.namespace === policyNamespace;
  if (!nsOk) return false;
  if (!peer.podSelector) return true;
  return podLabelSets(node).some((labels) => labelSelectorMatches(peer.podSelector, labels));
}

/**
 * Whether a peer admits traffic from or to outside the cluster: an ipBlock,
 * or a selector open to every pod in every namespace.
 */
export function peerMatchesExternal(peer: k8s.V1NetworkPolicyPeer): boolean {
  if (peer.ipBlock) return true;
  const openNs = peer.namespaceSelector !== undefined && isEmptySelector(peer.namespaceSelector);
  return openNs && (peer.podSelector === undefined || isEmptySelector(peer.podSelector));
}

function isEmptySelector(s: k8s.V1LabelSelector): boolean {
  return Object.keys(s.matchLabels ?? {}).length === 0 && (s.matchExpressions ?? []).length === 0;
}

export function ruleLabel(rule: PolicyRule): string {
  switch (rule.kind) {
    case "networkpolicy":
      return "NetworkPolicy";
    case "authorizationpolicy":
      return "AuthorizationPolicy";
    case "peerauthentication":
      return "PeerAuthentication";
    case "virtualservice":
      return "VirtualService";
    case "destinationrule":
      return "DestinationRule";
    case "ciliumnetworkpolicy":
      return "CiliumNetworkPolicy";
    case "ciliumclusterwidenetworkpolicy":
      return "CiliumClusterwideNetworkPolicy";
  }
}
