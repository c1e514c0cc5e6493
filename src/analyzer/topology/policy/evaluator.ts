import * as k8s from "@kubernetes/client-node";
import { EGRESS_GATEWAY, INGRESS_GATEWAY } from "../serviceKey";
import {
  ConnectivityEdge,
  NativePolicyRule,
  PolicyRule,
  PolicyRuleSet,
  ServiceKey,
  ServiceNode,
  VerdictProvenance
} from "../types";
import {
  Direction,
  looksLikeDeny,
  peerMatchesExternal,
  peerMatchesService,
  policySelectsService,
  policyTypes,
  ruleEntries,
  ruleLabel,
  rulePeers
} from "./rules";

/** A service, or one of the synthetic gateway vertices. */
export type Endpoint =
  | { kind: "service"; node: ServiceNode }
  | { kind: "gateway"; key: typeof INGRESS_GATEWAY | typeof EGRESS_GATEWAY };

export type Verdict = {
  allowed: boolean;
  reason: string;
  blockingPolicies: string[];
  provenance: VerdictProvenance;
  /** set when a policy declaring the direction with no rules blocks it */
  defaultDeny?: boolean;
};

type Finding = {
  blocks: boolean;
  names: string[];
  reason: string;
  provenance: VerdictProvenance;
  defaultDeny?: boolean;
};

function endpointKey(e: Endpoint): string {
  return e.kind === "service" ? e.node.key : e.key;
}

/**
 * Evaluates native, mesh and eBPF rules for a directed pair. Native
 * policies with a parsed object are read structurally; everything else
 * falls back to the deny/block name heuristic.
 */
export class PolicyEvaluator {
  constructor(private rules: PolicyRuleSet) {}

  verdict(source: Endpoint, target: Endpoint): Verdict {
    const ns = target.kind === "service" ? target.node.namespace : source.kind === "service" ? source.node.namespace : "";
    const findings: Finding[] = [];

    if (target.kind === "service") {
      const f = this.nativeDirection("ingress", target.node, source);
      if (f) findings.push(f);
    }
    if (source.kind === "service") {
      const f = this.nativeDirection("egress", source.node, target);
      if (f) findings.push(f);
    }
    findings.push(...this.heuristicFindings(ns));

    const blocking = findings.filter((f) => f.blocks);
    if (blocking.length) {
      const names: string[] = [];
      for (const f of blocking) {
        for (const n of f.names) if (!names.includes(n)) names.push(n);
      }
      return {
        allowed: false,
        reason: blocking[0].reason,
        blockingPolicies: names,
        provenance: blocking.some((f) => f.provenance === "heuristic") ? "heuristic" : "structured",
        ...(blocking.some((f) => f.defaultDeny) ? { defaultDeny: true } : {})
      };
    }

    const allowing = findings.find((f) => !f.blocks);
    if (allowing) {
      return { allowed: true, reason: allowing.reason, blockingPolicies: [], provenance: allowing.provenance };
    }
    const anyRules = this.hasRulesIn(ns);
    return {
      allowed: true,
      reason: anyRules ? "No policy blocking" : "No policy exists",
      blockingPolicies: [],
      provenance: "default"
    };
  }

  /**
   * Connectivity between every ordered pair of distinct services sharing a
   * namespace. Also flags nodes selected by a native policy.
   */
  evaluate(graph: Map<ServiceKey, ServiceNode>): Map<ServiceKey, ConnectivityEdge[]> {
    for (const node of graph.values()) {
      node.hasPolicy = this.rules.native.some((r) => r.policy !== undefined && policySelectsService(r.policy, node));
    }

    const out = new Map<ServiceKey, ConnectivityEdge[]>();
    for (const source of graph.values()) {
      const edges: ConnectivityEdge[] = [];
      for (const target of graph.values()) {
        if (source.key === target.key || source.namespace !== target.namespace) continue;
        const v = this.verdict({ kind: "service", node: source }, { kind: "service", node: target });
        const port = target.ports[0];
        edges.push({
          source: source.key,
          target: target.key,
          ...v,
          viaServiceMesh: source.meshType !== "none",
          meshType: source.meshType,
          ...(port ? splitPort(port) : {})
        });
      }
      out.set(source.key, edges);
    }
    return out;
  }

  private hasRulesIn(ns: string): boolean {
    const inNs = (r: PolicyRule) => r.namespace === ns;
    return (
      this.rules.native.some(inNs) ||
      this.rules.mesh.some(inNs) ||
      this.rules.ebpf.some((r) => r.namespace === ns || r.namespace === "")
    );
  }

  /**
   * Structured evaluation of one direction. `self` is the service the
   * policies select; `peer` is the other side of the connection.
   */
  private nativeDirection(dir: Direction, self: ServiceNode, peer: Endpoint): Finding | undefined {
    const applicable: Array<NativePolicyRule & { policy: k8s.V1NetworkPolicy }> = [];
    for (const r of this.rules.native) {
      if (r.policy && policyTypes(r.policy).has(dir) && policySelectsService(r.policy, self)) {
        applicable.push({ ...r, policy: r.policy });
      }
    }
    if (!applicable.length) return undefined;

    const defaultDeny = applicable.filter((r) => ruleEntries(r.policy, dir) === 0);
    if (defaultDeny.length) {
      const names = defaultDeny.map((r) => r.name);
      return {
        blocks: true,
        names,
        reason: `Blocked by default-deny NetworkPolicy: ${names.join(", ")} (no ${dir} rules)`,
        provenance: "structured",
        defaultDeny: true
      };
    }

    for (const r of applicable) {
      const admitted = rulePeers(r.policy, dir).some((peers) => {
        if (!peers || peers.length === 0) return true;
        return peers.some((p) =>
          peer.kind === "service" ? peerMatchesService(p, r.namespace, peer.node) : peerMatchesExternal(p)
        );
      });
      if (admitted) {
        return {
          blocks: false,
          names: [r.name],
          reason: `Allowed by NetworkPolicy: ${r.name}`,
          provenance: "structured"
        };
      }
    }

    const names = applicable.map((r) => r.name);
    return {
      blocks: true,
      names,
      reason: `No ${dir} rule in NetworkPolicy ${names.join(", ")} admits ${endpointKey(peer)}`,
      provenance: "structured"
    };
  }

  private heuristicFindings(ns: string): Finding[] {
    const candidates: PolicyRule[] = [
      ...this.rules.native.filter((r) => !r.policy && r.namespace === ns),
      ...this.rules.mesh.filter((r) => r.kind === "authorizationpolicy" && r.namespace === ns),
      ...this.rules.ebpf.filter((r) => r.namespace === ns || r.namespace === "")
    ];
    return candidates
      .filter((r) => looksLikeDeny(r.name))
      .map((r): Finding => ({
        blocks: true,
        names: [r.name],
        reason: `Potentially blocked by ${ruleLabel(r)}: ${r.name}`,
        provenance: "heuristic"
      }));
  }
}

function splitPort(port: string): { port: string; protocol: string } {
  const bare = port.includes(":") ? port.slice(port.indexOf(":") + 1) : port;
  const [num, protocol = "TCP"] = bare.split("/");
  return { port: num, protocol };
}
