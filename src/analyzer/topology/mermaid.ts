import { isGatewayKey } from "./serviceKey";
import { ConnectivityEdge, TopologyData } from "./types";

export function escapeLabel(s: string): string {
  return s.replace(/"/g, '\\"');
}

export function keyFor(id: string): string {
  // Mermaid node ids must be simple: replace non-word with underscore
  return "n_" + id.replace(/[^a-zA-Z0-9_]/g, "_");
}

function edgeLine(e: ConnectivityEdge): string {
  const from = keyFor(e.source);
  const to = keyFor(e.target);
  if (e.allowed) return `  ${from} --> ${to}`;
  const label = e.blockingPolicies.length ? e.blockingPolicies.join(", ") : "blocked";
  return `  ${from} -.->|"${escapeLabel(label)}"| ${to}`;
}

/** graph LR of the connectivity map: allowed edges solid, blocked edges dotted. */
export function toMermaid(topology: TopologyData): string {
  const lines: string[] = ["graph LR"];

  const ids = new Set<string>(Object.keys(topology.services));
  for (const [source, edges] of Object.entries(topology.connectivity)) {
    ids.add(source);
    for (const e of edges) ids.add(e.target);
  }

  for (const id of [...ids].sort()) {
    const svc = topology.services[id];
    const label = svc ? `${svc.name}\\nns:${svc.namespace}` : id;
    const shape = isGatewayKey(id) ? [`(["`, `"])`] : [`["`, `"]`];
    lines.push(`  ${keyFor(id)}${shape[0]}${escapeLabel(label)}${shape[1]}`);
  }

  for (const edges of Object.values(topology.connectivity)) {
    for (const e of edges) lines.push(edgeLine(e));
  }

  return lines.join("\n");
}
