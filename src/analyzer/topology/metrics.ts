import { z } from "zod";
import { SoftFetchError } from "../../errors";
import { serviceKey } from "./serviceKey";
import { ServiceKey } from "./types";

/** Request rate per service key, averaged over the query window. */
export type TrafficMetricsSource = {
  requestRates(namespace: string, signal?: AbortSignal): Promise<Map<ServiceKey, number>>;
};

const vectorResponseSchema = z.object({
  status: z.string(),
  error: z.string().optional(),
  data: z
    .object({
      resultType: z.string().optional(),
      result: z.array(
        z.object({
          metric: z.record(z.string()).default({}),
          value: z.tuple([z.union([z.number(), z.string()]), z.string()]).optional()
        })
      )
    })
    .optional()
});

function promLabelValue(s: string): string {
  return s.replace(/[\\"]/g, "\\$&").replace(/\n/g, "\\n");
}

export function requestRateQuery(namespace: string): string {
  const filter = namespace ? `{destination_service_namespace="${promLabelValue(namespace)}"}` : "";
  return `sum(rate(istio_requests_total${filter}[24h])) by (destination_service_name, destination_service_namespace)`;
}

/** Prometheus instant query against /api/v1/query. */
export class PrometheusMetricsSource implements TrafficMetricsSource {
  constructor(
    private baseUrl: string,
    private timeoutMs: number
  ) {}

  async requestRates(namespace: string, signal?: AbortSignal): Promise<Map<ServiceKey, number>> {
    const url = new URL("/api/v1/query", this.baseUrl);
    url.searchParams.set("query", requestRateQuery(namespace));

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const res = await fetch(url, { signal: signal ? AbortSignal.any([signal, timeout]) : timeout });
    if (!res.ok) throw new SoftFetchError("metrics", new Error(`prometheus responded ${res.status}`));

    const parsed = vectorResponseSchema.safeParse(await res.json());
    if (!parsed.success) throw new SoftFetchError("metrics", parsed.error);
    if (parsed.data.status !== "success") {
      throw new SoftFetchError("metrics", new Error(parsed.data.error ?? parsed.data.status));
    }

    const rates = new Map<ServiceKey, number>();
    for (const r of parsed.data.data?.result ?? []) {
      const name = r.metric["destination_service_name"];
      const ns = r.metric["destination_service_namespace"];
      if (!name || !ns) continue;
      const rps = Number.parseFloat(r.value?.[1] ?? "0");
      rates.set(serviceKey(name, ns), Number.isFinite(rps) ? rps : 0);
    }
    return rates;
  }
}
