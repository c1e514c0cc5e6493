/**
 * Custom resources the engine reads. Schemas cover only the fields used
 * here; everything else passes through untouched.
 */

import { z } from "zod";
import type { CustomResourceRef } from "./k8s";

export const ISTIO_NETWORKING_VERSIONS = ["v1beta1", "v1alpha3", "v1"] as const;
export const ISTIO_SECURITY_VERSIONS = ["v1", "v1beta1"] as const;

export function istioNetworking(plural: string, version: string): CustomResourceRef {
  return { group: "networking.istio.io", version, plural };
}

export function istioSecurity(plural: string, version: string): CustomResourceRef {
  return { group: "security.istio.io", version, plural };
}

export const CILIUM_NETWORK_POLICIES: CustomResourceRef = {
  group: "cilium.io",
  version: "v2",
  plural: "ciliumnetworkpolicies"
};

export const CILIUM_CLUSTERWIDE_POLICIES: CustomResourceRef = {
  group: "cilium.io",
  version: "v2",
  plural: "ciliumclusterwidenetworkpolicies"
};

export const KYVERNO_POLICIES: CustomResourceRef = { group: "kyverno.io", version: "v1", plural: "policies" };
export const KYVERNO_CLUSTER_POLICIES: CustomResourceRef = { group: "kyverno.io", version: "v1", plural: "clusterpolicies" };

export const ARGO_APPLICATIONS: CustomResourceRef = {
  group: "argoproj.io",
  version: "v1alpha1",
  plural: "applications"
};

const metadataSchema = z
  .object({
    name: z.string(),
    namespace: z.string().optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional()
  })
  .passthrough();

const namedObjectSchema = z.object({ metadata: metadataSchema }).passthrough();

const portSchema = z
  .object({
    number: z.number().optional(),
    name: z.string().optional(),
    protocol: z.string().optional()
  })
  .passthrough();

const destinationSchema = z
  .object({
    host: z.string(),
    port: z.object({ number: z.number().optional() }).passthrough().optional()
  })
  .passthrough();

const routeSchema = z.object({ destination: destinationSchema }).passthrough();

const stringMatchSchema = z
  .object({ exact: z.string().optional(), prefix: z.string().optional(), regex: z.string().optional() })
  .passthrough();

const httpRouteSchema = z
  .object({
    match: z.array(z.object({ uri: stringMatchSchema.optional() }).passthrough()).optional(),
    route: z.array(routeSchema).optional()
  })
  .passthrough();

const l4RouteSchema = z.object({ route: z.array(routeSchema).optional() }).passthrough();

export const virtualServiceSchema = z
  .object({
    metadata: metadataSchema,
    spec: z
      .object({
        hosts: z.array(z.string()).optional(),
        gateways: z.array(z.string()).optional(),
        http: z.array(httpRouteSchema).optional(),
        tls: z.array(l4RouteSchema).optional(),
        tcp: z.array(l4RouteSchema).optional()
      })
      .passthrough()
      .default({})
  })
  .passthrough();

export type VirtualService = z.infer<typeof virtualServiceSchema>;

export const gatewaySchema = z
  .object({
    metadata: metadataSchema,
    spec: z
      .object({
        selector: z.record(z.string()).optional(),
        servers: z
          .array(
            z
              .object({
                port: portSchema.optional(),
                hosts: z.array(z.string()).optional(),
                tls: z.object({ mode: z.string().optional() }).passthrough().optional()
              })
              .passthrough()
          )
          .optional()
      })
      .passthrough()
      .default({})
  })
  .passthrough();

export type IstioGateway = z.infer<typeof gatewaySchema>;

export const serviceEntrySchema = z
  .object({
    metadata: metadataSchema,
    spec: z
      .object({
        hosts: z.array(z.string()).optional(),
        ports: z.array(portSchema).optional(),
        location: z.string().optional()
      })
      .passthrough()
      .default({})
  })
  .passthrough();

export type ServiceEntry = z.infer<typeof serviceEntrySchema>;

export const argoApplicationSchema = z
  .object({
    metadata: metadataSchema,
    spec: z
      .object({
        source: z
          .object({ repoURL: z.string().optional(), targetRevision: z.string().optional() })
          .passthrough()
          .optional()
      })
      .passthrough()
      .default({}),
    status: z
      .object({ sync: z.object({ status: z.string().optional() }).passthrough().optional() })
      .passthrough()
      .optional()
  })
  .passthrough();

export type ArgoApplication = z.infer<typeof argoApplicationSchema>;

export type NamedObject = z.infer<typeof namedObjectSchema>;

/** Parses each item, dropping the ones that do not fit the schema. */
export function parseItems<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, items: unknown[]): T[] {
  const out: T[] = [];
  for (const item of items) {
    const parsed = schema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

export function parseNamed(items: unknown[]): NamedObject[] {
  return parseItems(namedObjectSchema, items);
}
